/**
 * Submission model
 */

import { ApiEngine, Model, apiModel, toMany, type RelatedManager } from '@kendb/api-fields';
import { DomainError } from '@kendb/shared';
import { SubmissionStore } from '../stores/submission-store.js';
import { SubmissionRevision } from './submission-revision.js';

const api = new ApiEngine();

api.addRelated('revisions');

export class Submission extends Model {
  static readonly doc = `Submission model.

    Most fields describing the submission are part of a SubmissionRevision.`;
  static readonly api = api;
  static readonly objects: SubmissionStore = new SubmissionStore(() => new Submission());

  static readonly attributes = {
    revisions: toMany(() => SubmissionRevision),
  };

  declare revisions: RelatedManager;
  last_modified: Date | null = null;

  /**
   * Submission ID shown to visitors; the primary key
   */
  get submission_id(): number | null {
    return this.pk;
  }

  set submission_id(value: number | null) {
    this.pk = value;
  }

  /**
   * Latest revision by submission time.
   *
   * With `raiseIfNone` (the default) a submission without revisions is a
   * DomainError; otherwise null is returned.
   */
  async latestRevision(options: { raiseIfNone?: boolean } = {}): Promise<SubmissionRevision | null> {
    const raiseIfNone = options.raiseIfNone ?? true;
    const revisions = this.pk === null ? [] : await SubmissionRevision.objects.filter({ revision_of: this.pk });

    let latest: SubmissionRevision | null = null;
    for (const revision of revisions) {
      if (latest === null || submittedTime(revision) > submittedTime(latest)) {
        latest = revision;
      }
    }

    if (latest === null && raiseIfNone) {
      throw new DomainError(`No revisions found for submission #${String(this.pk)}`, 'E9001', {
        model: 'Submission',
      });
    }
    return latest;
  }

  async describe(): Promise<string> {
    const latest = await this.latestRevision({ raiseIfNone: false });
    let name = '<no revisions>';
    if (latest !== null) {
      name = latest.name === '' ? 'Untitled' : `'${latest.name}'`;
    }
    return `#${String(this.pk)} ${name}`;
  }
}

function submittedTime(revision: SubmissionRevision): number {
  return revision.submitted_at === null ? Number.NEGATIVE_INFINITY : revision.submitted_at.getTime();
}

apiModel(Submission);
