/**
 * Submission Store
 */

import { asc, inArray, type SQL } from 'drizzle-orm';
import { ValidationError } from '@kendb/shared';
import { getDatabase } from '../connection.js';
import { submissionRevisions, submissions, type SubmissionRow } from '../schema.js';
import type { Submission } from '../models/submission.js';
import { ModelStore } from './model-store.js';

export class SubmissionStore extends ModelStore<Submission> {
  protected readonly modelName = 'Submission';
  protected readonly lookups = {
    pk: submissions.submissionId,
    submission_id: submissions.submissionId,
    last_modified: submissions.lastModified,
  };

  private readonly create: () => Submission;

  constructor(create: () => Submission) {
    super();
    this.create = create;
  }

  protected async select(where: SQL | undefined): Promise<Submission[]> {
    const db = getDatabase();
    const rows = await db.select().from(submissions).where(where).orderBy(asc(submissions.submissionId));
    if (rows.length === 0) {
      return [];
    }

    // Revision memberships, grouped by submission
    const revisionRows = await db
      .select({ id: submissionRevisions.id, revisionOfId: submissionRevisions.revisionOfId })
      .from(submissionRevisions)
      .where(
        inArray(
          submissionRevisions.revisionOfId,
          rows.map((row) => row.submissionId)
        )
      )
      .orderBy(asc(submissionRevisions.id));

    const revisionIds = new Map<number, number[]>();
    for (const revision of revisionRows) {
      const ids = revisionIds.get(revision.revisionOfId) ?? [];
      ids.push(revision.id);
      revisionIds.set(revision.revisionOfId, ids);
    }

    return rows.map((row) => this.mapToModel(row, revisionIds.get(row.submissionId) ?? []));
  }

  /**
   * Upsert the submission row. Revisions are saved through their own store.
   */
  async save(submission: Submission): Promise<Submission> {
    if (submission.pk === null) {
      throw new ValidationError('Submission ID is required', { model: 'Submission', field: 'submission_id' });
    }

    const db = getDatabase();
    const now = new Date();
    await db
      .insert(submissions)
      .values({ submissionId: submission.pk, lastModified: now })
      .onConflictDoUpdate({ target: submissions.submissionId, set: { lastModified: now } });

    submission.last_modified = now;
    return submission;
  }

  async latestModification(): Promise<Date | null> {
    return this.latestOf(submissions, submissions.lastModified);
  }

  private mapToModel(row: SubmissionRow, revisionIds: number[]): Submission {
    const submission = this.create();
    submission.pk = row.submissionId;
    submission.last_modified = row.lastModified;
    submission.revisions.set(revisionIds);
    return submission;
  }
}
