/**
 * Submission Revision model
 */

import { ApiEngine, Model, apiModel, dateTime, foreignKey, tagCollection, type TagManager } from '@kendb/api-fields';
import { SubmissionRevisionStore } from '../stores/submission-revision-store.js';
import { MinecraftVersion } from './minecraft-version.js';
import { Profile } from './profile.js';
import { Submission } from './submission.js';

const api = new ApiEngine();

export class SubmissionRevision extends Model {
  static readonly doc = 'Revision of a submission.';
  static readonly api = api;
  static readonly objects: SubmissionRevisionStore = new SubmissionRevisionStore(() => new SubmissionRevision());

  static readonly attributes = {
    revision_of: foreignKey(() => Submission),
    submitted_by: foreignKey(() => Profile),
    minecraft_version_max: foreignKey(() => MinecraftVersion),
    minecraft_version_min: foreignKey(() => MinecraftVersion),
    tags: tagCollection(),
    submitted_at: dateTime(),
    added_at: dateTime(),
  };

  static readonly annotations = {
    revision_of: api.mark('*', 'basic'),
    name: api.mark('*', 'basic'),
    revision_string: api.mark('*', 'basic'),
    submitted_by: api.mark(),
    submitted_at: api.mark(),
    added_at: api.mark(),
    minecraft_version_max: api.mark('*', 'basic'),
    minecraft_version_min: api.mark('*', 'basic'),
    tags: api.mark('*', 'basic'),
    download_url: api.mark(),
    intended_solution_url: api.mark(),
    rules: api.mark(),
    author_notes: api.mark(),
    changelog: api.mark(),
    editors_comment: api.mark(),
  };

  declare revision_of_id: number | null;
  declare submitted_by_id: number | null;
  declare minecraft_version_max_id: number | null;
  declare minecraft_version_min_id: number | null;
  declare tags: TagManager;

  /** Display name; blank for untitled */
  name = '';
  /** Version string, e.g. `1.0.3` */
  revision_string = '';
  /** Timestamp of the submission message */
  submitted_at: Date | null = null;
  /** First time the revision was added to the database */
  added_at: Date | null = null;
  /** Download URL, or a human-readable explanation */
  download_url = '';
  /** Video URL of the intended solution; blank if none */
  intended_solution_url = '';
  rules: unknown = null;
  author_notes = '';
  changelog = '';
  editors_comment = '';
  last_modified: Date | null = null;

  toString(): string {
    return `#${String(this.revision_of_id)} v${this.revision_string}`;
  }
}

apiModel(SubmissionRevision);
