/**
 * Submission Revision Store
 * Owns the revision rows and their tag memberships
 */

import { asc, eq, inArray, type SQL } from 'drizzle-orm';
import { createChildLogger } from '@kendb/shared';
import { getDatabase } from '../connection.js';
import { submissionRevisionTags, submissionRevisions, tags, type SubmissionRevisionRow } from '../schema.js';
import type { SubmissionRevision } from '../models/submission-revision.js';
import { ModelStore, required } from './model-store.js';

const MODEL = 'SubmissionRevision';

export class SubmissionRevisionStore extends ModelStore<SubmissionRevision> {
  protected readonly modelName = MODEL;
  protected readonly lookups = {
    pk: submissionRevisions.id,
    id: submissionRevisions.id,
    revision_of: submissionRevisions.revisionOfId,
    revision_of_id: submissionRevisions.revisionOfId,
    name: submissionRevisions.name,
    revision_string: submissionRevisions.revisionString,
    submitted_by: submissionRevisions.submittedById,
    submitted_by_id: submissionRevisions.submittedById,
    submitted_at: submissionRevisions.submittedAt,
    added_at: submissionRevisions.addedAt,
    minecraft_version_max: submissionRevisions.minecraftVersionMaxId,
    minecraft_version_max_id: submissionRevisions.minecraftVersionMaxId,
    minecraft_version_min: submissionRevisions.minecraftVersionMinId,
    minecraft_version_min_id: submissionRevisions.minecraftVersionMinId,
    download_url: submissionRevisions.downloadUrl,
    intended_solution_url: submissionRevisions.intendedSolutionUrl,
    last_modified: submissionRevisions.lastModified,
  };

  private readonly logger = createChildLogger({ component: 'SubmissionRevisionStore' });
  private readonly create: () => SubmissionRevision;

  constructor(create: () => SubmissionRevision) {
    super();
    this.create = create;
  }

  protected async select(where: SQL | undefined): Promise<SubmissionRevision[]> {
    const db = getDatabase();
    const rows = await db.select().from(submissionRevisions).where(where).orderBy(asc(submissionRevisions.id));
    if (rows.length === 0) {
      return [];
    }

    const tagRows = await db
      .select({ revisionId: submissionRevisionTags.revisionId, name: tags.name })
      .from(submissionRevisionTags)
      .innerJoin(tags, eq(submissionRevisionTags.tagId, tags.id))
      .where(
        inArray(
          submissionRevisionTags.revisionId,
          rows.map((row) => row.id)
        )
      )
      .orderBy(asc(tags.name));

    const tagNames = new Map<number, string[]>();
    for (const tag of tagRows) {
      const names = tagNames.get(tag.revisionId) ?? [];
      names.push(tag.name);
      tagNames.set(tag.revisionId, names);
    }

    return rows.map((row) => this.mapToModel(row, tagNames.get(row.id) ?? []));
  }

  /**
   * Upsert the revision row, then replace its tag memberships
   */
  async save(revision: SubmissionRevision): Promise<SubmissionRevision> {
    const db = getDatabase();
    const now = new Date();
    const addedAt = revision.added_at ?? now;
    const values = {
      revisionOfId: required(revision.revision_of_id, 'revision_of', MODEL),
      name: revision.name,
      revisionString: revision.revision_string,
      submittedById: required(revision.submitted_by_id, 'submitted_by', MODEL),
      submittedAt: required(revision.submitted_at, 'submitted_at', MODEL),
      addedAt,
      minecraftVersionMaxId: required(revision.minecraft_version_max_id, 'minecraft_version_max', MODEL),
      minecraftVersionMinId: required(revision.minecraft_version_min_id, 'minecraft_version_min', MODEL),
      downloadUrl: revision.download_url,
      intendedSolutionUrl: revision.intended_solution_url,
      rules: JSON.stringify(revision.rules ?? null),
      authorNotes: revision.author_notes,
      changelog: revision.changelog,
      editorsComment: revision.editors_comment,
      lastModified: now,
    };

    if (revision.pk === null) {
      const [row] = await db.insert(submissionRevisions).values(values).returning({ id: submissionRevisions.id });
      revision.pk = row.id;
    } else {
      await db
        .insert(submissionRevisions)
        .values({ id: revision.pk, ...values })
        .onConflictDoUpdate({ target: submissionRevisions.id, set: values });
    }

    await this.saveTags(revision.pk, revision.tags.names());

    revision.added_at = addedAt;
    revision.last_modified = now;
    return revision;
  }

  async latestModification(): Promise<Date | null> {
    return this.latestOf(submissionRevisions, submissionRevisions.lastModified);
  }

  private async saveTags(revisionId: number, names: string[]): Promise<void> {
    const db = getDatabase();
    await db.delete(submissionRevisionTags).where(eq(submissionRevisionTags.revisionId, revisionId));
    if (names.length === 0) {
      return;
    }

    await db
      .insert(tags)
      .values(names.map((name) => ({ name })))
      .onConflictDoNothing({ target: tags.name });
    const tagRows = await db.select({ id: tags.id }).from(tags).where(inArray(tags.name, names));
    await db.insert(submissionRevisionTags).values(tagRows.map((tag) => ({ revisionId, tagId: tag.id })));

    this.logger.debug({ revisionId, tags: names }, 'Revision tags saved');
  }

  private mapToModel(row: SubmissionRevisionRow, tagNames: string[]): SubmissionRevision {
    const revision = this.create();
    revision.pk = row.id;
    revision.revision_of_id = row.revisionOfId;
    revision.name = row.name;
    revision.revision_string = row.revisionString;
    revision.submitted_by_id = row.submittedById;
    revision.submitted_at = row.submittedAt;
    revision.added_at = row.addedAt;
    revision.minecraft_version_max_id = row.minecraftVersionMaxId;
    revision.minecraft_version_min_id = row.minecraftVersionMinId;
    revision.tags.set(tagNames);
    revision.download_url = row.downloadUrl;
    revision.intended_solution_url = row.intendedSolutionUrl;
    revision.rules = JSON.parse(row.rules);
    revision.author_notes = row.authorNotes;
    revision.changelog = row.changelog;
    revision.editors_comment = row.editorsComment;
    revision.last_modified = row.lastModified;
    return revision;
  }
}
