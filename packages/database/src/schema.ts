/**
 * Database Schema
 * Using Drizzle ORM with SQLite
 */

import { sqliteTable, text, integer, primaryKey } from 'drizzle-orm/sqlite-core';
import { relations } from 'drizzle-orm';

/**
 * Users table (authentication identities; not exposed through the API)
 */
export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  username: text('username').notNull().unique(),
  firstName: text('first_name').notNull().default(''),
});

/**
 * Profiles table
 */
export const profiles = sqliteTable('profiles', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  userId: integer('user_id')
    .notNull()
    .unique()
    .references(() => users.id, { onDelete: 'cascade' }),
});

/**
 * Minecraft versions table
 */
export const minecraftVersions = sqliteTable('minecraft_versions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  comparator: integer('comparator').notNull(),
  // 1 = JE, 2 = BE, 3 = Other
  family: integer('family').notNull().default(1),
  displayName: text('display_name').notNull(),
  isCommon: integer('is_common', { mode: 'boolean' }).notNull().default(false),
  lastModified: integer('last_modified', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Submissions table
 */
export const submissions = sqliteTable('submissions', {
  submissionId: integer('submission_id').primaryKey(),
  lastModified: integer('last_modified', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Submission revisions table
 */
export const submissionRevisions = sqliteTable('submission_revisions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  revisionOfId: integer('revision_of_id')
    .notNull()
    .references(() => submissions.submissionId, { onDelete: 'cascade' }),
  name: text('name').notNull().default(''),
  revisionString: text('revision_string').notNull(),
  submittedById: integer('submitted_by_id')
    .notNull()
    .references(() => profiles.id),
  submittedAt: integer('submitted_at', { mode: 'timestamp_ms' }).notNull(),
  addedAt: integer('added_at', { mode: 'timestamp_ms' }).notNull(),
  minecraftVersionMaxId: integer('minecraft_version_max_id')
    .notNull()
    .references(() => minecraftVersions.id),
  minecraftVersionMinId: integer('minecraft_version_min_id')
    .notNull()
    .references(() => minecraftVersions.id),
  downloadUrl: text('download_url').notNull(),
  intendedSolutionUrl: text('intended_solution_url').notNull().default(''),
  rules: text('rules').notNull(), // JSON stringified
  authorNotes: text('author_notes').notNull().default(''),
  changelog: text('changelog').notNull().default(''),
  editorsComment: text('editors_comment').notNull().default(''),
  lastModified: integer('last_modified', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Tags table
 */
export const tags = sqliteTable('tags', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
});

/**
 * Revision <-> tag membership
 */
export const submissionRevisionTags = sqliteTable(
  'submission_revision_tags',
  {
    revisionId: integer('revision_id')
      .notNull()
      .references(() => submissionRevisions.id, { onDelete: 'cascade' }),
    tagId: integer('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.revisionId, table.tagId] }),
  })
);

// ===========================================
// Relations
// ===========================================

export const usersRelations = relations(users, ({ one }) => ({
  profile: one(profiles),
}));

export const profilesRelations = relations(profiles, ({ one, many }) => ({
  user: one(users, {
    fields: [profiles.userId],
    references: [users.id],
  }),
  submittedRevisions: many(submissionRevisions),
}));

export const submissionsRelations = relations(submissions, ({ many }) => ({
  revisions: many(submissionRevisions),
}));

export const submissionRevisionsRelations = relations(submissionRevisions, ({ one, many }) => ({
  revisionOf: one(submissions, {
    fields: [submissionRevisions.revisionOfId],
    references: [submissions.submissionId],
  }),
  submittedBy: one(profiles, {
    fields: [submissionRevisions.submittedById],
    references: [profiles.id],
  }),
  tags: many(submissionRevisionTags),
}));

export const tagsRelations = relations(tags, ({ many }) => ({
  revisions: many(submissionRevisionTags),
}));

export const submissionRevisionTagsRelations = relations(submissionRevisionTags, ({ one }) => ({
  revision: one(submissionRevisions, {
    fields: [submissionRevisionTags.revisionId],
    references: [submissionRevisions.id],
  }),
  tag: one(tags, {
    fields: [submissionRevisionTags.tagId],
    references: [tags.id],
  }),
}));

// ===========================================
// Type Exports
// ===========================================

export type UserRow = typeof users.$inferSelect;
export type ProfileRow = typeof profiles.$inferSelect;
export type MinecraftVersionRow = typeof minecraftVersions.$inferSelect;
export type SubmissionRow = typeof submissions.$inferSelect;
export type SubmissionRevisionRow = typeof submissionRevisions.$inferSelect;
export type TagRow = typeof tags.$inferSelect;
