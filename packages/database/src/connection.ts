/**
 * Database Connection
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError, createChildLogger } from '@kendb/shared';
import * as schema from './schema.js';

export type DatabaseConnection = BetterSQLite3Database<typeof schema>;

export interface DatabaseConfig {
  path: string;
  verbose?: boolean;
}

const logger = createChildLogger({ component: 'Database' });

let dbInstance: DatabaseConnection | null = null;
let sqliteInstance: Database.Database | null = null;

/**
 * Initialize database connection
 */
export function initializeDatabase(config: DatabaseConfig): DatabaseConnection {
  if (dbInstance) {
    return dbInstance;
  }

  logger.info({ path: config.path }, 'Initializing database');

  if (config.path !== ':memory:') {
    mkdirSync(dirname(config.path), { recursive: true });
  }

  sqliteInstance = new Database(config.path, {
    verbose: config.verbose ? (message) => logger.debug({ sql: message }, 'SQL') : undefined,
  });

  sqliteInstance.pragma('journal_mode = WAL');
  sqliteInstance.pragma('foreign_keys = ON');

  createTablesIfNotExist(sqliteInstance);

  dbInstance = drizzle(sqliteInstance, { schema });

  logger.info('Database initialized successfully');

  return dbInstance;
}

/**
 * Create database tables if they don't exist
 */
function createTablesIfNotExist(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      first_name TEXT NOT NULL DEFAULT ''
    );

    CREATE TABLE IF NOT EXISTS profiles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL UNIQUE REFERENCES users(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS minecraft_versions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      comparator INTEGER NOT NULL,
      family INTEGER NOT NULL DEFAULT 1 CHECK (family IN (1, 2, 3)),
      display_name TEXT NOT NULL CHECK (length(display_name) BETWEEN 1 AND 32),
      is_common INTEGER NOT NULL DEFAULT 0,
      last_modified INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS submissions (
      submission_id INTEGER PRIMARY KEY,
      last_modified INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS submission_revisions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      revision_of_id INTEGER NOT NULL REFERENCES submissions(submission_id) ON DELETE CASCADE,
      name TEXT NOT NULL DEFAULT '',
      revision_string TEXT NOT NULL,
      submitted_by_id INTEGER NOT NULL REFERENCES profiles(id),
      submitted_at INTEGER NOT NULL,
      added_at INTEGER NOT NULL,
      minecraft_version_max_id INTEGER NOT NULL REFERENCES minecraft_versions(id),
      minecraft_version_min_id INTEGER NOT NULL REFERENCES minecraft_versions(id),
      download_url TEXT NOT NULL,
      intended_solution_url TEXT NOT NULL DEFAULT '',
      rules TEXT NOT NULL,
      author_notes TEXT NOT NULL DEFAULT '',
      changelog TEXT NOT NULL DEFAULT '',
      editors_comment TEXT NOT NULL DEFAULT '',
      last_modified INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS tags (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE
    );

    CREATE TABLE IF NOT EXISTS submission_revision_tags (
      revision_id INTEGER NOT NULL REFERENCES submission_revisions(id) ON DELETE CASCADE,
      tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
      PRIMARY KEY (revision_id, tag_id)
    );

    CREATE INDEX IF NOT EXISTS idx_submission_revisions_revision_of ON submission_revisions(revision_of_id);
    CREATE INDEX IF NOT EXISTS idx_submission_revision_tags_tag ON submission_revision_tags(tag_id);
  `);
}

/**
 * Get database instance
 */
export function getDatabase(): DatabaseConnection {
  if (!dbInstance) {
    throw new DatabaseError('Database not initialized. Call initializeDatabase first.', 'E4001');
  }
  return dbInstance;
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (sqliteInstance) {
    sqliteInstance.close();
    sqliteInstance = null;
    dbInstance = null;
    logger.info('Database connection closed');
  }
}
