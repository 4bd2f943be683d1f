/**
 * @kendb/database
 * SQLite storage, object stores and the KenDB3 models
 */

export { initializeDatabase, getDatabase, closeDatabase } from './connection.js';
export type { DatabaseConnection, DatabaseConfig } from './connection.js';

export * from './schema.js';
export * from './stores/index.js';
export * from './models/index.js';
