/** @revision-log/database - Postgres schema and connection for the revision log */

export type { Database, DatabaseConfig } from './connection.js';
export { createDatabase, createDatabaseFromEnv } from './connection.js';
export type { DatabaseEnv } from './env.js';
export { loadDatabaseEnv } from './env.js';
export { MIGRATIONS_FOLDER, runMigrations } from './migrate.js';
export * from './schema/index.js';
export type { RevisionDatabase, RevisionSchema } from './types.js';
export { dbLog } from './utils/debug.js';
