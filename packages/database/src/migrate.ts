/**
 * Database Migration Runner
 *
 * Applies the drizzle-kit migrations under `drizzle/` over a single non-pooled connection.
 */

import { fileURLToPath } from 'node:url';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { createDatabase } from './connection.js';
import { dbLog } from './utils/debug.js';

/** Folder holding the generated SQL migrations and their journal */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../drizzle', import.meta.url));

/**
 * Run database migrations
 *
 * @param databaseUrl - PostgreSQL connection URL
 * @param migrationsFolder - Folder containing migration files (default: the package's own)
 */
export async function runMigrations(databaseUrl: string, migrationsFolder = MIGRATIONS_FOLDER): Promise<void> {
  const database = createDatabase({ url: databaseUrl, maxConnections: 1 });
  try {
    await migrate(database.db, { migrationsFolder });
    dbLog('Migrations applied from %s', migrationsFolder);
  } finally {
    await database.close();
  }
}
