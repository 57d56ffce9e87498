import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type * as schema from './schema/index.js';

export type RevisionSchema = typeof schema;

/**
 * Any drizzle Postgres database or transaction over the revision log schema
 *
 * Driver-agnostic: postgres.js in production, PGlite in tests.
 */
export type RevisionDatabase = PgDatabase<PgQueryResultHKT, RevisionSchema>;
