import { eq, sql } from 'drizzle-orm';
import { readMigrationFiles } from 'drizzle-orm/migrator';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MIGRATIONS_FOLDER } from '../src/migrate.js';
import { parts } from '../src/schema/index.js';
import { createInProcessDatabase, type InProcessDatabase, migrateInProcessDatabase } from '../src/testing/index.js';

describe('migrations folder', () => {
  it('should hold the initial schema split into single statements', () => {
    const migrations = readMigrationFiles({ migrationsFolder: MIGRATIONS_FOLDER });

    expect(migrations).toHaveLength(1);
    expect(migrations[0]?.sql).toHaveLength(4);
    expect(migrations[0]?.sql[0]?.startsWith('CREATE TABLE "parts"')).toBe(true);
  });
});

describe('migrateInProcessDatabase', () => {
  let database: InProcessDatabase;

  beforeEach(async () => {
    database = await createInProcessDatabase();
  });

  afterEach(async () => {
    await database.close();
  });

  it('should skip migrations that are already applied', async () => {
    await migrateInProcessDatabase(database.db);

    const tables = await database.db.execute<{ table_name: string }>(
      sql`select table_name from information_schema.tables where table_schema = 'public' order by table_name`,
    );
    const applied = await database.db.execute<{ count: number }>(
      sql`select count(*)::int as count from drizzle.__drizzle_migrations`,
    );

    expect(tables.rows.map((row) => row.table_name)).toEqual(['part_revisions', 'parts']);
    expect(applied.rows[0]?.count).toBe(1);
  });

  it('should apply column defaults', async () => {
    const [inserted] = await database.db.insert(parts).values({ name: 'Housing' }).returning();
    if (!inserted) throw new Error('insert returned no row');

    const [row] = await database.db.select().from(parts).where(eq(parts.id, inserted.id));

    expect(row).toMatchObject({ id: 1, name: 'Housing', assembly: false, overmold: false, weightG: null });
    expect(row?.createdAt).toBeInstanceOf(Date);
  });
});
