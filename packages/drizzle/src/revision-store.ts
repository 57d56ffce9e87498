/**
 * Drizzle Revision Store
 *
 * {@link RevisionStore} over the `part_revisions` table.
 *
 * @module revision-store
 *
 * @remarks
 * Every append runs in its own transaction, or in a savepoint of the caller's when the store
 * is bound to a transaction. Appends to one entity are serialized with a transaction-scoped
 * advisory lock, so the latest stored `changed_at` read under the lock is final until commit.
 */

import {
  type AppendOptions,
  assertChangeRecord,
  type ChangeDraft,
  type ChangeRecord,
  type EntityId,
  NotFoundError,
  prepareBatch,
  type RevisionStore,
  sortChangeRecords,
  storeLog,
  withPersistenceErrors,
} from '@revision-log/core';
import { type PartRevisionRow, partRevisions, parts, type RevisionDatabase } from '@revision-log/database';
import { asc, desc, eq, sql } from 'drizzle-orm';

export interface DrizzleRevisionStoreOptions {
  /**
   * Raise {@link NotFoundError} when the owning part does not exist
   *
   * @default false (an unknown entity has an empty history)
   */
  requireEntity?: boolean;
  /** Timestamp source for appends without a timestamp (default: current time) */
  clock?: () => Date;
}

const toChangeRecord = (row: PartRevisionRow): ChangeRecord => assertChangeRecord(row);

const assertPartExists = async (db: RevisionDatabase, entityId: EntityId): Promise<void> => {
  const partId = Number(entityId);
  if (!Number.isSafeInteger(partId)) {
    throw new NotFoundError('Part', entityId);
  }

  const [part] = await db.select({ id: parts.id }).from(parts).where(eq(parts.id, partId)).limit(1);
  if (!part) {
    throw new NotFoundError('Part', entityId);
  }
};

const findLatestChange = async (db: RevisionDatabase, entityId: EntityId): Promise<Date | null> => {
  const [latest] = await db
    .select({ changedAt: partRevisions.changedAt })
    .from(partRevisions)
    .where(eq(partRevisions.entityId, entityId))
    .orderBy(desc(partRevisions.changedAt), desc(partRevisions.id))
    .limit(1);
  return latest?.changedAt ?? null;
};

/**
 * Create a revision store on a drizzle database or transaction
 *
 * @example
 * ```typescript
 * const store = createDrizzleRevisionStore(database.db);
 * const history = await store.listFor(createEntityId(partId));
 * ```
 */
export const createDrizzleRevisionStore = (
  db: RevisionDatabase,
  options: DrizzleRevisionStoreOptions = {},
): RevisionStore => {
  const now = options.clock ?? (() => new Date());
  const requireEntity = options.requireEntity ?? false;

  const append = async (
    entityId: EntityId,
    drafts: readonly ChangeDraft[],
    appendOptions: AppendOptions,
  ): Promise<ChangeRecord[]> => {
    if (drafts.length === 0) {
      return [];
    }

    return withPersistenceErrors('append', () =>
      db.transaction(async (tx) => {
        await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${entityId}::text))`);
        if (requireEntity) {
          await assertPartExists(tx, entityId);
        }

        const latest = await findLatestChange(tx, entityId);
        const batch = prepareBatch(entityId, drafts, appendOptions, latest, now);
        const rows = await tx.insert(partRevisions).values([...batch.rows]).returning();

        storeLog('Appended %d revision(s) for %s (batch %s)', rows.length, entityId, batch.batchId);
        return sortChangeRecords(rows.map(toChangeRecord));
      }),
    );
  };

  const listFor = (entityId: EntityId): Promise<ChangeRecord[]> =>
    withPersistenceErrors('list', async () => {
      if (requireEntity) {
        await assertPartExists(db, entityId);
      }

      const rows = await db
        .select()
        .from(partRevisions)
        .where(eq(partRevisions.entityId, entityId))
        .orderBy(asc(partRevisions.changedAt), asc(partRevisions.id));

      storeLog('Listed %d revision(s) for %s', rows.length, entityId);
      return rows.map(toChangeRecord);
    });

  return { append, listFor };
};
