import {
  type RevisionTransactionContext,
  type RevisionTransactionRunner,
  storeLog,
  withPersistenceErrors,
} from '@revision-log/core';
import type { RevisionDatabase } from '@revision-log/database';
import { createDrizzleRevisionStore, type DrizzleRevisionStoreOptions } from './revision-store.js';

/**
 * Runs the business-record write and its revision appends in one `db.transaction`
 *
 * A rejected callback rolls back both. Driver failures surface as `PersistenceError`;
 * revision log errors thrown by the callback pass through unchanged.
 *
 * @example
 * ```typescript
 * const transactions = createDrizzleTransactionRunner(database.db);
 * await transactions.run(async ({ tx, store }) => {
 *   await tx.update(parts).set({ weightG: 46 }).where(eq(parts.id, 17));
 *   await store.append(createEntityId(17), drafts, { actor });
 * });
 * ```
 */
export const createDrizzleTransactionRunner = (
  db: RevisionDatabase,
  options: DrizzleRevisionStoreOptions = {},
): RevisionTransactionRunner<RevisionDatabase> => ({
  run: <T>(fn: (context: RevisionTransactionContext<RevisionDatabase>) => Promise<T>): Promise<T> =>
    withPersistenceErrors('transaction', () =>
      db.transaction(async (tx) => {
        storeLog('Transaction started');
        return fn({ tx, store: createDrizzleRevisionStore(tx, options) });
      }),
    ),
});
