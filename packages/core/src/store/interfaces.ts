/**
 * Revision Store Interfaces
 *
 * Storage-agnostic contract of the append-only revision log. Adapters implement it on top
 * of a concrete database client.
 *
 * @packageDocumentation
 */

import type { ActorId, EntityId } from '../domain/branded-types.js';
import type { ChangeDraft, ChangeRecord } from '../domain/change-record.js';

/** Attribution of one append call */
export interface AppendOptions {
  actor: ActorId;
  /** Time of the change; defaults to the store's clock */
  timestamp?: Date;
  /** Annotation for every record of the batch that carries none of its own */
  notes?: string | null;
}

/**
 * Append-only revision log
 *
 * @remarks
 * There is no update or delete operation: persisted records are never modified.
 */
export interface RevisionStore {
  /**
   * Persists a batch of drafts for one entity, all or nothing
   *
   * @returns The persisted records in batch order
   * @throws {PersistenceError} When the storage cannot complete the write
   */
  append(entityId: EntityId, drafts: readonly ChangeDraft[], options: AppendOptions): Promise<ChangeRecord[]>;

  /**
   * Lists an entity's records ordered by `(changedAt, id)` ascending
   *
   * @returns An empty list for an entity without history
   * @throws {PersistenceError} When the storage cannot be read
   */
  listFor(entityId: EntityId): Promise<ChangeRecord[]>;
}

/** Transaction handed to a save callback, with a store bound to it */
export interface RevisionTransactionContext<TTx> {
  /** Database handle scoped to the transaction, for the business record's own writes */
  readonly tx: TTx;
  /** Store whose appends commit or roll back with the transaction */
  readonly store: RevisionStore;
}

/**
 * Transaction runner ensuring the business-record save and its revisions are atomic
 *
 * @example
 * ```typescript
 * await transactions.run(async ({ tx, store }) => {
 *   await tx.update(parts).set(values).where(eq(parts.id, 42));
 *   await store.append(entityId, drafts, { actor });
 * });
 * ```
 */
export interface RevisionTransactionRunner<TTx> {
  run<T>(fn: (context: RevisionTransactionContext<TTx>) => Promise<T>): Promise<T>;
}
