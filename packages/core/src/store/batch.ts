/**
 * Batch preparation shared by store adapters
 *
 * @module store/batch
 */

import { createId } from '@paralleldrive/cuid2';
import type { EntityId } from '../domain/branded-types.js';
import type { ChangeDraft, ChangeRecordInput } from '../domain/change-record.js';
import { ValidationError } from '../domain/errors.js';
import type { AppendOptions } from './interfaces.js';

/** Row about to be inserted; the store assigns `id` */
export type PreparedRevision = Omit<ChangeRecordInput, 'id'>;

export interface PreparedBatch {
  readonly batchId: string;
  readonly changedAt: Date;
  readonly rows: readonly PreparedRevision[];
}

/**
 * Resolves the timestamp of a batch
 *
 * Never earlier than the entity's latest stored change, so that `(changedAt, id)` order
 * matches append order even when callers pass an older timestamp.
 */
export const resolveBatchTimestamp = (requested: Date, latest: Date | null): Date => {
  if (latest !== null && requested.getTime() < latest.getTime()) {
    return new Date(latest.getTime());
  }
  return new Date(requested.getTime());
};

/**
 * Builds the rows of one append call
 *
 * @param latest - Latest `changedAt` already stored for the entity, read inside the write transaction
 * @param now - Store clock, used when the caller passes no timestamp
 * @throws {ValidationError} On an invalid timestamp
 *
 * @example
 * ```typescript
 * const batch = prepareBatch(entityId, drafts, { actor }, latestChangedAt, () => new Date());
 * await tx.insert(partRevisions).values(batch.rows.map(toRow));
 * ```
 */
export const prepareBatch = (
  entityId: EntityId,
  drafts: readonly ChangeDraft[],
  options: AppendOptions,
  latest: Date | null,
  now: () => Date,
): PreparedBatch => {
  const requested = options.timestamp ?? now();
  if (Number.isNaN(requested.getTime())) {
    throw ValidationError.forField('timestamp', 'timestamp must be a valid Date');
  }

  const batchId = createId();
  const changedAt = resolveBatchTimestamp(requested, latest);

  const rows = drafts.map(
    (draft): PreparedRevision => ({
      entityId,
      fieldName: draft.fieldName,
      oldValue: draft.oldValue,
      newValue: draft.newValue,
      changeKind: draft.changeKind,
      category: draft.category,
      changedAt,
      changedBy: options.actor,
      notes: draft.notes ?? options.notes ?? null,
      batchId,
    }),
  );

  return { batchId, changedAt, rows };
};
