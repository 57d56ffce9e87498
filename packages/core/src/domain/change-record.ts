/**
 * Change Record Type Definitions
 *
 * One logged field mutation. Records are created once by the store and never updated.
 */

import type { ChangeCategory, ChangeKind } from '../constants.js';
import type { ActorId, EntityId, RevisionId } from './branded-types.js';

/** Persisted, immutable field mutation */
export interface ChangeRecord {
  readonly id: RevisionId;
  readonly entityId: EntityId;
  readonly fieldName: string;
  /** Canonical previous value; `null` when the field had no prior value */
  readonly oldValue: string | null;
  /** Canonical value after the change */
  readonly newValue: string;
  readonly changeKind: ChangeKind;
  readonly category: ChangeCategory;
  readonly changedAt: Date;
  readonly changedBy: ActorId;
  readonly notes: string | null;
  /** Shared by every record written by one append call */
  readonly batchId: string;
}

/**
 * Diff output: a change record before persistence
 *
 * Identity, actor and timestamp are filled in by the store.
 */
export interface ChangeDraft {
  readonly fieldName: string;
  readonly oldValue: string | null;
  readonly newValue: string;
  readonly changeKind: ChangeKind;
  readonly category: ChangeCategory;
  readonly notes?: string | null;
}

/** Input for {@link createChangeRecord} (plain strings and numbers for IDs) */
export interface ChangeRecordInput {
  id: number;
  entityId: string;
  fieldName: string;
  oldValue: string | null;
  newValue: string;
  changeKind: ChangeKind;
  category: ChangeCategory;
  changedAt: Date;
  changedBy: string;
  notes: string | null;
  batchId: string;
}

/** Plain mapping from tracked field name to its typed value at one point in time */
export type Snapshot = Readonly<Record<string, unknown>>;
