/**
 * Revision service: the save hook and the history query
 *
 * @module revision-service
 *
 * @remarks
 * Save hook: diff the snapshots (pure, before any write), then run the caller's business-record
 * save and append the drafts inside one transaction. Either both commit or neither does.
 *
 * History query: read an entity's log and group it into a revision tree.
 */

import type { ActorId, EntityId } from '../domain/branded-types.js';
import { createActorId, createEntityId, IdValidationError } from '../domain/branded-types.js';
import type { ChangeDraft, ChangeRecord, Snapshot } from '../domain/change-record.js';
import { ValidationError } from '../domain/errors.js';
import { createDiffEngine } from '../diff/diff-engine.js';
import type { FieldSchema } from '../schema/field-schema.js';
import type { RevisionStore, RevisionTransactionRunner } from '../store/interfaces.js';
import type { RevisionTree } from '../tree/revision-tree.js';
import { createRevisionTreeBuilder } from '../tree/revision-tree.js';
import type { RevisionContextProvider } from '../types.js';
import { coreLog } from '../utils/debug.js';
import type { RevisionErrorHandler, RevisionErrorPhase } from '../utils/error-handler.js';
import { reportAndRethrow } from '../utils/error-handler.js';

/** Key of a business record as its repository returns it */
export type EntityKey = string | number;

export interface RevisionServiceOptions<TTx> {
  /** Store used for history queries */
  store: RevisionStore;
  /** Runs a save and its appends in one transaction */
  transactions: RevisionTransactionRunner<TTx>;
  /** Tracked fields */
  schema: FieldSchema;
  /** Supplies the actor and notes when a save does not pass them */
  contextProvider?: RevisionContextProvider;
  /** Reference time zone of the revision tree (default: UTC) */
  timeZone?: string;
  /** Timestamp source for saves (default: current time) */
  clock?: () => Date;
  /** Told about every failure before it propagates */
  onError?: RevisionErrorHandler;
}

export interface SaveInput {
  /** Required for an existing record unless the persist callback returns it */
  entityId?: EntityKey;
  /** Snapshot before the save; `null` for a record being created */
  before: Snapshot | null;
  after: Snapshot;
  /** Actor id; falls back to the context provider */
  actor?: string;
  notes?: string | null;
}

/**
 * Writes the business record inside the save transaction
 *
 * @returns The record's key (needed for a new record, whose id the database assigns)
 */
export type PersistFn<TTx> = (tx: TTx, drafts: readonly ChangeDraft[]) => Promise<EntityKey | undefined>;

export interface SaveResult {
  entityId: EntityId;
  /** Persisted records, for immediate display */
  records: ChangeRecord[];
}

export interface RevisionService<TTx> {
  readonly schema: FieldSchema;
  /** Pure diff of two snapshots */
  diff(before: Snapshot | null, after: Snapshot): ChangeDraft[];
  /**
   * Save hook
   *
   * @throws {ValidationError} Invalid snapshot, actor or entity id; nothing is written
   * @throws {PersistenceError} The store failed; the whole save is rolled back
   */
  recordSave(input: SaveInput, persist?: PersistFn<TTx>): Promise<SaveResult>;
  /** Flat history, oldest first */
  listFor(entityId: EntityKey): Promise<ChangeRecord[]>;
  /** History query: the entity's log grouped by date and actor */
  getHistory(entityId: EntityKey): Promise<RevisionTree>;
}

const toValidationError = (field: string, error: unknown): unknown =>
  error instanceof IdValidationError ? ValidationError.forField(field, error.message) : error;

const parseEntityId = (key: EntityKey): EntityId => {
  try {
    return createEntityId(key);
  } catch (error) {
    throw toValidationError('entityId', error);
  }
};

/**
 * Creates the revision service
 *
 * @example
 * ```typescript
 * const revisions = createRevisionService({
 *   store,
 *   transactions,
 *   schema: PART_FIELD_SCHEMA,
 *   timeZone: 'Europe/Berlin',
 * });
 *
 * const { records } = await revisions.recordSave(
 *   { before: null, after: snapshot, actor: 'estimator-1' },
 *   async (tx) => (await partRepository.insert(tx, snapshot)).id,
 * );
 *
 * const tree = await revisions.getHistory(partId);
 * ```
 */
export const createRevisionService = <TTx>(options: RevisionServiceOptions<TTx>): RevisionService<TTx> => {
  const { store, transactions, schema, contextProvider, onError } = options;
  const diff = createDiffEngine(schema);
  const buildTree = createRevisionTreeBuilder({ timeZone: options.timeZone });
  const clock = options.clock ?? (() => new Date());

  const resolveActor = (explicit: string | undefined): ActorId => {
    const actor = explicit ?? contextProvider?.getContext()?.actor.id;
    if (actor === undefined) {
      throw ValidationError.forField('actor', 'no actor given and no revision context is active');
    }
    try {
      return createActorId(actor);
    } catch (error) {
      throw toValidationError('actor', error);
    }
  };

  const resolveNotes = (explicit: string | null | undefined): string | null =>
    explicit !== undefined ? explicit : (contextProvider?.getContext()?.notes ?? null);

  const recordSave = async (input: SaveInput, persist?: PersistFn<TTx>): Promise<SaveResult> => {
    const knownId = input.entityId === undefined ? null : String(input.entityId);
    let phase: RevisionErrorPhase = 'diff';

    try {
      const actor = resolveActor(input.actor);
      const drafts = diff(input.before, input.after);
      if (!persist && input.entityId === undefined) {
        throw ValidationError.forField('entityId', 'entityId is required when no persist callback is given');
      }

      const notes = resolveNotes(input.notes);
      const timestamp = clock();
      coreLog('Saving %s with %d change(s) by %s', knownId ?? '(new record)', drafts.length, actor);

      phase = 'append';
      return await transactions.run(async (context) => {
        const returnedKey = persist ? await persist(context.tx, drafts) : undefined;
        const key = returnedKey ?? input.entityId;
        if (key === undefined) {
          throw ValidationError.forField('entityId', 'persist callback returned no key for a new record');
        }

        const entityId = parseEntityId(key);
        const records = await context.store.append(entityId, drafts, { actor, timestamp, notes });
        coreLog('Appended %d revision(s) for %s', records.length, entityId);
        return { entityId, records };
      });
    } catch (error) {
      return reportAndRethrow(onError, phase, knownId, error);
    }
  };

  const listFor = async (key: EntityKey): Promise<ChangeRecord[]> => {
    try {
      return await store.listFor(parseEntityId(key));
    } catch (error) {
      return reportAndRethrow(onError, 'list', String(key), error);
    }
  };

  return {
    schema,
    diff,
    recordSave,
    listFor,
    getHistory: async (key) => buildTree(await listFor(key)),
  };
};
