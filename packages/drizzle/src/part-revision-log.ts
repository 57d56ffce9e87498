/**
 * Part revision log: the save hook and history query wired to drizzle
 *
 * @module part-revision-log
 */

import {
  createRevisionService,
  NotFoundError,
  PART_FIELD_SCHEMA,
  type RevisionContextProvider,
  type RevisionErrorHandler,
  type RevisionService,
  type RevisionTree,
  type SaveResult,
} from '@revision-log/core';
import type { Part, RevisionDatabase } from '@revision-log/database';
import { applyPartChanges, createPartRepository, type PartInput, toPartSnapshot } from './part-repository.js';
import { createDrizzleRevisionStore, type DrizzleRevisionStoreOptions } from './revision-store.js';
import { createDrizzleTransactionRunner } from './transaction-runner.js';

export interface PartRevisionLogOptions extends DrizzleRevisionStoreOptions {
  contextProvider?: RevisionContextProvider;
  /** Reference time zone of history trees (default: UTC) */
  timeZone?: string;
  onError?: RevisionErrorHandler;
}

/** Who made a save and why; both fall back to the revision context */
export interface SaveAttribution {
  actor?: string;
  notes?: string | null;
}

export interface PartSaveResult extends SaveResult {
  part: Part;
}

export interface PartRevisionLog {
  readonly revisions: RevisionService<RevisionDatabase>;
  /** Inserts a part and logs every set field as CREATED */
  createPart(input: PartInput, attribution?: SaveAttribution): Promise<PartSaveResult>;
  /**
   * Applies changes to a part and logs every changed field as UPDATED
   *
   * @throws {NotFoundError} When no part has this id
   */
  updatePart(id: number, changes: Partial<PartInput>, attribution?: SaveAttribution): Promise<PartSaveResult>;
  getHistory(id: number): Promise<RevisionTree>;
}

const withPart = (result: SaveResult, part: Part | undefined): PartSaveResult => {
  if (!part) {
    throw new Error('Save committed without a part row');
  }
  return { ...result, part };
};

/**
 * Create the part revision log
 *
 * @example
 * ```typescript
 * const env = loadDatabaseEnv();
 * const database = createDatabaseFromEnv(env);
 * const partLog = createPartRevisionLog(database.db, { timeZone: env.REVISION_LOG_TIME_ZONE });
 *
 * const { part } = await partLog.createPart({ name: 'Housing', volumeCm3: 50 }, { actor: 'estimator-1' });
 * await partLog.updatePart(part.id, { volumeCm3: 45.5 }, { actor: 'estimator-2', notes: 'CAD rev B' });
 * const tree = await partLog.getHistory(part.id);
 * ```
 */
export const createPartRevisionLog = (db: RevisionDatabase, options: PartRevisionLogOptions = {}): PartRevisionLog => {
  const storeOptions: DrizzleRevisionStoreOptions = { requireEntity: options.requireEntity, clock: options.clock };
  const partRepository = createPartRepository();
  const revisions = createRevisionService({
    store: createDrizzleRevisionStore(db, storeOptions),
    transactions: createDrizzleTransactionRunner(db, storeOptions),
    schema: PART_FIELD_SCHEMA,
    contextProvider: options.contextProvider,
    timeZone: options.timeZone,
    clock: options.clock,
    onError: options.onError,
  });

  const createPart = async (input: PartInput, attribution: SaveAttribution = {}): Promise<PartSaveResult> => {
    const persisted: { part?: Part } = {};
    const result = await revisions.recordSave(
      { before: null, after: toPartSnapshot(input), ...attribution },
      async (tx) => {
        persisted.part = await partRepository.insert(tx, input);
        return persisted.part.id;
      },
    );
    return withPart(result, persisted.part);
  };

  const updatePart = async (
    id: number,
    changes: Partial<PartInput>,
    attribution: SaveAttribution = {},
  ): Promise<PartSaveResult> => {
    const existing = await partRepository.findById(db, id);
    if (!existing) {
      throw new NotFoundError('Part', String(id));
    }

    const next = applyPartChanges(existing, changes);
    const persisted: { part?: Part } = {};
    const result = await revisions.recordSave(
      {
        entityId: id,
        before: toPartSnapshot(existing),
        after: toPartSnapshot(next),
        ...attribution,
      },
      async (tx) => {
        persisted.part = await partRepository.update(tx, id, next);
        return id;
      },
    );
    return withPart(result, persisted.part);
  };

  return {
    revisions,
    createPart,
    updatePart,
    getHistory: (id) => revisions.getHistory(id),
  };
};
