/** @revision-log/drizzle - drizzle-orm adapter for the revision log */

export type { PartInput, PartRepository } from './part-repository.js';
export { applyPartChanges, createPartRepository, toPartSnapshot } from './part-repository.js';
export type {
  PartRevisionLog,
  PartRevisionLogOptions,
  PartSaveResult,
  SaveAttribution,
} from './part-revision-log.js';
export { createPartRevisionLog } from './part-revision-log.js';
export type { DrizzleRevisionStoreOptions } from './revision-store.js';
export { createDrizzleRevisionStore } from './revision-store.js';
export { createDrizzleTransactionRunner } from './transaction-runner.js';
