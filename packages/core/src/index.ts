/** @revision-log/core - Framework-agnostic field-level revision log */

// Constants
export type { ChangeCategory, ChangeKind } from './constants.js';
export { ABSENT, CHANGE_CATEGORY, CHANGE_KIND, DEFAULTS } from './constants.js';
// Context Provider
export { createAsyncLocalStorageProvider } from './context-provider.js';
// Diff Engine
export type { DiffEngine } from './diff/diff-engine.js';
export { computeChanges, createDiffEngine } from './diff/diff-engine.js';
// Domain - Branded Types
export type { ActorId, EntityId, RevisionId } from './domain/branded-types.js';
export {
  createActorId,
  createEntityId,
  createRevisionId,
  IdValidationError,
  isActorId,
  isEntityId,
  unwrapId,
} from './domain/branded-types.js';
// Domain - Change Records
export type { ChangeDraft, ChangeRecord, ChangeRecordInput, Snapshot } from './domain/change-record.js';
// Domain - Errors
export type { PersistenceOperation, ValidationIssue } from './domain/errors.js';
export {
  NotFoundError,
  normalizeError,
  PersistenceError,
  RevisionLogError,
  toPersistenceError,
  ValidationError,
} from './domain/errors.js';
// Domain - Smart Constructors
export type { Result } from './domain/smart-constructors.js';
export { assertChangeRecord, createChangeRecord, failure, success } from './domain/smart-constructors.js';
// Schema
export type { FieldDefinition, FieldSchema, FieldSpec } from './schema/field-schema.js';
export {
  defineFieldSchema,
  fieldLabel,
  formatFieldValue,
  getFieldDefinition,
  serializeFieldValue,
  truncateFieldValue,
} from './schema/field-schema.js';
export {
  DATA_SOURCES,
  DEGATE_OPTIONS,
  EOAT_TYPES,
  GEOMETRY_MODES,
  PART_FIELD_SCHEMA,
  SURFACE_FINISHES,
} from './schema/part-schema.js';
export type { NumericOptions, Serializer, SerializerKind } from './schema/serializers.js';
export { boolean, decimal, enumeration, formatDecimal, integer, reference, text, timestamp } from './schema/serializers.js';
// Service
export type {
  EntityKey,
  PersistFn,
  RevisionService,
  RevisionServiceOptions,
  SaveInput,
  SaveResult,
} from './service/revision-service.js';
export { createRevisionService } from './service/revision-service.js';
// Store
export type { PreparedBatch, PreparedRevision } from './store/batch.js';
export { prepareBatch, resolveBatchTimestamp } from './store/batch.js';
export type {
  AppendOptions,
  RevisionStore,
  RevisionTransactionContext,
  RevisionTransactionRunner,
} from './store/interfaces.js';
export { compareChangeRecords, sortChangeRecords } from './store/ordering.js';
// Tree
export type {
  ActorGroup,
  DateGroup,
  DateSummary,
  RevisionTree,
  RevisionTreeBuilder,
  RevisionTreeOptions,
} from './tree/revision-tree.js';
export {
  buildRevisionTree,
  createRevisionTreeBuilder,
  flattenRevisionTree,
  summarizeRevisionTree,
} from './tree/revision-tree.js';
// Types
export type { RevisionActor, RevisionContext, RevisionContextProvider } from './types.js';
// Utils - Debug
export { coreLog, storeLog, treeLog } from './utils/debug.js';
// Utils - Error Handler
export type { RevisionErrorContext, RevisionErrorHandler, RevisionErrorPhase } from './utils/error-handler.js';
export { notifyErrorHandler, reportAndRethrow, withPersistenceErrors } from './utils/error-handler.js';
