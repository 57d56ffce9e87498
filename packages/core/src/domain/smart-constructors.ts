/**
 * Smart Constructors Module - Validated object creation with Result pattern
 *
 * Validates input data and returns Result types instead of throwing exceptions.
 * Storage adapters use it to turn database rows back into {@link ChangeRecord}s.
 */

import { ABSENT, CHANGE_KIND } from '../constants.js';
import type { ActorId, EntityId, RevisionId } from './branded-types.js';
import { createActorId, createEntityId, createRevisionId } from './branded-types.js';
import type { ChangeRecord, ChangeRecordInput } from './change-record.js';
import { ValidationError, type ValidationIssue } from './errors.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Result type for operations that can fail
 *
 * Discriminated union type representing success or failure, following Railway Oriented Programming pattern.
 *
 * @template T - Type of the successful value
 * @template E - Type of error (defaults to ValidationIssue)
 *
 * @example
 * ```typescript
 * const result = createChangeRecord(row);
 * if (result.success) {
 *   console.log(result.value);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */
export type Result<T, E = ValidationIssue> = { success: true; value: T } | { success: false; errors: E[] };

/** Creates a successful Result */
export const success = <T>(value: T): Result<T, never> => ({
  success: true,
  value,
});

/** Creates a failed Result */
export const failure = <E = ValidationIssue>(errors: E[]): Result<never, E> => ({
  success: false,
  errors,
});

/** @internal Validates that a string field is non-empty */
const validateNonEmptyStringField = (value: string | undefined, fieldName: string, errors: ValidationIssue[]): void => {
  if (!value || value.trim() === '') {
    errors.push({
      field: fieldName,
      message: `${fieldName} cannot be empty`,
    });
  }
};

/** @internal Validates that a Date field is valid */
const validateDateField = (value: Date | undefined, fieldName: string, errors: ValidationIssue[]): void => {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    errors.push({
      field: fieldName,
      message: `${fieldName} must be a valid Date`,
    });
  }
};

/** @internal Safely creates a branded ID and accumulates errors on failure */
const tryCreateBrandedId = <TInput, T>(
  id: TInput,
  fieldName: string,
  createFn: (id: TInput) => T,
  errors: ValidationIssue[],
): T | undefined => {
  try {
    return createFn(id);
  } catch (error) {
    errors.push({
      field: fieldName,
      message: error instanceof Error ? error.message : `Invalid ${fieldName}`,
    });
    return undefined;
  }
};

/** @internal No-op changes and kind/old-value mismatches are never stored */
const validateChangeShape = (input: ChangeRecordInput, errors: ValidationIssue[]): void => {
  if (input.oldValue === input.newValue) {
    errors.push({ field: 'newValue', message: 'newValue must differ from oldValue' });
  }

  const isCreation = input.changeKind === CHANGE_KIND.CREATED;
  if (isCreation !== (input.oldValue === ABSENT)) {
    errors.push({
      field: 'changeKind',
      message: isCreation ? 'CREATED records cannot carry an oldValue' : 'UPDATED records require an oldValue',
    });
  }
};

/**
 * Creates a validated, frozen ChangeRecord with Branded IDs
 *
 * Collects all validation errors and returns them together.
 *
 * @example
 * ```typescript
 * const result = createChangeRecord({
 *   id: 7,
 *   entityId: '42',
 *   fieldName: 'weight_g',
 *   oldValue: '45.7',
 *   newValue: '46.0',
 *   changeKind: 'UPDATED',
 *   category: 'value',
 *   changedAt: new Date(),
 *   changedBy: 'estimator-1',
 *   notes: null,
 *   batchId: 'k5w0j8n3b7x2',
 * });
 * ```
 */
export const createChangeRecord = (input: ChangeRecordInput): Result<ChangeRecord> => {
  const validationErrors: ValidationIssue[] = [];

  const id = tryCreateBrandedId(input.id, 'id', createRevisionId, validationErrors);
  const entityId = tryCreateBrandedId(input.entityId, 'entityId', createEntityId, validationErrors);
  const changedBy = tryCreateBrandedId(input.changedBy, 'changedBy', createActorId, validationErrors);

  validateNonEmptyStringField(input.fieldName, 'fieldName', validationErrors);
  validateNonEmptyStringField(input.batchId, 'batchId', validationErrors);
  validateDateField(input.changedAt, 'changedAt', validationErrors);
  validateChangeShape(input, validationErrors);

  if (validationErrors.length > 0) {
    return failure(validationErrors);
  }

  return success(
    Object.freeze({
      id: id as RevisionId,
      entityId: entityId as EntityId,
      fieldName: input.fieldName,
      oldValue: input.oldValue,
      newValue: input.newValue,
      changeKind: input.changeKind,
      category: input.category,
      changedAt: new Date(input.changedAt.getTime()),
      changedBy: changedBy as ActorId,
      notes: input.notes,
      batchId: input.batchId,
    }),
  );
};

/**
 * Throwing variant of {@link createChangeRecord}
 *
 * @throws {ValidationError} With every collected issue
 */
export const assertChangeRecord = (input: ChangeRecordInput): ChangeRecord => {
  const result = createChangeRecord(input);
  if (!result.success) {
    throw new ValidationError(result.errors);
  }
  return result.value;
};
