/**
 * Error handling utilities for revision logging
 *
 * @module error-handler
 *
 * @remarks
 * Errors are never swallowed: the save hook and history query always rethrow. An optional
 * handler is told about the failure first (monitoring, user notification).
 *
 * @example
 * ```typescript
 * const revisions = createRevisionService({
 *   store,
 *   transactions,
 *   schema: PART_FIELD_SCHEMA,
 *   onError: ({ phase, entityId, error }) => monitoring.captureError(error, { phase, entityId }),
 * });
 * ```
 */

import { normalizeError, type PersistenceOperation, toPersistenceError } from '../domain/errors.js';

export type RevisionErrorPhase = 'diff' | 'append' | 'list';

/**
 * Context information for revision error handling
 */
export interface RevisionErrorContext {
  phase: RevisionErrorPhase;
  /** Entity being saved or queried; null when a new record failed before it got an id */
  entityId: string | null;
  error: Error;
}

/**
 * Revision error handler callback
 *
 * @remarks
 * Runs before the error propagates. A failing handler is logged and does not replace the
 * original error.
 */
export type RevisionErrorHandler = (context: RevisionErrorContext) => void | Promise<void>;

/**
 * Safely executes a custom error handler
 */
export const notifyErrorHandler = async (
  handler: RevisionErrorHandler | undefined,
  context: RevisionErrorContext,
): Promise<void> => {
  if (!handler) {
    return;
  }
  try {
    await handler(context);
  } catch (handlerError) {
    console.error(
      '[revision-log] Error in custom error handler:',
      handlerError instanceof Error ? handlerError.message : String(handlerError),
    );
  }
};

/**
 * Runs a storage call, reporting failures as {@link PersistenceError}
 *
 * @example
 * ```typescript
 * const rows = await withPersistenceErrors('list', () =>
 *   db.select().from(partRevisions).where(eq(partRevisions.entityId, entityId)),
 * );
 * ```
 */
export const withPersistenceErrors = async <T>(operation: PersistenceOperation, fn: () => Promise<T>): Promise<T> => {
  try {
    return await fn();
  } catch (thrownValue: unknown) {
    throw toPersistenceError(operation, thrownValue);
  }
};

/**
 * Reports a failure to the handler and rethrows it
 */
export const reportAndRethrow = async (
  handler: RevisionErrorHandler | undefined,
  phase: RevisionErrorPhase,
  entityId: string | null,
  thrownValue: unknown,
): Promise<never> => {
  const error = normalizeError(thrownValue);
  await notifyErrorHandler(handler, { phase, entityId, error });
  throw error;
};
