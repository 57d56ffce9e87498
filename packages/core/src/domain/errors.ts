/**
 * Error taxonomy of the revision log
 *
 * - {@link ValidationError}: bad snapshot or schema input, raised before any write
 * - {@link PersistenceError}: the store could not complete an append or a query
 * - {@link NotFoundError}: the owning entity does not exist (only when the store checks it)
 */

/** Single validation failure */
export interface ValidationIssue {
  /** Field that failed validation */
  field: string;
  /** Human-readable error message */
  message: string;
}

/** Storage operation that failed */
export type PersistenceOperation = 'append' | 'list' | 'transaction';

/** Base class of every error raised by the revision log */
export class RevisionLogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RevisionLogError';
  }
}

export class ValidationError extends RevisionLogError {
  constructor(public readonly issues: readonly ValidationIssue[]) {
    super(`Validation failed: ${issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')}`);
    this.name = 'ValidationError';
  }

  /** Shorthand for a single-issue error */
  static forField(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }
}

export class PersistenceError extends RevisionLogError {
  constructor(
    public readonly operation: PersistenceOperation,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${operation}] ${message}`, options);
    this.name = 'PersistenceError';
  }
}

export class NotFoundError extends RevisionLogError {
  constructor(
    public readonly entityType: string,
    public readonly entityId: string,
  ) {
    super(`${entityType} "${entityId}" does not exist`);
    this.name = 'NotFoundError';
  }
}

/**
 * Normalizes any thrown value to an Error instance
 *
 * @remarks
 * Handles cases where non-Error values are thrown (strings, objects, etc.)
 */
export const normalizeError = (thrownValue: unknown): Error => {
  if (thrownValue instanceof Error) {
    return thrownValue;
  }
  return new Error(String(thrownValue));
};

/**
 * Wraps a storage failure in a {@link PersistenceError}
 *
 * Errors that already belong to the taxonomy pass through unchanged.
 */
export const toPersistenceError = (operation: PersistenceOperation, thrownValue: unknown): RevisionLogError => {
  if (thrownValue instanceof RevisionLogError) {
    return thrownValue;
  }
  const error = normalizeError(thrownValue);
  return new PersistenceError(operation, error.message, { cause: error });
};
