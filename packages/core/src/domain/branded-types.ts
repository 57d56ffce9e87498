/**
 * Branded Types Module - Type-safe ID wrappers with validation
 */

/**
 * Branded type utility
 *
 * @template T - Underlying primitive type (e.g., string, number)
 * @template TBrand - Brand identifier (e.g., 'ActorId', 'EntityId')
 *
 * @example
 * ```typescript
 * type PartId = Brand<string, 'PartId'>;
 * type RfqId = Brand<string, 'RfqId'>;
 *
 * const partId: PartId = 'part-12' as PartId;
 * const rfqId: RfqId = partId; // ❌ Type error
 * ```
 */
type Brand<T, TBrand> = T & { readonly __brand: TBrand };

/** Identity of the user or session a change is attributed to */
export type ActorId = Brand<string, 'ActorId'>;
/** Identifier of the tracked business record */
export type EntityId = Brand<string, 'EntityId'>;
/** Storage-assigned identifier of a change record, increasing in insertion order */
export type RevisionId = Brand<number, 'RevisionId'>;

/** Validation error thrown when ID creation fails */
export class IdValidationError extends Error {
  constructor(
    public readonly idType: string,
    public readonly value: string,
    message: string,
  ) {
    super(`[${idType}] ${message}: received "${value}"`);
    this.name = 'IdValidationError';
  }
}

/** @internal */
const isNonEmptyString = (value: string): boolean => {
  return value.trim() !== '';
};

/** @internal */
const validateNonEmptyString = (id: string, idType: string): void => {
  if (!id || !isNonEmptyString(id)) {
    throw new IdValidationError(idType, id, `${idType} cannot be empty or whitespace-only`);
  }
};

/**
 * Creates a validated ActorId
 *
 * @throws {IdValidationError} If id is empty or contains only whitespace
 *
 * @example
 * ```typescript
 * const actorId = createActorId('estimator-1');
 * createActorId(''); // ❌ Throws IdValidationError
 * ```
 */
export const createActorId = (id: string): ActorId => {
  validateNonEmptyString(id, 'ActorId');
  return id as ActorId;
};

/**
 * Creates a validated EntityId
 *
 * Numeric primary keys are accepted and rendered in decimal.
 */
export const createEntityId = (id: string | number): EntityId => {
  const value = typeof id === 'number' ? String(id) : id;
  validateNonEmptyString(value, 'EntityId');
  return value as EntityId;
};

/** Creates a validated RevisionId (positive safe integer) */
export const createRevisionId = (id: number): RevisionId => {
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new IdValidationError('RevisionId', String(id), 'RevisionId must be a positive integer');
  }
  return id as RevisionId;
};

/** Type guard for ActorId */
export const isActorId = (value: unknown): value is ActorId => {
  return typeof value === 'string' && isNonEmptyString(value);
};
/** Type guard for EntityId */
export const isEntityId = (value: unknown): value is EntityId => {
  return typeof value === 'string' && isNonEmptyString(value);
};

/**
 * Unwraps a branded string ID to its underlying value
 *
 * @example
 * ```typescript
 * await db.select().from(parts).where(eq(parts.id, Number(unwrapId(entityId))));
 * ```
 */
export const unwrapId = (id: ActorId | EntityId): string => {
  return id as string;
};
