/**
 * Canonical value serializers
 *
 * @module serializers
 *
 * @remarks
 * Every tracked field renders its typed value into one fixed string form. Diffing compares
 * these strings, so a serializer must return the same string for the same value regardless
 * of locale or float noise. `null` and `undefined` always render as the empty string.
 *
 * @example
 * ```typescript
 * decimal().serialize(100, 'weight_g');        // => '100.0'
 * decimal().serialize(0.1 + 0.2, 'weight_g');  // => '0.3'
 * boolean().serialize(false, 'assembly');      // => 'false'
 * ```
 */

import { DEFAULTS } from '../constants.js';
import { ValidationError } from '../domain/errors.js';

export type SerializerKind = 'decimal' | 'integer' | 'boolean' | 'enum' | 'text' | 'reference' | 'timestamp';

export interface Serializer {
  readonly kind: SerializerKind;
  /**
   * Renders a value in canonical form
   *
   * @throws {ValidationError} When the value has the wrong type for this serializer
   */
  serialize(value: unknown, fieldName: string): string;
  /** Whether the value counts as "not set" when a record is created */
  isEmpty(value: unknown): boolean;
}

export interface NumericOptions {
  /** Treat 0 as unset (form spin boxes hold 0 for an untouched input); 0 then serializes to '' */
  zeroIsEmpty?: boolean;
}

const isNil = (value: unknown): value is null | undefined => value === null || value === undefined;

const describe = (value: unknown): string => {
  if (value instanceof Date) return 'Date';
  if (Array.isArray(value)) return 'array';
  return typeof value;
};

const typeMismatch = (fieldName: string, expected: string, value: unknown): ValidationError =>
  ValidationError.forField(fieldName, `expected ${expected}, received ${describe(value)}`);

/**
 * Fixed-format decimal rendering
 *
 * Rounds to {@link DEFAULTS.DECIMAL_PRECISION} fraction digits, trims trailing zeros and keeps
 * at least one fraction digit so that integral values read as decimals (`50` → `'50.0'`).
 */
export const formatDecimal = (value: number): string => {
  const rounded = Number(value.toFixed(DEFAULTS.DECIMAL_PRECISION));
  const normalized = Object.is(rounded, -0) ? 0 : rounded;
  const text = String(normalized);
  return /[.e]/.test(text) ? text : `${text}.0`;
};

export const decimal = (options: NumericOptions = {}): Serializer => ({
  kind: 'decimal',
  serialize: (value, fieldName) => {
    if (isNil(value)) return '';
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw typeMismatch(fieldName, 'a finite number', value);
    }
    return options.zeroIsEmpty === true && value === 0 ? '' : formatDecimal(value);
  },
  isEmpty: (value) => isNil(value) || (options.zeroIsEmpty === true && value === 0),
});

export const integer = (options: NumericOptions = {}): Serializer => ({
  kind: 'integer',
  serialize: (value, fieldName) => {
    if (isNil(value)) return '';
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
      throw typeMismatch(fieldName, 'an integer', value);
    }
    return options.zeroIsEmpty === true && value === 0 ? '' : String(value);
  },
  isEmpty: (value) => isNil(value) || (options.zeroIsEmpty === true && value === 0),
});

/**
 * Booleans are always considered set: `false` is a value, only a missing value is empty.
 */
export const boolean = (): Serializer => ({
  kind: 'boolean',
  serialize: (value, fieldName) => {
    if (isNil(value)) return '';
    if (typeof value !== 'boolean') {
      throw typeMismatch(fieldName, 'a boolean', value);
    }
    return value ? 'true' : 'false';
  },
  isEmpty: isNil,
});

export const enumeration = <const TValues extends readonly string[]>(values: TValues): Serializer => {
  const allowed = new Set<string>(values);
  return {
    kind: 'enum',
    serialize: (value, fieldName) => {
      if (isNil(value) || value === '') return '';
      if (typeof value !== 'string' || !allowed.has(value)) {
        throw ValidationError.forField(fieldName, `expected one of ${values.join(', ')}, received "${String(value)}"`);
      }
      return value;
    },
    isEmpty: (value) => isNil(value) || value === '',
  };
};

export const text = (): Serializer => ({
  kind: 'text',
  serialize: (value, fieldName) => {
    if (isNil(value)) return '';
    if (typeof value !== 'string') {
      throw typeMismatch(fieldName, 'a string', value);
    }
    return value.trim();
  },
  isEmpty: (value) => isNil(value) || (typeof value === 'string' && value.trim() === ''),
});

/** Identifier of another record (foreign key), numeric or string */
export const reference = (): Serializer => ({
  kind: 'reference',
  serialize: (value, fieldName) => {
    if (isNil(value)) return '';
    if (typeof value === 'number' && Number.isSafeInteger(value)) return String(value);
    if (typeof value === 'string') return value.trim();
    throw typeMismatch(fieldName, 'an id', value);
  },
  isEmpty: (value) => isNil(value) || (typeof value === 'string' && value.trim() === ''),
});

export const timestamp = (): Serializer => ({
  kind: 'timestamp',
  serialize: (value, fieldName) => {
    if (isNil(value)) return '';
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw typeMismatch(fieldName, 'a valid Date', value);
    }
    return value.toISOString();
  },
  isEmpty: isNil,
});
