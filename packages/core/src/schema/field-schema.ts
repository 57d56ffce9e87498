/**
 * Field schema: the single source of truth for which fields are tracked and how they render
 *
 * @module field-schema
 *
 * @remarks
 * A schema is an ordered, frozen list of field definitions. The diff engine walks it in order,
 * and history renderers use it to label and format stored values.
 *
 * @example
 * ```typescript
 * const schema = defineFieldSchema([
 *   { name: 'name', serializer: text(), required: true },
 *   { name: 'volume_cm3', label: 'Volume (cm³)', serializer: decimal(), category: 'geometry' },
 *   { name: 'material_id', serializer: reference() },
 * ]);
 * ```
 */

import type { ChangeCategory } from '../constants.js';
import { ABSENT, CHANGE_CATEGORY, DEFAULTS } from '../constants.js';
import { ValidationError, type ValidationIssue } from '../domain/errors.js';
import type { Serializer } from './serializers.js';

/** Resolved field definition */
export interface FieldDefinition {
  readonly name: string;
  readonly label: string;
  readonly serializer: Serializer;
  /** The new snapshot of a save must carry this field */
  readonly required: boolean;
  readonly category: ChangeCategory;
  /** Stored values are cut to this many characters; comparison uses the full value */
  readonly maxLength: number;
}

/** Field declaration accepted by {@link defineFieldSchema} */
export interface FieldSpec {
  name: string;
  serializer: Serializer;
  label?: string;
  required?: boolean;
  category?: ChangeCategory;
  maxLength?: number;
}

export type FieldSchema = readonly FieldDefinition[];

const collectSpecIssues = (fields: readonly FieldSpec[]): ValidationIssue[] => {
  const issues: ValidationIssue[] = [];
  const seen = new Set<string>();

  for (const field of fields) {
    if (field.name.trim() === '') {
      issues.push({ field: '(unnamed)', message: 'field name cannot be empty' });
      continue;
    }
    if (seen.has(field.name)) {
      issues.push({ field: field.name, message: 'field is declared more than once' });
    }
    seen.add(field.name);

    if (field.maxLength !== undefined && (!Number.isSafeInteger(field.maxLength) || field.maxLength <= 0)) {
      issues.push({ field: field.name, message: 'maxLength must be a positive integer' });
    }
  }

  return issues;
};

/**
 * Builds a frozen, ordered field schema
 *
 * @throws {ValidationError} On empty or duplicate field names, or an invalid maxLength
 */
export const defineFieldSchema = (fields: readonly FieldSpec[]): FieldSchema => {
  const issues = collectSpecIssues(fields);
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  return Object.freeze(
    fields.map(
      (field): FieldDefinition =>
        Object.freeze({
          name: field.name,
          label: field.label ?? field.name,
          serializer: field.serializer,
          required: field.required ?? false,
          category: field.category ?? CHANGE_CATEGORY.VALUE,
          maxLength: field.maxLength ?? DEFAULTS.MAX_VALUE_LENGTH,
        }),
    ),
  );
};

export const getFieldDefinition = (schema: FieldSchema, fieldName: string): FieldDefinition | undefined =>
  schema.find((field) => field.name === fieldName);

/**
 * Serializes a value into its canonical string, the form changes are detected on
 *
 * @throws {ValidationError} When the serializer rejects the value
 */
export const serializeFieldValue = (field: FieldDefinition, value: unknown): string =>
  field.serializer.serialize(value, field.name);

/** Cuts a canonical value to the field's maxLength for storage */
export const truncateFieldValue = (field: FieldDefinition, serialized: string): string =>
  serialized.length > field.maxLength ? serialized.slice(0, field.maxLength) : serialized;

/** Display label of a field; unknown names render as-is */
export const fieldLabel = (schema: FieldSchema, fieldName: string): string =>
  getFieldDefinition(schema, fieldName)?.label ?? fieldName;

/**
 * Formats a stored value for display
 *
 * Absent and empty values render as {@link DEFAULTS.EMPTY_DISPLAY}; booleans read as Yes/No.
 *
 * @example
 * ```typescript
 * formatFieldValue(PART_FIELD_SCHEMA, 'assembly', 'true'); // => 'Yes'
 * formatFieldValue(PART_FIELD_SCHEMA, 'weight_g', null);   // => '-'
 * ```
 */
export const formatFieldValue = (schema: FieldSchema, fieldName: string, stored: string | null): string => {
  if (stored === ABSENT || stored === '') {
    return DEFAULTS.EMPTY_DISPLAY;
  }
  if (getFieldDefinition(schema, fieldName)?.serializer.kind === 'boolean') {
    return stored === 'true' ? 'Yes' : 'No';
  }
  return stored;
};
