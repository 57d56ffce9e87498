/**
 * Diff engine: field-level changes between two snapshots of a record
 *
 * @module diff-engine
 *
 * @remarks
 * Pure function of the schema and the two snapshots. Identity, actor and timestamp are
 * assigned later by the store, so the output can be tested without any storage.
 *
 * - New record (`before === null`): one `CREATED` draft per field whose new value is set.
 * - Existing record: one `UPDATED` draft per field whose canonical value differs.
 * - Values are compared in full and cut to the field's maxLength only in the draft. When both
 *   sides of a change cut to the same prefix, the draft keeps them whole.
 * - Output follows schema order, never the key order of the snapshots.
 *
 * @example
 * ```typescript
 * const diff = createDiffEngine(PART_FIELD_SCHEMA);
 *
 * diff({ name: 'Housing', volume_cm3: 45.5 }, { name: 'Housing', volume_cm3: 50 });
 * // => [{ fieldName: 'volume_cm3', oldValue: '45.5', newValue: '50.0', changeKind: 'UPDATED', ... }]
 * ```
 */

import { ABSENT, CHANGE_KIND } from '../constants.js';
import type { ChangeDraft, Snapshot } from '../domain/change-record.js';
import { ValidationError, type ValidationIssue } from '../domain/errors.js';
import type { FieldDefinition, FieldSchema } from '../schema/field-schema.js';
import { serializeFieldValue, truncateFieldValue } from '../schema/field-schema.js';

export type DiffEngine = (before: Snapshot | null, after: Snapshot) => ChangeDraft[];

/** Serialized values of one snapshot, in schema order */
type SerializedSnapshot = Map<string, string>;

const hasValue = (snapshot: Snapshot, fieldName: string): boolean =>
  Object.hasOwn(snapshot, fieldName) && snapshot[fieldName] !== undefined;

const collectMissingRequired = (schema: FieldSchema, after: Snapshot, issues: ValidationIssue[]): void => {
  for (const field of schema) {
    if (field.required && !hasValue(after, field.name)) {
      issues.push({ field: field.name, message: 'required field is missing from the new snapshot' });
    }
  }
};

const serializeSnapshot = (
  schema: FieldSchema,
  snapshot: Snapshot,
  issues: ValidationIssue[],
): SerializedSnapshot => {
  const serialized: SerializedSnapshot = new Map();

  for (const field of schema) {
    try {
      serialized.set(field.name, serializeFieldValue(field, snapshot[field.name]));
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      issues.push(...error.issues);
    }
  }

  return serialized;
};

const createdDraft = (field: FieldDefinition, newValue: string): ChangeDraft =>
  Object.freeze({
    fieldName: field.name,
    oldValue: ABSENT,
    newValue: truncateFieldValue(field, newValue),
    changeKind: CHANGE_KIND.CREATED,
    category: field.category,
  });

const updatedDraft = (field: FieldDefinition, oldValue: string, newValue: string): ChangeDraft => {
  const storedOld = truncateFieldValue(field, oldValue);
  const storedNew = truncateFieldValue(field, newValue);
  const keepWhole = storedOld === storedNew;

  return Object.freeze({
    fieldName: field.name,
    oldValue: keepWhole ? oldValue : storedOld,
    newValue: keepWhole ? newValue : storedNew,
    changeKind: CHANGE_KIND.UPDATED,
    category: field.category,
  });
};

/**
 * Computes the change drafts between two snapshots
 *
 * @param before - Snapshot before the save, or `null` for a record that is being created
 * @param after - Snapshot being saved
 * @throws {ValidationError} When a required field is missing or a value fails its serializer;
 * nothing is returned in that case
 */
export const computeChanges = (schema: FieldSchema, before: Snapshot | null, after: Snapshot): ChangeDraft[] => {
  const issues: ValidationIssue[] = [];

  collectMissingRequired(schema, after, issues);
  const next = serializeSnapshot(schema, after, issues);
  const previous = before === null ? null : serializeSnapshot(schema, before, issues);

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  const drafts: ChangeDraft[] = [];

  for (const field of schema) {
    const newValue = next.get(field.name) ?? '';

    if (previous === null) {
      if (!field.serializer.isEmpty(after[field.name]) && newValue !== '') {
        drafts.push(createdDraft(field, newValue));
      }
      continue;
    }

    const oldValue = previous.get(field.name) ?? '';
    if (oldValue !== newValue) {
      drafts.push(updatedDraft(field, oldValue, newValue));
    }
  }

  return drafts;
};

/**
 * Creates a diff engine bound to a schema
 *
 * @example
 * ```typescript
 * const diff = createDiffEngine(PART_FIELD_SCHEMA);
 * const drafts = diff(null, { name: 'Widget', volume_cm3: 50 });
 * ```
 */
export const createDiffEngine = (schema: FieldSchema): DiffEngine => {
  return (before, after) => computeChanges(schema, before, after);
};
