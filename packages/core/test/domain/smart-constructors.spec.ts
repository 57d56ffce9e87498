import { assertChangeRecord, type ChangeRecordInput, createChangeRecord, ValidationError } from '../../src/index.js';
import { describe, expect, it } from 'vitest';

const validInput = (overrides: Partial<ChangeRecordInput> = {}): ChangeRecordInput => ({
  id: 7,
  entityId: '42',
  fieldName: 'weight_g',
  oldValue: '45.7',
  newValue: '46.0',
  changeKind: 'UPDATED',
  category: 'value',
  changedAt: new Date('2026-01-26T09:15:00Z'),
  changedBy: 'estimator-1',
  notes: null,
  batchId: 'batch-1',
  ...overrides,
});

describe('createChangeRecord', () => {
  it('should build a frozen record from valid input', () => {
    const result = createChangeRecord(validInput());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.id).toBe(7);
      expect(result.value.entityId).toBe('42');
      expect(result.value.changedBy).toBe('estimator-1');
      expect(Object.isFrozen(result.value)).toBe(true);
    }
  });

  it('should copy the timestamp', () => {
    const changedAt = new Date('2026-01-26T09:15:00Z');
    const result = createChangeRecord(validInput({ changedAt }));

    changedAt.setUTCFullYear(2000);

    expect(result.success && result.value.changedAt.toISOString()).toBe('2026-01-26T09:15:00.000Z');
  });

  it('should reject no-op changes', () => {
    const result = createChangeRecord(validInput({ oldValue: '46.0', newValue: '46.0' }));

    expect(result).toEqual({
      success: false,
      errors: [{ field: 'newValue', message: 'newValue must differ from oldValue' }],
    });
  });

  it('should reject a CREATED record with an old value', () => {
    const result = createChangeRecord(validInput({ changeKind: 'CREATED' }));

    expect(result).toEqual({
      success: false,
      errors: [{ field: 'changeKind', message: 'CREATED records cannot carry an oldValue' }],
    });
  });

  it('should reject an UPDATED record without an old value', () => {
    const result = createChangeRecord(validInput({ oldValue: null }));

    expect(result).toEqual({
      success: false,
      errors: [{ field: 'changeKind', message: 'UPDATED records require an oldValue' }],
    });
  });

  it('should collect every error', () => {
    const result = createChangeRecord(
      validInput({ id: 0, changedBy: '', fieldName: '', changedAt: new Date('invalid') }),
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((error) => error.field)).toEqual(['id', 'changedBy', 'fieldName', 'changedAt']);
    }
  });
});

describe('assertChangeRecord', () => {
  it('should throw a ValidationError carrying the issues', () => {
    expect(() => assertChangeRecord(validInput({ batchId: ' ' }))).toThrow(ValidationError);
    expect(() => assertChangeRecord(validInput({ batchId: ' ' }))).toThrow(
      'Validation failed: batchId: batchId cannot be empty',
    );
  });
});
