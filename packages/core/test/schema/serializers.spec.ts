import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../src/domain/errors.js';
import {
  boolean,
  decimal,
  enumeration,
  formatDecimal,
  integer,
  reference,
  text,
  timestamp,
} from '../../src/schema/serializers.js';

describe('formatDecimal', () => {
  it.each([
    [100, '100.0'],
    [50, '50.0'],
    [45.5, '45.5'],
    [0.1 + 0.2, '0.3'],
    [-0, '0.0'],
    [-2.25, '-2.25'],
    [0.905, '0.905'],
  ])('should render %s as %s', (value, expected) => {
    expect(formatDecimal(value)).toBe(expected);
  });

  it('should render the same value identically every time', () => {
    expect(formatDecimal(45.7)).toBe(formatDecimal(45.7));
  });
});

describe('decimal', () => {
  it('should render empty values as empty string', () => {
    expect(decimal().serialize(null, 'weight_g')).toBe('');
    expect(decimal().serialize(undefined, 'weight_g')).toBe('');
  });

  it('should keep zero unless zeroIsEmpty is set', () => {
    expect(decimal().serialize(0, 'weight_g')).toBe('0.0');
    expect(decimal().isEmpty(0)).toBe(false);
    expect(decimal({ zeroIsEmpty: true }).serialize(0, 'weight_g')).toBe('');
    expect(decimal({ zeroIsEmpty: true }).isEmpty(0)).toBe(true);
  });

  it('should reject non-numbers and non-finite numbers', () => {
    expect(() => decimal().serialize('12', 'weight_g')).toThrow(ValidationError);
    expect(() => decimal().serialize(Number.POSITIVE_INFINITY, 'weight_g')).toThrow(
      'Validation failed: weight_g: expected a finite number, received number',
    );
  });
});

describe('integer', () => {
  it('should render integers', () => {
    expect(integer().serialize(10000, 'parts_over_runtime')).toBe('10000');
  });

  it('should reject fractions', () => {
    expect(() => integer().serialize(1.5, 'parts_over_runtime')).toThrow(
      'Validation failed: parts_over_runtime: expected an integer, received number',
    );
  });
});

describe('boolean', () => {
  it('should render both values', () => {
    expect(boolean().serialize(true, 'assembly')).toBe('true');
    expect(boolean().serialize(false, 'assembly')).toBe('false');
  });

  it('should treat false as set', () => {
    expect(boolean().isEmpty(false)).toBe(false);
    expect(boolean().isEmpty(null)).toBe(true);
  });

  it('should reject truthy non-booleans', () => {
    expect(() => boolean().serialize(1, 'assembly')).toThrow(
      'Validation failed: assembly: expected a boolean, received number',
    );
  });
});

describe('enumeration', () => {
  const degate = enumeration(['yes', 'no', 'maybe']);

  it('should accept listed values', () => {
    expect(degate.serialize('maybe', 'degate')).toBe('maybe');
  });

  it('should reject other values', () => {
    expect(() => degate.serialize('sometimes', 'degate')).toThrow(
      'Validation failed: degate: expected one of yes, no, maybe, received "sometimes"',
    );
  });

  it('should treat the empty string as empty', () => {
    expect(degate.serialize('', 'degate')).toBe('');
    expect(degate.isEmpty('')).toBe(true);
  });
});

describe('text', () => {
  it('should trim', () => {
    expect(text().serialize('  Widget ', 'name')).toBe('Widget');
  });

  it('should treat blank strings as empty', () => {
    expect(text().isEmpty('   ')).toBe(true);
    expect(text().isEmpty('x')).toBe(false);
  });

  it('should reject non-strings', () => {
    expect(() => text().serialize(5, 'name')).toThrow('Validation failed: name: expected a string, received number');
  });
});

describe('reference', () => {
  it('should accept numeric and string ids', () => {
    expect(reference().serialize(3, 'material_id')).toBe('3');
    expect(reference().serialize('mat-3', 'material_id')).toBe('mat-3');
  });

  it('should reject other values', () => {
    expect(() => reference().serialize(true, 'material_id')).toThrow(
      'Validation failed: material_id: expected an id, received boolean',
    );
  });
});

describe('timestamp', () => {
  it('should render ISO strings', () => {
    expect(timestamp().serialize(new Date('2026-01-25T08:00:00Z'), 'image_updated_date')).toBe(
      '2026-01-25T08:00:00.000Z',
    );
  });

  it('should reject invalid dates', () => {
    expect(() => timestamp().serialize(new Date('nope'), 'image_updated_date')).toThrow(
      'Validation failed: image_updated_date: expected a valid Date, received Date',
    );
  });
});
