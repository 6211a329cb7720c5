import { describe, it, expect } from 'vitest';
import { RecordFields } from '../../../src/domain/services/RecordFields.js';
import { FilteredRow } from '../../../src/domain/model/FilteredRow.js';

function fieldsOf(values: Record<string, string>): RecordFields {
  const columns = Object.keys(values);
  const slots = new Map(columns.map((column, slot): [string, number] => [column, slot]));
  return new RecordFields(new FilteredRow(slots, Object.values(values)));
}

describe('RecordFields', () => {
  describe('integer()', () => {
    it('should parse trimmed integers', () => {
      const fields = fieldsOf({ n: ' 42 ', m: '-7' });

      expect(fields.integer('n')).toBe(42);
      expect(fields.integer('m')).toBe(-7);
      expect(fields.valid).toBe(true);
    });

    it('should record a malformed number and return the fallback', () => {
      const fields = fieldsOf({ n: '4.2' });

      expect(fields.integer('n', { fallback: -1 })).toBe(-1);
      expect(fields.valid).toBe(false);
      expect(fields.failures).toEqual([
        { field: 'n', code: 'MALFORMED_NUMBER', message: "Expected an integer for 'n'", value: '4.2' },
      ]);
    });

    it('should enforce bounds', () => {
      const fields = fieldsOf({ n: '-1' });

      expect(fields.integer('n', { min: 0 })).toBe(0);
      expect(fields.failures).toEqual([
        { field: 'n', code: 'OUT_OF_RANGE', message: "'n' is outside [0, ∞]", value: '-1' },
      ]);
    });
    it('should reject integers that cannot be represented exactly', () => {
      const fields = fieldsOf({ big: '12345678901234567891', edge: '9007199254740991' });

      expect(fields.integer('edge')).toBe(9007199254740991);
      expect(fields.integer('big', { fallback: -1 })).toBe(-1);
      expect(fields.failures).toEqual([
        {
          field: 'big',
          code: 'OUT_OF_RANGE',
          message: "'big' is beyond the safe integer range",
          value: '12345678901234567891',
        },
      ]);
    });
  });

  describe('decimal()', () => {
    it('should parse decimal and exponent notation', () => {
      const fields = fieldsOf({ a: '1e3', b: '-.5', c: '12.', d: '+3.25' });

      expect(fields.decimal('a')).toBe(1000);
      expect(fields.decimal('b')).toBe(-0.5);
      expect(fields.decimal('c')).toBe(12);
      expect(fields.decimal('d')).toBe(3.25);
      expect(fields.valid).toBe(true);
    });

    it('should reject text, thousands separators and overflow', () => {
      const fields = fieldsOf({ a: 'abc', b: '1,000', c: '1e999' });

      fields.decimal('a');
      fields.decimal('b');
      fields.decimal('c');

      expect(fields.failures.map((f) => f.code)).toEqual(['MALFORMED_NUMBER', 'MALFORMED_NUMBER', 'MALFORMED_NUMBER']);
      expect(fields.failures.map((f) => f.field)).toEqual(['a', 'b', 'c']);
    });
  });

  describe('empty values', () => {
    it('should return the fallback without a failure when optional', () => {
      const fields = fieldsOf({ n: '  ', t: '' });

      expect(fields.integer('n', { fallback: 5 })).toBe(5);
      expect(fields.text('t', { fallback: 'none' })).toBe('none');
      expect(fields.valid).toBe(true);
    });

    it('should record MISSING when required', () => {
      const fields = fieldsOf({ n: '' });

      expect(fields.decimal('n', { required: true })).toBe(0);
      expect(fields.failures).toEqual([
        { field: 'n', code: 'MISSING', message: "Required field 'n' is empty", value: '' },
      ]);
    });
  });

  describe('text()', () => {
    it('should trim and check the pattern', () => {
      const fields = fieldsOf({ code: ' AB-1 ', other: 'xyz' });

      expect(fields.text('code', { pattern: /^[A-Z]+-\d$/ })).toBe('AB-1');
      expect(fields.text('other', { pattern: /^\d+$/ })).toBe('');
      expect(fields.failures).toEqual([
        { field: 'other', code: 'INVALID_VALUE', message: "'other' does not match /^\\d+$/", value: 'xyz' },
      ]);
    });

    it('should expose the untrimmed raw value', () => {
      expect(fieldsOf({ a: ' x ' }).raw('a')).toBe(' x ');
    });
  });

  describe('date()', () => {
    it('should parse ISO dates', () => {
      const fields = fieldsOf({ d: '2024-03-01T12:00:00Z' });

      expect(fields.date('d')).toEqual(new Date(Date.UTC(2024, 2, 1, 12)));
    });

    it('should record a malformed date and return null', () => {
      const fields = fieldsOf({ d: 'yesterday-ish' });

      expect(fields.date('d')).toBeNull();
      expect(fields.failures[0]?.code).toBe('MALFORMED_DATE');
    });
  });

  describe('oneOf()', () => {
    it('should return the declared spelling when ignoring case', () => {
      const fields = fieldsOf({ s: 'OPEN' });

      expect(fields.oneOf('s', ['open', 'closed'], { ignoreCase: true })).toBe('open');
      expect(fields.valid).toBe(true);
    });

    it('should record values outside the allowed set', () => {
      const fields = fieldsOf({ s: 'OPEN' });

      expect(fields.oneOf('s', ['open', 'closed'])).toBeNull();
      expect(fields.failures).toEqual([
        { field: 's', code: 'INVALID_VALUE', message: "'s' must be one of: open, closed", value: 'OPEN' },
      ]);
    });
  });

  it('should accept failures from the reader itself', () => {
    const fields = fieldsOf({ a: '1' });

    fields.fail('a', 'OUT_OF_RANGE', 'too small', '1');

    expect(fields.valid).toBe(false);
    expect(fields.failures).toEqual([{ field: 'a', code: 'OUT_OF_RANGE', message: 'too small', value: '1' }]);
  });
});
