import type { FilteredRow } from '../model/FilteredRow.js';
import type { FieldConversionCode, FieldConversionFailure } from '../model/FieldConversion.js';

export interface FieldOptions {
  /** An empty value is a `MISSING` failure instead of the fallback. */
  readonly required?: boolean;
}

export interface TextFieldOptions extends FieldOptions {
  /** Default: `''`. */
  readonly fallback?: string;
  /** The trimmed value must match, otherwise `INVALID_VALUE`. */
  readonly pattern?: RegExp;
}

export interface NumberFieldOptions extends FieldOptions {
  /** Default: `0`. */
  readonly fallback?: number;
  readonly min?: number;
  readonly max?: number;
}

export interface ChoiceFieldOptions extends FieldOptions {
  /** Compare ignoring case; the declared spelling is returned. Default: `false`. */
  readonly ignoreCase?: boolean;
}

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Field population helpers handed to `RecordReader.buildRecord`.
 *
 * Every accessor trims the value, converts it, and on failure records a
 * `FieldConversionFailure` and returns a fallback. Nothing here throws for bad
 * data, so one malformed row never stops the stream.
 */
export class RecordFields {
  readonly row: FilteredRow;
  private readonly problems: FieldConversionFailure[] = [];

  constructor(row: FilteredRow) {
    this.row = row;
  }

  get failures(): readonly FieldConversionFailure[] {
    return this.problems;
  }

  get valid(): boolean {
    return this.problems.length === 0;
  }

  /** The untrimmed, unconverted value. */
  raw(column: string): string {
    return this.row.get(column);
  }

  text(column: string, options?: TextFieldOptions): string {
    const raw = this.row.get(column);
    const value = raw.trim();
    const fallback = options?.fallback ?? '';

    if (value === '') return this.absent(column, raw, options, fallback);
    if (options?.pattern && !options.pattern.test(value)) {
      this.fail(column, 'INVALID_VALUE', `'${column}' does not match ${String(options.pattern)}`, raw);
      return fallback;
    }
    return value;
  }

  integer(column: string, options?: NumberFieldOptions): number {
    return this.number(column, INTEGER, 'an integer', options, true);
  }

  decimal(column: string, options?: NumberFieldOptions): number {
    return this.number(column, DECIMAL, 'a number', options, false);
  }

  /** Any format `Date.parse` accepts. Empty or unparseable values yield `null`. */
  date(column: string, options?: FieldOptions): Date | null {
    const raw = this.row.get(column);
    const value = raw.trim();

    if (value === '') return this.absent(column, raw, options, null);
    const time = Date.parse(value);
    if (Number.isNaN(time)) {
      this.fail(column, 'MALFORMED_DATE', `Expected a date for '${column}'`, raw);
      return null;
    }
    return new Date(time);
  }

  oneOf<V extends string>(column: string, allowed: readonly V[], options?: ChoiceFieldOptions): V | null {
    const raw = this.row.get(column);
    const value = raw.trim();

    if (value === '') return this.absent(column, raw, options, null);
    const needle = options?.ignoreCase ? value.toLowerCase() : value;
    const match = allowed.find((candidate) => (options?.ignoreCase ? candidate.toLowerCase() : candidate) === needle);
    if (match === undefined) {
      this.fail(column, 'INVALID_VALUE', `'${column}' must be one of: ${allowed.join(', ')}`, raw);
      return null;
    }
    return match;
  }

  /** Record a failure found by the reader's own checks. */
  fail(field: string, code: FieldConversionCode, message: string, value = ''): void {
    this.problems.push({ field, code, message, value });
  }

  private number(
    column: string,
    pattern: RegExp,
    expected: string,
    options: NumberFieldOptions | undefined,
    integral: boolean,
  ): number {
    const raw = this.row.get(column);
    const value = raw.trim();
    const fallback = options?.fallback ?? 0;

    if (value === '') return this.absent(column, raw, options, fallback);

    const parsed = pattern.test(value) ? Number(value) : Number.NaN;
    if (!Number.isFinite(parsed)) {
      this.fail(column, 'MALFORMED_NUMBER', `Expected ${expected} for '${column}'`, raw);
      return fallback;
    }
    if (integral && !Number.isSafeInteger(parsed)) {
      this.fail(column, 'OUT_OF_RANGE', `'${column}' is beyond the safe integer range`, raw);
      return fallback;
    }

    const min = options?.min;
    const max = options?.max;
    if ((min !== undefined && parsed < min) || (max !== undefined && parsed > max)) {
      this.fail(column, 'OUT_OF_RANGE', `'${column}' is outside ${formatRange(min, max)}`, raw);
      return fallback;
    }
    return parsed;
  }

  private absent<F>(column: string, raw: string, options: FieldOptions | undefined, fallback: F): F {
    if (options?.required) {
      this.fail(column, 'MISSING', `Required field '${column}' is empty`, raw);
    }
    return fallback;
  }
}

function formatRange(min: number | undefined, max: number | undefined): string {
  return `[${min === undefined ? '-∞' : String(min)}, ${max === undefined ? '∞' : String(max)}]`;
}
