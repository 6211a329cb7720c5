/** Machine-readable codes for structural failures that abort an extraction session. */
export type RowsiftErrorCode =
  | 'IO_ERROR'
  | 'EMPTY_STREAM'
  | 'MALFORMED_QUOTING'
  | 'DUPLICATE_HEADER'
  | 'INVALID_CONFIGURATION';

/** Base class for every error the extraction core throws. */
export abstract class RowsiftError extends Error {
  abstract readonly code: RowsiftErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The underlying byte source failed while being read. */
export class IOError extends RowsiftError {
  readonly code = 'IO_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }

  /** Wrap an arbitrary failure, passing an existing `IOError` through untouched. */
  static from(error: unknown): IOError {
    if (error instanceof IOError) return error;
    const detail = error instanceof Error ? error.message : String(error);
    return new IOError(`Failed to read source: ${detail}`, error);
  }
}

/** The stream ended before a header row could be read. */
export class EmptyStreamError extends RowsiftError {
  readonly code = 'EMPTY_STREAM';

  constructor() {
    super('Source is empty: no header row available');
  }
}

/**
 * Quoting that cannot be resolved under strict mode: a byte other than a quote,
 * delimiter or line terminator right after a closing quote, or a quoted field
 * left open at end of stream.
 */
export class MalformedQuotingError extends RowsiftError {
  readonly code = 'MALFORMED_QUOTING';
  /** 1-based physical row number. */
  readonly row: number;
  /** 0-based field position within the row. */
  readonly field: number;

  constructor(row: number, field: number, reason: string) {
    super(`Malformed quoting in row ${String(row)}, field ${String(field)}: ${reason}`);
    this.row = row;
    this.field = field;
  }
}

/** A header name appears more than once while duplicates are rejected. */
export class DuplicateHeaderError extends RowsiftError {
  readonly code = 'DUPLICATE_HEADER';
  readonly column: string;

  constructor(column: string) {
    super(`Duplicate header column '${column}'`);
    this.column = column;
  }
}

/** An option passed to the pipeline or one of its parts is out of range. */
export class ConfigurationError extends RowsiftError {
  readonly code = 'INVALID_CONFIGURATION';
}
