import type { FieldConversionFailure } from './FieldConversion.js';

/** A reader's value together with where it came from and whether every field converted. */
export interface TypedRecord<T> {
  /** Zero-based index among emitted records. */
  readonly index: number;
  /** 1-based physical line the row starts on; the header starts on line 1. */
  readonly row: number;
  readonly value: T;
  /** `false` when at least one field failed to convert. */
  readonly valid: boolean;
  readonly errors: readonly FieldConversionFailure[];
}

/** Status of an extraction session. */
export type ExtractionStatus = 'pending' | 'reading' | 'completed' | 'failed' | 'closed';

/** Counters for one extraction session. */
export interface ExtractionSummary {
  readonly status: ExtractionStatus;
  /** Rows tokenized, header included. */
  readonly rowsRead: number;
  readonly recordsEmitted: number;
  readonly validRecords: number;
  readonly invalidRecords: number;
  /** Blank rows dropped by `skipEmptyRows`. */
  readonly skippedRows: number;
}
