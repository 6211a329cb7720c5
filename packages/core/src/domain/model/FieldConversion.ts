/** Reasons a single field could not be populated. */
export type FieldConversionCode = 'MISSING' | 'MALFORMED_NUMBER' | 'MALFORMED_DATE' | 'OUT_OF_RANGE' | 'INVALID_VALUE';

/** A per-field data problem. Marks its record invalid; never aborts the stream. */
export interface FieldConversionFailure {
  /** Used column the value came from. */
  readonly field: string;
  readonly code: FieldConversionCode;
  readonly message: string;
  /** Raw value as read from the row. */
  readonly value: string;
}
