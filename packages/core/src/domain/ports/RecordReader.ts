import type { UsedColumns } from '../model/UsedColumns.js';
import type { RecordFields } from '../services/RecordFields.js';

/**
 * The capabilities a typed reader plugs into the extraction pipeline.
 *
 * @example
 * ```typescript
 * const reader: RecordReader<{ zip: string; count: number }> = {
 *   usedColumns: ['zip', 'count'],
 *   defaultValue: () => '',
 *   buildRecord: (fields) => ({ zip: fields.text('zip', { required: true }), count: fields.integer('count') }),
 * };
 * ```
 */
export interface RecordReader<T> {
  /** Columns kept from each row, in the order `FilteredRow` lays them out. */
  readonly usedColumns: UsedColumns;
  /** Value substituted when a used column is missing from the header or from a short row. */
  defaultValue(column: string): string;
  /**
   * Map one filtered row to a value. Conversion problems go through `fields`,
   * which records them and returns fallbacks; the record is then marked invalid.
   */
  buildRecord(fields: RecordFields): T;
}
