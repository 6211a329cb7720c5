import type { HeaderIndex } from '../model/HeaderIndex.js';
import type { RawRow } from '../model/RawRow.js';
import type { UsedColumns } from '../model/UsedColumns.js';
import { FilteredRow } from '../model/FilteredRow.js';

/**
 * Shrinks raw rows to the used columns.
 *
 * Header positions are resolved once at construction, so every row of a
 * session reads a column from the same position. A column missing from the
 * header, or beyond the end of a short row, takes `defaultValue(column)`.
 */
export class ColumnProjection {
  readonly columns: UsedColumns;
  /** Used columns the header does not contain. */
  readonly missing: readonly string[];
  private readonly positions: readonly (number | undefined)[];
  private readonly slots: ReadonlyMap<string, number>;
  private readonly defaultValue: (column: string) => string;

  constructor(header: HeaderIndex, columns: UsedColumns, defaultValue: (column: string) => string) {
    this.columns = columns;
    this.defaultValue = defaultValue;
    this.positions = columns.map((column) => header.positionOf(column));
    this.slots = new Map(columns.map((column, slot): [string, number] => [column, slot]));
    this.missing = columns.filter((column) => !header.has(column));
  }

  project(row: RawRow): FilteredRow {
    const values: string[] = [];
    this.columns.forEach((column, slot) => {
      const position = this.positions[slot];
      const value = position === undefined ? undefined : row[position];
      values.push(value ?? this.defaultValue(column));
    });
    return new FilteredRow(this.slots, values);
  }
}
