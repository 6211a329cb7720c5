import { ConfigurationError } from '../errors/RowsiftError.js';

/**
 * The used-column values of one row, in declared order.
 *
 * `slots` is shared by every row of a projection; only `values` is per row.
 */
export class FilteredRow {
  private readonly slots: ReadonlyMap<string, number>;
  private readonly values: readonly string[];

  constructor(slots: ReadonlyMap<string, number>, values: readonly string[]) {
    this.slots = slots;
    this.values = values;
  }

  /** Value of a used column. Asking for an undeclared column is a reader bug and throws. */
  get(column: string): string {
    const slot = this.slots.get(column);
    if (slot === undefined) {
      throw new ConfigurationError(`Column '${column}' is not among the used columns`);
    }
    return this.values[slot] ?? '';
  }

  at(slot: number): string | undefined {
    return this.values[slot];
  }

  get size(): number {
    return this.values.length;
  }

  toObject(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [column, slot] of this.slots) {
      result[column] = this.values[slot] ?? '';
    }
    return result;
  }
}
