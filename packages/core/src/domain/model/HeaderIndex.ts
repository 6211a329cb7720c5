import type { RawRow } from './RawRow.js';
import { DuplicateHeaderError } from '../errors/RowsiftError.js';

/** How repeated header names are resolved. */
export type DuplicateHeaderPolicy = 'last-wins' | 'first-wins' | 'reject';

export interface HeaderIndexOptions {
  /** Default: `'last-wins'`. */
  readonly duplicates?: DuplicateHeaderPolicy;
  /** Trim whitespace around each name. Default: `false`. */
  readonly trim?: boolean;
}

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Immutable column-name to position map, built once per session from the header row.
 *
 * @example
 * ```typescript
 * const header = HeaderIndex.fromRow(['zip_code', 'population']);
 * header.positionOf('population'); // 1
 * header.positionOf('area'); // undefined
 * ```
 */
export class HeaderIndex {
  private readonly positions: ReadonlyMap<string, number>;
  /** Header names in file order, duplicates included. */
  readonly columns: readonly string[];

  private constructor(columns: readonly string[], positions: ReadonlyMap<string, number>) {
    this.columns = columns;
    this.positions = positions;
  }

  static fromRow(row: RawRow, options?: HeaderIndexOptions): HeaderIndex {
    const policy = options?.duplicates ?? 'last-wins';
    const trim = options?.trim ?? false;
    const columns: string[] = [];
    const positions = new Map<string, number>();

    row.forEach((raw, position) => {
      let name = position === 0 && raw.startsWith(BYTE_ORDER_MARK) ? raw.slice(1) : raw;
      if (trim) name = name.trim();
      columns.push(name);

      if (positions.has(name)) {
        if (policy === 'reject') throw new DuplicateHeaderError(name);
        if (policy === 'first-wins') return;
      }
      positions.set(name, position);
    });

    return new HeaderIndex(Object.freeze(columns), positions);
  }

  /** Position of `name` in every raw row of the session, or `undefined` when the header lacks it. */
  positionOf(name: string): number | undefined {
    return this.positions.get(name);
  }

  has(name: string): boolean {
    return this.positions.has(name);
  }

  /** Number of columns in the header row. */
  get width(): number {
    return this.columns.length;
  }
}
