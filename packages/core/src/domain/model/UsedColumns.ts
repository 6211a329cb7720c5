import { ConfigurationError } from '../errors/RowsiftError.js';

/** Column names a reader needs, in the order its filtered rows are laid out. */
export type UsedColumns = readonly string[];

/** Validate and freeze a used-column declaration. Names must be non-empty and unique. */
export function defineUsedColumns(names: Iterable<string>): UsedColumns {
  const columns = [...names];
  if (columns.length === 0) {
    throw new ConfigurationError('At least one used column must be declared');
  }

  const seen = new Set<string>();
  for (const name of columns) {
    if (name === '') throw new ConfigurationError('Used column names cannot be empty');
    if (seen.has(name)) throw new ConfigurationError(`Used column '${name}' is declared twice`);
    seen.add(name);
  }

  return Object.freeze(columns);
}
