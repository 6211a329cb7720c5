/** One tokenized row: field strings in file order. Never retained past the row it belongs to. */
export type RawRow = readonly string[];

/** A row produced by an empty line: exactly one empty field. */
export function isBlankRow(row: RawRow): boolean {
  return row.length === 1 && row[0] === '';
}
