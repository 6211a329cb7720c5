import type { RecordFields } from '@rowsift/core';

const ZIP_CODE = /^(\d{5})(?:-?\d{4})?$/;

/** Read a required ZIP code, keeping the five-digit prefix of ZIP+4 values. */
export function readZipCode(fields: RecordFields, column: string): string {
  const value = fields.text(column, { required: true });
  if (value === '') return '';

  const prefix = ZIP_CODE.exec(value)?.[1];
  if (prefix === undefined) {
    fields.fail(column, 'INVALID_VALUE', `'${column}' is not a ZIP code`, fields.raw(column));
    return '';
  }
  return prefix;
}
