import type { RecordReader } from '@rowsift/core';
import { defineUsedColumns } from '@rowsift/core';
import { readZipCode } from './zipCode.js';

/** Assessment data for one property. */
export interface PropertyEntry {
  readonly zipCode: string;
  /** Assessed market value. */
  readonly marketValue: number;
  /** Livable area in square feet. */
  readonly livableArea: number;
}

export interface PropertyColumns {
  /** Default: `'zip_code'`. */
  readonly zipCode?: string;
  /** Default: `'market_value'`. */
  readonly marketValue?: string;
  /** Default: `'total_livable_area'`. */
  readonly livableArea?: string;
}

export function createPropertyReader(columns?: PropertyColumns): RecordReader<PropertyEntry> {
  const zipCode = columns?.zipCode ?? 'zip_code';
  const marketValue = columns?.marketValue ?? 'market_value';
  const livableArea = columns?.livableArea ?? 'total_livable_area';

  return {
    usedColumns: defineUsedColumns([zipCode, marketValue, livableArea]),
    defaultValue: () => '',
    buildRecord: (fields) => ({
      zipCode: readZipCode(fields, zipCode),
      marketValue: fields.decimal(marketValue, { required: true, min: 0 }),
      livableArea: fields.decimal(livableArea, { required: true, min: 0 }),
    }),
  };
}
