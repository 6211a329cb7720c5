import type { RecordReader } from '@rowsift/core';
import { defineUsedColumns } from '@rowsift/core';
import { readZipCode } from './zipCode.js';

/** Residents counted in one ZIP code. */
export interface PopulationEntry {
  readonly zipCode: string;
  readonly population: number;
}

export interface PopulationColumns {
  /** Default: `'zip_code'`. */
  readonly zipCode?: string;
  /** Default: `'population'`. */
  readonly population?: string;
}

export function createPopulationReader(columns?: PopulationColumns): RecordReader<PopulationEntry> {
  const zipCode = columns?.zipCode ?? 'zip_code';
  const population = columns?.population ?? 'population';

  return {
    usedColumns: defineUsedColumns([zipCode, population]),
    defaultValue: () => '',
    buildRecord: (fields) => ({
      zipCode: readZipCode(fields, zipCode),
      population: fields.integer(population, { required: true, min: 0 }),
    }),
  };
}
