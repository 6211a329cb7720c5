import type { ByteSource } from '../domain/ports/ByteSource.js';
import type { RecordReader } from '../domain/ports/RecordReader.js';
import type { TypedRecord } from '../domain/model/TypedRecord.js';
import { ExtractionPipeline } from './ExtractionPipeline.js';
import type { ExtractionPipelineConfig } from './ExtractionPipeline.js';

/** Run a whole extraction and collect every record, valid or not. */
export async function readRecords<T>(
  source: ByteSource,
  reader: RecordReader<T>,
  config?: ExtractionPipelineConfig,
): Promise<TypedRecord<T>[]> {
  const records: TypedRecord<T>[] = [];
  for await (const record of new ExtractionPipeline(source, reader, config)) {
    records.push(record);
  }
  return records;
}

/** Yield the values of valid records only. */
export async function* validValues<T>(records: AsyncIterable<TypedRecord<T>> | Iterable<TypedRecord<T>>): AsyncGenerator<T> {
  for await (const record of records) {
    if (record.valid) yield record.value;
  }
}
