// Main entry point
export { ExtractionPipeline } from './application/ExtractionPipeline.js';
export type { ExtractionPipelineConfig } from './application/ExtractionPipeline.js';
export { readRecords, validValues } from './application/readRecords.js';

// Domain model
export type { RawRow } from './domain/model/RawRow.js';
export { isBlankRow } from './domain/model/RawRow.js';
export { HeaderIndex } from './domain/model/HeaderIndex.js';
export type { DuplicateHeaderPolicy, HeaderIndexOptions } from './domain/model/HeaderIndex.js';
export type { UsedColumns } from './domain/model/UsedColumns.js';
export { defineUsedColumns } from './domain/model/UsedColumns.js';
export { FilteredRow } from './domain/model/FilteredRow.js';
export type { FieldConversionFailure, FieldConversionCode } from './domain/model/FieldConversion.js';
export type { TypedRecord, ExtractionStatus, ExtractionSummary } from './domain/model/TypedRecord.js';

// Errors
export {
  RowsiftError,
  IOError,
  EmptyStreamError,
  MalformedQuotingError,
  DuplicateHeaderError,
  ConfigurationError,
} from './domain/errors/index.js';
export type { RowsiftErrorCode } from './domain/errors/index.js';

// Domain services (for building custom pipelines)
export { BufferedSource, END_OF_STREAM, BUFFER_EMPTY, DEFAULT_CHUNK_SIZE } from './domain/services/BufferedSource.js';
export { FieldBuffer } from './domain/services/FieldBuffer.js';
export { Tokenizer } from './domain/services/Tokenizer.js';
export type { TokenizerOptions } from './domain/services/Tokenizer.js';
export { ColumnProjection } from './domain/services/ColumnProjection.js';
export { RecordFields } from './domain/services/RecordFields.js';
export type {
  FieldOptions,
  TextFieldOptions,
  NumberFieldOptions,
  ChoiceFieldOptions,
} from './domain/services/RecordFields.js';

// Ports (for custom implementations)
export type { ByteSource, SourceMetadata } from './domain/ports/ByteSource.js';
export type { RecordReader } from './domain/ports/RecordReader.js';

// Domain events
export { EventBus } from './application/EventBus.js';
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ExtractionStartedEvent,
  HeaderIndexedEvent,
  RecordInvalidEvent,
  ExtractionCompletedEvent,
  ExtractionFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { detectDelimiter } from './infrastructure/dialect/detectDelimiter.js';
