import type { SourceMetadata } from '../ports/ByteSource.js';
import type { FieldConversionFailure } from '../model/FieldConversion.js';
import type { ExtractionSummary } from '../model/TypedRecord.js';

/** Emitted on the first `parseNext()`, before any byte is read. */
export interface ExtractionStartedEvent {
  readonly type: 'extraction:started';
  readonly source: SourceMetadata;
  readonly usedColumns: readonly string[];
  readonly timestamp: number;
}

/** Emitted once the header row has been indexed. */
export interface HeaderIndexedEvent {
  readonly type: 'header:indexed';
  readonly columns: readonly string[];
  /** Used columns absent from the header; they always take the reader's default. */
  readonly missingColumns: readonly string[];
  readonly delimiter: string;
  readonly timestamp: number;
}

/** Emitted for each record with at least one field conversion failure. */
export interface RecordInvalidEvent {
  readonly type: 'record:invalid';
  readonly index: number;
  readonly row: number;
  readonly errors: readonly FieldConversionFailure[];
  readonly timestamp: number;
}

/** Emitted when the stream ends cleanly. */
export interface ExtractionCompletedEvent {
  readonly type: 'extraction:completed';
  readonly summary: ExtractionSummary;
  readonly timestamp: number;
}

/** Emitted when a structural error aborts the session. */
export interface ExtractionFailedEvent {
  readonly type: 'extraction:failed';
  /** `RowsiftError` code, or `'UNKNOWN'` for errors raised by reader code. */
  readonly code: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | ExtractionStartedEvent
  | HeaderIndexedEvent
  | RecordInvalidEvent
  | ExtractionCompletedEvent
  | ExtractionFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

/** Narrow a domain event to the payload of `type`. */
export function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
