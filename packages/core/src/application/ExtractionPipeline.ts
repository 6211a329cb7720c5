import { TextDecoder } from 'node:util';
import type { ByteSource } from '../domain/ports/ByteSource.js';
import type { RecordReader } from '../domain/ports/RecordReader.js';
import type { DuplicateHeaderPolicy } from '../domain/model/HeaderIndex.js';
import { HeaderIndex } from '../domain/model/HeaderIndex.js';
import { isBlankRow } from '../domain/model/RawRow.js';
import type { UsedColumns } from '../domain/model/UsedColumns.js';
import { defineUsedColumns } from '../domain/model/UsedColumns.js';
import type { FilteredRow } from '../domain/model/FilteredRow.js';
import type { ExtractionStatus, ExtractionSummary, TypedRecord } from '../domain/model/TypedRecord.js';
import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import { BufferedSource, DEFAULT_CHUNK_SIZE } from '../domain/services/BufferedSource.js';
import { Tokenizer, toControlByte } from '../domain/services/Tokenizer.js';
import { ColumnProjection } from '../domain/services/ColumnProjection.js';
import { RecordFields } from '../domain/services/RecordFields.js';
import { ConfigurationError, EmptyStreamError, RowsiftError } from '../domain/errors/RowsiftError.js';
import { detectDelimiter } from '../infrastructure/dialect/detectDelimiter.js';
import { EventBus } from './EventBus.js';

/** Configuration for one extraction session. */
export interface ExtractionPipelineConfig {
  /** Field separator, or `'auto'` to detect it from the first buffered chunk. Default: `','`. */
  readonly delimiter?: string;
  /** Quote character. Default: `'"'`. */
  readonly quote?: string;
  /** Throw `MalformedQuotingError` instead of recovering from stray bytes after a closing quote. Default: `false`. */
  readonly strictQuoting?: boolean;
  /** How repeated header names resolve. Default: `'last-wins'`. */
  readonly duplicateHeaders?: DuplicateHeaderPolicy;
  /** Trim whitespace around header names. Default: `false`. */
  readonly trimHeaders?: boolean;
  /** Drop empty lines between records. Default: `true`. */
  readonly skipEmptyRows?: boolean;
  /** Read-ahead buffer size in bytes. Default: `16384`. */
  readonly chunkSize?: number;
}

interface ResolvedConfig {
  readonly delimiter: string;
  readonly quote: string;
  readonly strictQuoting: boolean;
  readonly duplicateHeaders: DuplicateHeaderPolicy;
  readonly trimHeaders: boolean;
  readonly skipEmptyRows: boolean;
  readonly chunkSize: number;
}

interface Session {
  readonly tokenizer: Tokenizer;
  readonly header: HeaderIndex;
  readonly projection: ColumnProjection;
}

const AUTO = 'auto';
const DUPLICATE_POLICIES: readonly DuplicateHeaderPolicy[] = ['last-wins', 'first-wins', 'reject'];

function resolveConfig(config: ExtractionPipelineConfig): ResolvedConfig {
  const resolved: ResolvedConfig = {
    delimiter: config.delimiter ?? ',',
    quote: config.quote ?? '"',
    strictQuoting: config.strictQuoting ?? false,
    duplicateHeaders: config.duplicateHeaders ?? 'last-wins',
    trimHeaders: config.trimHeaders ?? false,
    skipEmptyRows: config.skipEmptyRows ?? true,
    chunkSize: config.chunkSize ?? DEFAULT_CHUNK_SIZE,
  };

  if (resolved.delimiter !== AUTO) toControlByte('delimiter', resolved.delimiter);
  toControlByte('quote', resolved.quote);
  if (resolved.delimiter === resolved.quote) {
    throw new ConfigurationError('delimiter and quote must differ');
  }
  if (!DUPLICATE_POLICIES.includes(resolved.duplicateHeaders)) {
    throw new ConfigurationError(`Unknown duplicateHeaders policy '${String(resolved.duplicateHeaders)}'`);
  }
  return resolved;
}

/**
 * Lazily turns a byte source into typed records: tokenize a row, index the
 * header on the first call, project each later row onto the reader's used
 * columns, then let the reader build the value.
 *
 * Forward-only: iterating twice resumes where the last loop stopped. Reopen
 * the source to start over.
 *
 * @example
 * ```typescript
 * const pipeline = new ExtractionPipeline(new FilePathSource('./population.csv'), populationReader);
 * for await (const record of pipeline) {
 *   if (record.valid) totals.add(record.value);
 * }
 * ```
 */
export class ExtractionPipeline<T> implements AsyncIterable<TypedRecord<T>> {
  private readonly source: ByteSource;
  private readonly reader: RecordReader<T>;
  private readonly config: ResolvedConfig;
  private readonly usedColumns: UsedColumns;
  private readonly input: BufferedSource;
  private readonly eventBus = new EventBus();
  private session: Session | null = null;
  private inFlight: Promise<unknown> = Promise.resolve();
  private status: ExtractionStatus = 'pending';
  private failure: unknown = null;
  private rowsRead = 0;
  private recordsEmitted = 0;
  private validRecords = 0;
  private invalidRecords = 0;
  private skippedRows = 0;

  constructor(source: ByteSource, reader: RecordReader<T>, config: ExtractionPipelineConfig = {}) {
    this.source = source;
    this.reader = reader;
    this.config = resolveConfig(config);
    this.usedColumns = defineUsedColumns(reader.usedColumns);
    this.input = new BufferedSource(source, this.config.chunkSize);
  }

  /** The session's header, once the first `parseNext()` has read it. */
  get header(): HeaderIndex | null {
    return this.session?.header ?? null;
  }

  /**
   * Read up to the next data row and build its record.
   *
   * Resolves with `null` once the stream ends or the pipeline is closed. A
   * structural error (`IOError`, `EmptyStreamError`, strict-mode
   * `MalformedQuotingError`, ...) fails the session; later calls rethrow it.
   * Overlapping calls are queued and settle in call order.
   */
  parseNext(): Promise<TypedRecord<T> | null> {
    const next = this.inFlight.then(
      () => this.step(),
      () => this.step(),
    );
    this.inFlight = next;
    return next;
  }

  private async step(): Promise<TypedRecord<T> | null> {
    if (this.status === 'failed') throw this.failure;
    if (this.status === 'completed' || this.status === 'closed') return null;

    try {
      return await this.advance();
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<TypedRecord<T>, void, undefined> {
    for (;;) {
      const record = await this.parseNext();
      if (record === null) return;
      yield record;
    }
  }

  /** Stop early and release the source. Later `parseNext()` calls resolve with `null`. */
  async close(): Promise<void> {
    if (this.status === 'pending' || this.status === 'reading') {
      this.status = 'closed';
    }
    await this.input.close();
  }

  summary(): ExtractionSummary {
    return {
      status: this.status,
      rowsRead: this.rowsRead,
      recordsEmitted: this.recordsEmitted,
      validRecords: this.validRecords,
      invalidRecords: this.invalidRecords,
      skippedRows: this.skippedRows,
    };
  }

  /** Subscribe to events of the given type. */
  on<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to every event. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  off<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  private async advance(): Promise<TypedRecord<T> | null> {
    const session = this.session ?? (await this.start());

    for (;;) {
      const row = await session.tokenizer.nextRow();
      if (row === null) {
        this.complete();
        return null;
      }
      this.rowsRead++;

      if (this.config.skipEmptyRows && isBlankRow(row)) {
        this.skippedRows++;
        continue;
      }
      return this.extract(session.projection.project(row), session.tokenizer.lastRowLine);
    }
  }

  private async start(): Promise<Session> {
    this.status = 'reading';
    this.eventBus.emit({
      type: 'extraction:started',
      source: this.source.metadata(),
      usedColumns: this.usedColumns,
      timestamp: Date.now(),
    });

    const delimiter = this.config.delimiter === AUTO ? await this.sniffDelimiter() : this.config.delimiter;
    const tokenizer = new Tokenizer(this.input, {
      delimiter,
      quote: this.config.quote,
      strict: this.config.strictQuoting,
    });

    const headerRow = await tokenizer.nextRow();
    if (headerRow === null) throw new EmptyStreamError();
    this.rowsRead++;

    const header = HeaderIndex.fromRow(headerRow, {
      duplicates: this.config.duplicateHeaders,
      trim: this.config.trimHeaders,
    });
    const projection = new ColumnProjection(header, this.usedColumns, (column) => this.reader.defaultValue(column));
    this.session = { tokenizer, header, projection };

    this.eventBus.emit({
      type: 'header:indexed',
      columns: header.columns,
      missingColumns: projection.missing,
      delimiter,
      timestamp: Date.now(),
    });
    return this.session;
  }

  private async sniffDelimiter(): Promise<string> {
    await this.input.refill();
    const sample = new TextDecoder('utf-8').decode(this.input.preview());
    return detectDelimiter(sample);
  }

  private extract(row: FilteredRow, rowNumber: number): TypedRecord<T> {
    const fields = new RecordFields(row);
    const value = this.reader.buildRecord(fields);
    const record: TypedRecord<T> = {
      index: this.recordsEmitted,
      row: rowNumber,
      value,
      valid: fields.valid,
      errors: fields.failures,
    };

    this.recordsEmitted++;
    if (record.valid) {
      this.validRecords++;
    } else {
      this.invalidRecords++;
      this.eventBus.emit({
        type: 'record:invalid',
        index: record.index,
        row: record.row,
        errors: record.errors,
        timestamp: Date.now(),
      });
    }
    return record;
  }

  private complete(): void {
    this.status = 'completed';
    this.eventBus.emit({ type: 'extraction:completed', summary: this.summary(), timestamp: Date.now() });
  }

  private fail(error: unknown): void {
    this.status = 'failed';
    this.failure = error;
    this.eventBus.emit({
      type: 'extraction:failed',
      code: error instanceof RowsiftError ? error.code : 'UNKNOWN',
      error: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
    });
  }
}
