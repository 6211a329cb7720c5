import type { RawRow } from '../model/RawRow.js';
import { BUFFER_EMPTY, END_OF_STREAM } from './BufferedSource.js';
import type { BufferedSource } from './BufferedSource.js';
import { FieldBuffer } from './FieldBuffer.js';
import { ConfigurationError, MalformedQuotingError } from '../errors/RowsiftError.js';

const LF = 0x0a;
const CR = 0x0d;

const UNQUOTED = 0;
const QUOTED = 1;
const QUOTE_PENDING = 2;

type TokenizerState = typeof UNQUOTED | typeof QUOTED | typeof QUOTE_PENDING;

export interface TokenizerOptions {
  /** Field separator. Default: `','`. */
  readonly delimiter?: string;
  /** Quote character. Default: `'"'`. */
  readonly quote?: string;
  /** Throw `MalformedQuotingError` instead of recovering. Default: `false`. */
  readonly strict?: boolean;
}

/** Resolve a one-character option to its byte. Only single ASCII characters other than CR and LF are accepted. */
export function toControlByte(option: string, value: string): number {
  const code = value.charCodeAt(0);
  if (value.length !== 1 || code > 0x7f || code === LF || code === CR) {
    throw new ConfigurationError(`${option} must be a single ASCII character other than CR or LF, got '${value}'`);
  }
  return code;
}

/**
 * Finite-state row assembler over a `BufferedSource`.
 *
 * Each `nextRow()` call yields exactly one row in file order, or `null` once
 * the stream ends cleanly. A closing quote followed by an ordinary byte is
 * recovered by closing the field and starting a new one with that byte,
 * unless `strict` is set.
 */
export class Tokenizer {
  private readonly source: BufferedSource;
  private readonly delimiter: number;
  private readonly quote: number;
  private readonly strict: boolean;
  private readonly field = new FieldBuffer();
  private rows = 0;
  private line = 1;
  private afterCR = false;
  private rowLine = 0;

  constructor(source: BufferedSource, options?: TokenizerOptions) {
    this.source = source;
    this.delimiter = toControlByte('delimiter', options?.delimiter ?? ',');
    this.quote = toControlByte('quote', options?.quote ?? '"');
    this.strict = options?.strict ?? false;

    if (this.delimiter === this.quote) {
      throw new ConfigurationError('delimiter and quote must differ');
    }
  }

  /** Rows emitted so far; also the 1-based number of the last emitted row. */
  get rowsEmitted(): number {
    return this.rows;
  }

  /**
   * 1-based physical line on which the last emitted row started. Differs from
   * `rowsEmitted` once a quoted field has spanned a line break.
   */
  get lastRowLine(): number {
    return this.rowLine;
  }

  async nextRow(): Promise<RawRow | null> {
    const fields: string[] = [];
    let state: TokenizerState = UNQUOTED;
    let consumed = 0;
    const startLine = this.line;
    this.field.clear();

    for (;;) {
      let byte = this.source.take();
      if (byte === BUFFER_EMPTY) byte = await this.source.consume();

      if (byte === END_OF_STREAM) {
        if (consumed === 0) return null;
        if (state === QUOTED && this.strict) {
          throw new MalformedQuotingError(this.rows + 1, fields.length, 'quoted field is not closed at end of stream');
        }
        return this.closeRow(fields, startLine);
      }
      consumed++;
      this.countLine(byte);

      switch (state) {
        case UNQUOTED:
          if (byte === this.delimiter) {
            fields.push(this.field.take());
          } else if (byte === this.quote) {
            state = QUOTED;
          } else if (byte === LF || byte === CR) {
            if (byte === CR) await this.skipLineFeed();
            return this.closeRow(fields, startLine);
          } else {
            this.field.append(byte);
          }
          break;

        case QUOTED:
          if (byte === this.quote) {
            state = QUOTE_PENDING;
          } else {
            this.field.append(byte);
          }
          break;

        case QUOTE_PENDING:
          if (byte === this.quote) {
            this.field.append(byte);
            state = QUOTED;
          } else if (byte === this.delimiter) {
            fields.push(this.field.take());
            state = UNQUOTED;
          } else if (byte === LF || byte === CR) {
            if (byte === CR) await this.skipLineFeed();
            return this.closeRow(fields, startLine);
          } else {
            if (this.strict) {
              throw new MalformedQuotingError(
                this.rows + 1,
                fields.length,
                `unexpected '${String.fromCharCode(byte)}' after closing quote`,
              );
            }
            fields.push(this.field.take());
            this.field.append(byte);
            state = UNQUOTED;
          }
          break;
      }
    }
  }

  private closeRow(fields: string[], startLine: number): RawRow {
    fields.push(this.field.take());
    this.rows++;
    this.rowLine = startLine;
    return fields;
  }

  /** CR, LF and CRLF each end one physical line, inside quotes too. */
  private countLine(byte: number): void {
    if (byte === CR || (byte === LF && !this.afterCR)) this.line++;
    this.afterCR = byte === CR;
  }

  /** Swallow the LF of a CRLF pair, looking ahead across a refill if needed. */
  private async skipLineFeed(): Promise<void> {
    let next = this.source.peekBuffered();
    if (next === BUFFER_EMPTY) next = await this.source.peek();
    if (next === LF) this.source.take();
    this.afterCR = false;
  }
}
