import type { ByteSource } from '../ports/ByteSource.js';
import { ConfigurationError, IOError } from '../errors/RowsiftError.js';

/** Returned by reads once the source is drained. */
export const END_OF_STREAM = -1;
/** Returned by the synchronous reads when the buffer needs a refill first. */
export const BUFFER_EMPTY = -2;

export const DEFAULT_CHUNK_SIZE = 16 * 1024;

/**
 * Fixed-size read-ahead buffer over a `ByteSource`.
 *
 * `take()` and `peekBuffered()` never touch the source; they report
 * `BUFFER_EMPTY` instead. `consume()` and `peek()` refill transparently.
 * Upstream chunks larger than the buffer are copied over several refills.
 *
 * @example
 * ```typescript
 * const input = new BufferedSource(new BufferSource('a,b\n'), 4096);
 * await input.peek(); // 0x61, position unchanged
 * await input.consume(); // 0x61
 * ```
 */
export class BufferedSource {
  private readonly source: ByteSource;
  private readonly buffer: Uint8Array;
  private iterator: AsyncIterator<Uint8Array> | null = null;
  private pending: Uint8Array | null = null;
  private pendingOffset = 0;
  private position = 0;
  private limit = 0;
  private ended = false;
  private total = 0;

  constructor(source: ByteSource, chunkSize = DEFAULT_CHUNK_SIZE) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ConfigurationError(`chunkSize must be a positive integer, got ${String(chunkSize)}`);
    }
    this.source = source;
    this.buffer = new Uint8Array(chunkSize);
  }

  /** Buffer capacity in bytes. */
  get capacity(): number {
    return this.buffer.length;
  }

  /** Bytes pulled from the source so far. */
  get bytesRead(): number {
    return this.total;
  }

  /** `true` once the source is drained and every buffered byte consumed. */
  get atEnd(): boolean {
    return this.ended && this.position >= this.limit;
  }

  /**
   * Move unconsumed bytes to the front and copy the next upstream bytes in.
   * Resolves with the number of bytes added; `0` means end of stream.
   */
  async refill(): Promise<number> {
    const remaining = this.limit - this.position;
    if (remaining > 0 && this.position > 0) {
      this.buffer.copyWithin(0, this.position, this.limit);
    }
    this.position = 0;
    this.limit = remaining;

    let added = 0;
    while (added === 0 && !this.ended && this.limit < this.buffer.length) {
      const chunk = this.pending ?? (await this.pull());
      if (chunk === null) {
        this.ended = true;
        break;
      }
      this.pending = chunk;

      const count = Math.min(chunk.length - this.pendingOffset, this.buffer.length - this.limit);
      this.buffer.set(chunk.subarray(this.pendingOffset, this.pendingOffset + count), this.limit);
      this.limit += count;
      this.pendingOffset += count;
      added += count;

      if (this.pendingOffset >= chunk.length) {
        this.pending = null;
        this.pendingOffset = 0;
      }
    }

    this.total += added;
    return added;
  }

  /** Next byte without advancing. Refills when the buffer is drained. */
  async peek(): Promise<number> {
    let byte = this.peekBuffered();
    while (byte === BUFFER_EMPTY) {
      await this.refill();
      byte = this.peekBuffered();
    }
    return byte;
  }

  /** Next byte, advancing by one. Refills when the buffer is drained. */
  async consume(): Promise<number> {
    let byte = this.take();
    while (byte === BUFFER_EMPTY) {
      await this.refill();
      byte = this.take();
    }
    return byte;
  }

  /** Next buffered byte without advancing, `BUFFER_EMPTY` or `END_OF_STREAM`. */
  peekBuffered(): number {
    if (this.position < this.limit) return this.buffer[this.position] ?? END_OF_STREAM;
    return this.ended ? END_OF_STREAM : BUFFER_EMPTY;
  }

  /** Next buffered byte, advancing by one, or `BUFFER_EMPTY` / `END_OF_STREAM`. */
  take(): number {
    if (this.position < this.limit) return this.buffer[this.position++] ?? END_OF_STREAM;
    return this.ended ? END_OF_STREAM : BUFFER_EMPTY;
  }

  /** View of the unconsumed buffered bytes. Valid until the next refill. */
  preview(): Uint8Array {
    return this.buffer.subarray(this.position, this.limit);
  }

  /** Drop buffered bytes and release the source. Later reads report end of stream. */
  async close(): Promise<void> {
    this.ended = true;
    this.pending = null;
    this.position = 0;
    this.limit = 0;

    const iterator = this.iterator;
    this.iterator = null;
    if (iterator?.return) {
      try {
        await iterator.return();
      } catch (error) {
        throw IOError.from(error);
      }
    }
  }

  private async pull(): Promise<Uint8Array | null> {
    try {
      this.iterator ??= this.source.read()[Symbol.asyncIterator]();
      const result = await this.iterator.next();
      return result.done ? null : result.value;
    } catch (error) {
      this.ended = true;
      throw IOError.from(error);
    }
  }
}
