import { TextDecoder } from 'node:util';

const DEFAULT_CAPACITY = 64;

/**
 * Growable byte accumulator for one field at a time.
 *
 * Capacity doubles when full, so appends are amortized O(1). Bytes are decoded
 * as UTF-8 only when the field closes, which keeps multi-byte characters split
 * across refills intact.
 */
export class FieldBuffer {
  private bytes: Uint8Array;
  private length = 0;
  private readonly decoder = new TextDecoder('utf-8', { ignoreBOM: true });

  constructor(initialCapacity = DEFAULT_CAPACITY) {
    this.bytes = new Uint8Array(Math.max(1, Math.floor(initialCapacity)));
  }

  get size(): number {
    return this.length;
  }

  get capacity(): number {
    return this.bytes.length;
  }

  append(byte: number): void {
    if (this.length === this.bytes.length) {
      const grown = new Uint8Array(this.bytes.length * 2);
      grown.set(this.bytes);
      this.bytes = grown;
    }
    this.bytes[this.length++] = byte;
  }

  /** Decode the accumulated bytes and reset for the next field. Capacity is kept. */
  take(): string {
    if (this.length === 0) return '';
    const value = this.decoder.decode(this.bytes.subarray(0, this.length));
    this.length = 0;
    return value;
  }

  clear(): void {
    this.length = 0;
  }
}
