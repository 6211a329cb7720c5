import type { ByteSource, SourceMetadata } from '../../domain/ports/ByteSource.js';

/** Byte source over an in-memory string (encoded as UTF-8) or byte array. */
export class BufferSource implements ByteSource {
  private readonly content: Uint8Array;
  private readonly meta: SourceMetadata;

  constructor(data: string | Uint8Array, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: this.content.length,
    };
  }

  async *read(): AsyncIterable<Uint8Array> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
