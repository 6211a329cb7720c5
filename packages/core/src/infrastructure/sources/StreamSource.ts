import type { ReadableStream } from 'node:stream/web';
import type { ByteSource, SourceMetadata } from '../../domain/ports/ByteSource.js';

type StreamInput = AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>;

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
}

/** Byte source that wraps an `AsyncIterable` or web `ReadableStream`. Ideal for Express/Fastify uploads. */
export class StreamSource implements ByteSource {
  private readonly stream: StreamInput;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: StreamInput, options?: StreamSourceOptions) {
    this.stream = stream;
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
    };
  }

  async *read(): AsyncIterable<Uint8Array> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = isReadableStream(this.stream) ? fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      yield typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}

function isReadableStream(stream: StreamInput): stream is ReadableStream<string | Uint8Array> {
  return 'getReader' in stream && typeof stream.getReader === 'function';
}

async function* fromReadableStream<T>(stream: ReadableStream<T>): AsyncIterable<T> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
