import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { ByteSource, SourceMetadata } from '../../domain/ports/ByteSource.js';
import { DEFAULT_CHUNK_SIZE } from '../../domain/services/BufferedSource.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 16384 (16KB). */
  readonly highWaterMark?: number;
}

/** Byte source that streams a local file with `createReadStream`. Node.js only. */
export class FilePathSource implements ByteSource {
  private readonly filePath: string;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.highWaterMark = options?.highWaterMark ?? DEFAULT_CHUNK_SIZE;
  }

  async *read(): AsyncIterable<Uint8Array> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.highWaterMark });

    for await (const chunk of stream) {
      const bytes: unknown = chunk;
      if (bytes instanceof Uint8Array) {
        yield bytes;
      } else if (typeof bytes === 'string') {
        yield Buffer.from(bytes, 'utf-8');
      }
    }
  }

  /** `fileSize` is left out when the file does not exist (yet). */
  metadata(): SourceMetadata {
    const stats = statSync(this.filePath, { throwIfNoEntry: false });
    return {
      fileName: basename(this.filePath),
      fileSize: stats?.size,
    };
  }
}
