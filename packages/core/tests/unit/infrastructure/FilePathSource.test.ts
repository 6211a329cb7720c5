import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';
import { BufferedSource } from '../../../src/domain/services/BufferedSource.js';
import { IOError } from '../../../src/domain/errors/RowsiftError.js';

const TEST_DIR = join(tmpdir(), 'rowsift-test-filepathsource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

describe('FilePathSource', () => {
  describe('read()', () => {
    it('should stream file content as byte chunks', async () => {
      const filePath = writeTempFile('read-basic.csv', 'zip,count\n19104,3\n');
      const source = new FilePathSource(filePath);

      const chunks: Buffer[] = [];
      for await (const chunk of source.read()) {
        chunks.push(Buffer.from(chunk));
      }

      expect(Buffer.concat(chunks).toString('utf-8')).toBe('zip,count\n19104,3\n');
    });

    it('should honour highWaterMark', async () => {
      const filePath = writeTempFile('read-small-chunks.csv', 'abcdefghij');
      const source = new FilePathSource(filePath, { highWaterMark: 4 });

      const sizes: number[] = [];
      for await (const chunk of source.read()) {
        sizes.push(chunk.length);
      }

      expect(sizes).toEqual([4, 4, 2]);
    });

    it('should surface a missing file as IOError through the buffered source', async () => {
      const input = new BufferedSource(new FilePathSource(join(TEST_DIR, 'missing.csv')));

      await expect(input.refill()).rejects.toBeInstanceOf(IOError);
    });
  });

  describe('metadata()', () => {
    it('should report file name and size', () => {
      const filePath = writeTempFile('meta.csv', 'a,b\n1,2\n');

      expect(new FilePathSource(filePath).metadata()).toEqual({ fileName: 'meta.csv', fileSize: 8 });
    });

    it('should leave the size out for a missing file', () => {
      expect(new FilePathSource(join(TEST_DIR, 'absent.csv')).metadata()).toEqual({
        fileName: 'absent.csv',
        fileSize: undefined,
      });
    });
  });
});
