import { describe, it, expect } from 'vitest';
import { ExtractionPipeline } from '../../src/application/ExtractionPipeline.js';
import { readRecords } from '../../src/application/readRecords.js';
import { chunkedSource } from '../support/sources.js';
import { objectReader, tallyReader } from '../support/readers.js';

describe('Concurrent sessions', () => {
  it('should keep interleaved sessions independent', async () => {
    const left = new ExtractionPipeline(chunkedSource(['zip,co', 'unt\n191', '04,1\n19103,2\n']), tallyReader, {
      chunkSize: 3,
    });
    const right = new ExtractionPipeline(chunkedSource(['count;zip\n', '9;08002\n', 'x;08003\n']), tallyReader, {
      delimiter: ';',
      chunkSize: 2,
    });

    const fromLeft = [];
    const fromRight = [];
    for (;;) {
      const [a, b] = await Promise.all([left.parseNext(), right.parseNext()]);
      if (a) fromLeft.push(a);
      if (b) fromRight.push(b);
      if (!a && !b) break;
    }

    expect(fromLeft.map((r) => r.value)).toEqual([
      { zip: '19104', count: 1 },
      { zip: '19103', count: 2 },
    ]);
    expect(fromRight.map((r) => [r.value, r.valid])).toEqual([
      [{ zip: '08002', count: 9 }, true],
      [{ zip: '08003', count: 0 }, false],
    ]);
    expect(left.header?.columns).toEqual(['zip', 'count']);
    expect(right.header?.columns).toEqual(['count', 'zip']);
  });

  it('should run many sessions in parallel with their own headers', async () => {
    const runs = Array.from({ length: 8 }, (_, i) => {
      const column = `c${String(i)}`;
      const csv = `${column},other\n${String(i)},x\n`;
      return readRecords(chunkedSource([csv.slice(0, 3), csv.slice(3)]), objectReader([column]), { chunkSize: 2 });
    });

    const results = await Promise.all(runs);

    results.forEach((records, i) => {
      expect(records.map((r) => r.value)).toEqual([{ [`c${String(i)}`]: String(i) }]);
    });
  });
});
