import Papa from 'papaparse';

const CANDIDATES = [',', ';', '\t', '|'] as const;
const SAMPLE_LINES = 5;

/** Pick the candidate delimiter that splits the first row of `sample` into the most columns. Ties keep `','`. */
export function detectDelimiter(sample: string): string {
  const firstLines = sample.split(/\r\n|\n|\r/).slice(0, SAMPLE_LINES).join('\n');

  let bestDelimiter: string = ',';
  let maxColumns = 0;

  for (const delimiter of CANDIDATES) {
    const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
    const firstRow = result.data[0];
    if (firstRow && firstRow.length > maxColumns) {
      maxColumns = firstRow.length;
      bestDelimiter = delimiter;
    }
  }

  return bestDelimiter;
}
