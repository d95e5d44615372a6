// src/tests/csv.test.ts
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { escapeCsvField, formatCsv, formatCsvRow } from '../utils/csv';
import { CsvReportWriter } from '../services/CsvReportWriter';
import { OutputUnwritableError } from '../errors/ConsolidationError';

describe('csv', () => {
  describe('escapeCsvField', () => {
    it('should leave plain values alone', () => {
      expect(escapeCsvField('Cycle')).toBe('Cycle');
      expect(escapeCsvField(42)).toBe('42');
      expect(escapeCsvField('')).toBe('');
    });

    it('should quote values with delimiters, quotes or line breaks', () => {
      expect(escapeCsvField('a,b')).toBe('"a,b"');
      expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    });
  });

  describe('formatCsvRow', () => {
    it('should write the separator row as an empty quoted field', () => {
      expect(formatCsvRow([''])).toBe('""');
    });

    it('should leave empty placeholders unquoted', () => {
      expect(formatCsvRow([3, '', ''])).toBe('3,,');
    });
  });

  describe('formatCsv', () => {
    it('should end every row with CRLF', () => {
      expect(formatCsv([['May'], ['Cycle', 'A'], [1, 'Missing'], ['']])).toBe('May\r\nCycle,A\r\n1,Missing\r\n""\r\n');
    });
  });
});

describe('CsvReportWriter', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'csv-writer-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('should write the rendered rows, creating parent folders', async () => {
    const outputFile = path.join(tempDir, 'out', 'output.csv');

    await new CsvReportWriter(outputFile).writeRows([['June'], ['Cycle', 'A'], [1, 7], ['']]);

    expect(await fs.readFile(outputFile, 'utf-8')).toBe('June\r\nCycle,A\r\n1,7\r\n""\r\n');
  });

  it('should replace an existing output file', async () => {
    const outputFile = path.join(tempDir, 'output.csv');
    await fs.writeFile(outputFile, 'stale content that is longer than the new one');

    await new CsvReportWriter(outputFile).writeRows([['July']]);

    expect(await fs.readFile(outputFile, 'utf-8')).toBe('July\r\n');
  });

  it('should fail with OutputUnwritable when the path is a folder', async () => {
    await expect(new CsvReportWriter(tempDir).writeRows([['x']])).rejects.toBeInstanceOf(OutputUnwritableError);
  });
});
