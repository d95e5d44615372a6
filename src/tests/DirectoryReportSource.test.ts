// src/tests/DirectoryReportSource.test.ts
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { DirectoryReportSource, splitLines } from '../services/ReportSource';
import { DirectoryUnreadableError, FileUnreadableError } from '../errors/ConsolidationError';

describe('DirectoryReportSource', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'report-source-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('should list visible regular files sorted by name', async () => {
    await fs.writeFile(path.join(tempDir, 'b.txt.20210301'), 'b');
    await fs.writeFile(path.join(tempDir, 'a.txt'), 'a');
    await fs.writeFile(path.join(tempDir, '.DS_Store'), 'hidden');
    await fs.ensureDir(path.join(tempDir, 'archive'));

    const files = await new DirectoryReportSource(tempDir).listReports();

    expect(files).toEqual([path.join(tempDir, 'a.txt'), path.join(tempDir, 'b.txt.20210301')]);
  });

  it('should split CRLF, CR and LF line endings', async () => {
    const file = path.join(tempDir, 'mixed.txt');
    await fs.writeFile(file, 'one\r\ntwo\nthree\rfour\r\n');

    expect(await new DirectoryReportSource(tempDir).readLines(file)).toEqual(['one', 'two', 'three', 'four']);
  });

  it('should read one character per byte as latin1', async () => {
    const file = path.join(tempDir, 'damaged.txt');
    await fs.writeFile(file, Buffer.from([0x41, 0xe9, 0xff, 0x0a, 0x42]));

    expect(await new DirectoryReportSource(tempDir, 'latin1').readLines(file)).toEqual(['Aéÿ', 'B']);
  });

  it('should fail with DirectoryUnreadable for a missing folder', async () => {
    const missing = path.join(tempDir, 'nope');

    await expect(new DirectoryReportSource(missing).listReports()).rejects.toBeInstanceOf(DirectoryUnreadableError);
    await expect(new DirectoryReportSource(missing).listReports()).rejects.toThrow(`Unable to read directory ${missing}`);
  });

  it('should fail with FileUnreadable for a missing file', async () => {
    const missing = path.join(tempDir, 'gone.txt');

    await expect(new DirectoryReportSource(tempDir).readLines(missing)).rejects.toBeInstanceOf(FileUnreadableError);
  });
});

describe('splitLines', () => {
  it('should keep blank lines inside the text and drop only the trailing one', () => {
    expect(splitLines('a\n\nb\n')).toEqual(['a', '', 'b']);
    expect(splitLines('')).toEqual([]);
  });
});
