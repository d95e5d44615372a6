// src/services/ReportSource.ts
import * as fs from 'fs-extra';
import * as path from 'path';
import { ReportEncoding } from '../types/config.types';
import { DirectoryUnreadableError, FileUnreadableError } from '../errors/ConsolidationError';

export interface ReportSource {
  /** Report file paths, in processing order */
  listReports(): Promise<string[]>;
  readLines(filePath: string): Promise<string[]>;
}

export function splitLines(content: string): string[] {
  const lines = content.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Reports dropped into a folder. Names are unreliable ("Report.txt.20210101"
 * is common), so every visible regular file counts.
 */
export class DirectoryReportSource implements ReportSource {
  constructor(
    private readonly dirPath: string,
    private readonly encoding: ReportEncoding = 'latin1'
  ) {}

  async listReports(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dirPath);
    } catch (error) {
      throw new DirectoryUnreadableError(this.dirPath, error);
    }

    const files: string[] = [];
    for (const name of names.filter(n => !n.startsWith('.')).sort()) {
      const filePath = path.join(this.dirPath, name);
      try {
        const stats = await fs.stat(filePath);
        if (stats.isFile()) files.push(filePath);
      } catch (error) {
        throw new FileUnreadableError(filePath, error);
      }
    }
    return files;
  }

  async readLines(filePath: string): Promise<string[]> {
    try {
      const content = await fs.readFile(filePath, { encoding: this.encoding });
      return splitLines(content);
    } catch (error) {
      throw new FileUnreadableError(filePath, error);
    }
  }
}
