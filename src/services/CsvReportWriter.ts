// src/services/CsvReportWriter.ts
import * as fs from 'fs-extra';
import { CsvRow } from '../types/report.types';
import { OutputUnwritableError } from '../errors/ConsolidationError';
import { formatCsv } from '../utils/csv';
import logger from '../utils/logger';

export interface RowWriter {
  writeRows(rows: CsvRow[]): Promise<void>;
}

export class CsvReportWriter implements RowWriter {
  constructor(private readonly outputFile: string) {}

  /**
   * The document is rendered in full before the file is touched, so a failed
   * run never leaves half a CSV behind.
   */
  async writeRows(rows: CsvRow[]): Promise<void> {
    const content = formatCsv(rows);
    try {
      await fs.outputFile(this.outputFile, content, 'utf-8');
    } catch (error) {
      throw new OutputUnwritableError(this.outputFile, error);
    }
    logger.info(`CSV file written to: ${this.outputFile} (${rows.length} rows)`);
  }
}
