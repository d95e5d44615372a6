// src/utils/csv.ts
import { CsvField, CsvRow } from '../types/report.types';

// Excel dialect
export const CSV_DELIMITER = ',';
export const CSV_LINE_TERMINATOR = '\r\n';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(field: CsvField): string {
  const text = String(field);
  if (NEEDS_QUOTING.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * A row with one empty field is written as `""` so it still reads back as a
 * row rather than nothing.
 */
export function formatCsvRow(row: CsvRow): string {
  if (row.length === 1 && row[0] === '') {
    return '""';
  }
  return row.map(escapeCsvField).join(CSV_DELIMITER);
}

export function formatCsv(rows: CsvRow[]): string {
  return rows.map(row => formatCsvRow(row) + CSV_LINE_TERMINATOR).join('');
}
