// src/tests/fixtures.ts
// Builders for report text laid out at the production column offsets.
import { DEFAULT_ANCHOR_PHRASES } from '../config/defaults';
import { ReportSource } from '../services/ReportSource';
import { FileUnreadableError } from '../errors/ConsolidationError';

// Cycle digits land in columns 39-41
export function readCycleLine(cycle: string): string {
  return 'MRR Report: Read Cycle {'.padEnd(39) + cycle + '}';
}

// "05-JUN-21 to 07-JUN-21": day 46-48, month 49-52, year 53-55
export function scheduleLine(dates: string): string {
  return 'Schedule Dates'.padEnd(46) + dates;
}

// Value starts at column 73
export function fieldLine(phrase: string, value: string): string {
  return `${phrase} `.padEnd(73, '.') + value;
}

export const NOISE_LINES = [
  'From: meter.ops@example.test',
  'Subject: =?iso-8859-1?Q?MRR_Exception_Report?=',
  'Content-Transfer-Encoding: quoted-printable',
  'Ã¢â‚¬â€œ Missing Register Readings Ã¢â‚¬â€œ',
  ''
];

export interface ReportOptions {
  cycle?: string;
  dates?: string;
  values?: string[];
}

/**
 * A report with mail-header noise up front, then the metadata, then one line
 * per default anchor. `values` runs in anchor order; pass fewer to leave the
 * trailing anchors out of the report.
 */
export function buildReport(options: ReportOptions): string[] {
  const lines = [...NOISE_LINES];
  if (options.cycle !== undefined) lines.push(readCycleLine(options.cycle));
  if (options.dates !== undefined) lines.push(scheduleLine(options.dates));
  lines.push('');
  (options.values ?? []).forEach((value, i) => {
    lines.push(fieldLine(DEFAULT_ANCHOR_PHRASES[i], value));
  });
  lines.push('--- end of report ---');
  return lines;
}

export const SEVEN_VALUES = ['1200', '1150', '80', '60', '5', '45', '10'];

export class InMemoryReportSource implements ReportSource {
  readonly reads: string[] = [];

  constructor(private readonly reports: Map<string, string[]>) {}

  async listReports(): Promise<string[]> {
    return [...this.reports.keys()];
  }

  async readLines(filePath: string): Promise<string[]> {
    this.reads.push(filePath);
    const lines = this.reports.get(filePath);
    if (!lines) {
      throw new FileUnreadableError(filePath);
    }
    return lines;
  }
}
