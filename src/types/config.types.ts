// src/types/config.types.ts

/**
 * Character range within a report line. `end` is exclusive; when omitted the
 * range runs to the end of the line.
 */
export interface OffsetRange {
  start: number;
  end?: number;
}

export interface OffsetTable {
  readCycle: OffsetRange;
  scheduleDay: OffsetRange;
  scheduleMonth: OffsetRange;
  scheduleYear: OffsetRange;
  fieldValue: OffsetRange;
}

export interface MarkerPhrases {
  readCycle: string;
  scheduleDates: string;
}

export type ReportEncoding = 'latin1' | 'utf-8' | 'ascii';

export interface ConsolidatorConfig {
  reportsDir: string;
  outputFile: string;
  encoding: ReportEncoding;
  anchorPhrases: string[];
  columnHeadings: string[];
  cycleHeading: string;
  cyclesPerBillingMonth: number;
  monthAbbreviations: string[];
  markers: MarkerPhrases;
  offsets: OffsetTable;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingProfile {
  appendTimestamp: boolean;
  timestampFormat: string;
  logLevel: LogLevel;
  enableWarningLog: boolean;
  logDirectory: string;
}

export interface LoggingConfig {
  profile?: string;
  profiles?: Record<string, LoggingProfile>;
  appendTimestamp?: boolean;
  timestampFormat?: string;
  logLevel?: LogLevel;
  enableWarningLog?: boolean;
  logDirectory?: string;
}
