// src/types/report.types.ts

export const MISSING_MARKER = 'Missing' as const;
export type MissingMarker = typeof MISSING_MARKER;

export type FieldValue = number | MissingMarker;

export interface AnchorSpec {
  phrase: string;
  heading: string;
  column: number;  // 1-based; column 0 holds the cycle
}

export interface ScheduleDate {
  day: number;
  month: number;
  year: number;
}

/** Anchor line as found by the scanner, before its value is parsed */
export interface AnchorMatch {
  anchor: AnchorSpec;
  line?: string;
  lineNumber?: number;
}

export interface ScanResult {
  readCycle?: number;
  schedule?: ScheduleDate;
  matches: AnchorMatch[];
  warnings: ReportWarning[];
}

export interface ReportRecord {
  fileName: string;
  readCycle?: number;
  schedule?: ScheduleDate;
  fieldValues: FieldValue[];
}

export interface BillingCell {
  billingMonth: number;
  cycle: number;
  fieldValues: FieldValue[];
  hasData: boolean;
  sourceFile?: string;
}

export type ReportWarningKind =
  | 'ScheduleDateMissing'
  | 'ReadCycleMissing'
  | 'CellCollision'
  | 'BillingMonthOutOfRange'
  | 'CycleOutOfRange';

export interface ReportWarning {
  kind: ReportWarningKind;
  fileName: string;
  message: string;
}

export interface ReportOutcome {
  fileName: string;
  status: 'merged' | 'skipped';
  readCycle?: number;
  schedule?: ScheduleDate;
  billingMonth?: number;
}

export type CsvField = string | number;
export type CsvRow = CsvField[];
