// src/config/defaults.ts
import { ConsolidatorConfig, OffsetTable } from '../types/config.types';

// Phrases known to survive the encoding damage, in output column order
export const DEFAULT_ANCHOR_PHRASES: string[] = [
  'Total number of PODs requested - On Cycle',
  'Number of PODs OC with readings provided for entire configuration',
  'Total number of PODs requested - Exceptions',
  'Number of PODs EXC with readings provided for entire configuration',
  'Number of PODs EXC with no readings provided at all',
  'Number of PODs EXC with actual readings provided',
  'Number of PODs EXC with estimated readings provided'
];

// One heading per anchor phrase, same order
export const DEFAULT_COLUMN_HEADINGS: string[] = [
  'Total Number of PODs Requested on Cycle',
  'Number of PODs with Readings - Entire Config (On Cycle)',
  'Total Number of PODs Requested - Exceptions',
  'Number of PODs EXC with Readings Provided for Entire Configuration',
  'No Readings Provided at All (Exceptions)',
  'Actual Readings Provided - Exceptions',
  'Estimated Readings Provided - Exceptions'
];

export const MONTH_ABBREVIATIONS: string[] = [
  'JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN',
  'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'
];

export const MONTH_NAMES: string[] = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

export const CYCLES_PER_BILLING_MONTH = 21;

/**
 * Fixed label widths of the report layout. If reports stop landing in the
 * CSV, these are the first thing to check against a fresh sample report.
 */
export const REPORT_OFFSETS: OffsetTable = {
  readCycle: { start: 39, end: 41 },
  scheduleDay: { start: 46, end: 48 },
  scheduleMonth: { start: 49, end: 52 },
  scheduleYear: { start: 53, end: 55 },
  fieldValue: { start: 73 }
};

export const defaultConfig: ConsolidatorConfig = {
  reportsDir: 'reports',
  outputFile: 'output.csv',
  encoding: 'latin1',
  anchorPhrases: DEFAULT_ANCHOR_PHRASES,
  columnHeadings: DEFAULT_COLUMN_HEADINGS,
  cycleHeading: 'Cycle',
  cyclesPerBillingMonth: CYCLES_PER_BILLING_MONTH,
  monthAbbreviations: MONTH_ABBREVIATIONS,
  markers: {
    readCycle: 'Read Cycle {',
    scheduleDates: 'Schedule Dates'
  },
  offsets: REPORT_OFFSETS
};
