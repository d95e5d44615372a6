// src/index.ts
export * from './types/config.types';
export * from './types/report.types';
export * from './errors/ConsolidationError';
export { defaultConfig, MONTH_ABBREVIATIONS, MONTH_NAMES, REPORT_OFFSETS } from './config/defaults';
export { loadConsolidatorConfig, validateConfig, buildAnchorSpec } from './config/config-loader';
export { LineScanner } from './parsers/LineScanner';
export { FieldExtractor } from './parsers/FieldExtractor';
export { resolveBillingPeriod, resolveBillingMonth, isCalendarMonth } from './services/BillingPeriodResolver';
export { ResultMatrix } from './services/ResultMatrix';
export { TabularReportBuilder, billingMonthLabel } from './services/TabularReportBuilder';
export { ReportConsolidator, ConsolidationResult } from './services/ReportConsolidator';
export { ReportSource, DirectoryReportSource } from './services/ReportSource';
export { CsvReportWriter, RowWriter } from './services/CsvReportWriter';
export { ReportPurger, InteractiveReportPurger, FixedAnswerReportPurger, parseYesNo } from './services/ReportPurger';
export { formatCsv } from './utils/csv';
