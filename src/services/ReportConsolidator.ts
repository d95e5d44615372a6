// src/services/ReportConsolidator.ts
import * as path from 'path';
import { ConsolidatorConfig } from '../types/config.types';
import { AnchorSpec, CsvRow, ReportOutcome, ReportRecord, ReportWarning } from '../types/report.types';
import { buildAnchorSpec } from '../config/config-loader';
import { MONTH_NAMES } from '../config/defaults';
import { LineScanner } from '../parsers/LineScanner';
import { FieldExtractor } from '../parsers/FieldExtractor';
import { resolveBillingPeriod } from './BillingPeriodResolver';
import { ResultMatrix } from './ResultMatrix';
import { TabularReportBuilder, billingMonthLabel } from './TabularReportBuilder';
import { ReportSource } from './ReportSource';
import { Logger } from '../utils/logger';
import { formatScheduleDate } from '../utils/display';

export interface ConsolidationResult {
  filesFound: number;
  outcomes: ReportOutcome[];
  warnings: ReportWarning[];
  matrix: ResultMatrix;
  rows: CsvRow[];
}

/**
 * Runs every report through scan -> extract -> resolve -> merge, one file at a
 * time, then lays the matrix out as rows. Writing the rows and cleaning up the
 * inputs are left to the caller.
 *
 * Any ConsolidationError thrown from here is fatal for the run.
 */
export class ReportConsolidator {
  private readonly logger = new Logger('ReportConsolidator');
  private readonly anchors: AnchorSpec[];
  private readonly scanner: LineScanner;
  private readonly extractor: FieldExtractor;
  private readonly builder: TabularReportBuilder;

  constructor(
    private readonly config: ConsolidatorConfig,
    private readonly source: ReportSource
  ) {
    this.anchors = buildAnchorSpec(config);
    this.scanner = new LineScanner(config, this.anchors);
    this.extractor = new FieldExtractor(config.offsets.fieldValue);
    this.builder = new TabularReportBuilder(this.anchors, config.cycleHeading);
  }

  async consolidate(): Promise<ConsolidationResult> {
    const files = await this.source.listReports();
    const matrix = new ResultMatrix(this.anchors.length, this.config.cyclesPerBillingMonth);
    const outcomes: ReportOutcome[] = [];
    const warnings: ReportWarning[] = [];

    this.logger.info(files.length === 1 ? '1 report found.' : `${files.length} reports found.`);

    for (const file of files) {
      const lines = await this.source.readLines(file);
      const record = this.extractRecord(file, lines, warnings);
      outcomes.push(this.mergeRecord(record, matrix, warnings));
    }

    const rows = this.builder.build(matrix);
    return { filesFound: files.length, outcomes, warnings, matrix, rows };
  }

  /**
   * Scan and extract one report. Throws FieldParseFailureError on layout drift.
   */
  extractRecord(fileName: string, lines: string[], warnings: ReportWarning[] = []): ReportRecord {
    const scan = this.scanner.scan(lines, fileName);
    for (const warning of scan.warnings) {
      this.report(warning, warnings);
    }

    return {
      fileName,
      readCycle: scan.readCycle,
      schedule: scan.schedule,
      fieldValues: this.extractor.extract(scan.matches, fileName)
    };
  }

  /**
   * Place a record in its billing cell. Records without a schedule day or a
   * read cycle carry no billable data and are skipped.
   */
  mergeRecord(record: ReportRecord, matrix: ResultMatrix, warnings: ReportWarning[] = []): ReportOutcome {
    const { fileName, schedule, readCycle } = record;
    if (!schedule || readCycle === undefined) {
      this.logger.info(`${path.basename(fileName)} carries no schedule data, skipped`);
      return { fileName, status: 'skipped', schedule, readCycle };
    }

    const period = resolveBillingPeriod(
      { scheduleDay: schedule.day, scheduleMonth: schedule.month, readCycle },
      this.config.cyclesPerBillingMonth
    );
    const { billingMonth } = period;

    if (period.outOfRange) {
      this.report({
        kind: 'BillingMonthOutOfRange',
        fileName,
        message: `${fileName} resolved to billing month ${billingMonth} (schedule ${schedule.day}/${schedule.month}/${schedule.year}, cycle ${readCycle}); there is no year rollover, it is reported as "${billingMonthLabel(billingMonth)}"`
      }, warnings);
    }
    if (readCycle < 1 || readCycle > this.config.cyclesPerBillingMonth) {
      this.report({
        kind: 'CycleOutOfRange',
        fileName,
        message: `${fileName} has read cycle ${readCycle}, outside 1..${this.config.cyclesPerBillingMonth}; it is stored but will not appear in the CSV`
      }, warnings);
    }

    const { collision } = matrix.put(billingMonth, readCycle, record.fieldValues, fileName);
    if (collision) {
      this.report({
        kind: 'CellCollision',
        fileName,
        message: `${fileName} overwrote ${billingMonthLabel(billingMonth)} cycle ${readCycle}, previously filled from ${collision.sourceFile ?? 'an unnamed source'}`
      }, warnings);
    }

    this.logger.info(
      `Data in ${fileName} found for ${formatScheduleDate(schedule.day, MONTH_NAMES[schedule.month - 1], schedule.year)}, ` +
      `cycle ${readCycle}. Report interpreted for ${billingMonthLabel(billingMonth)} billing month.`
    );

    return { fileName, status: 'merged', schedule, readCycle, billingMonth };
  }

  private report(warning: ReportWarning, warnings: ReportWarning[]): void {
    this.logger.warn(warning.message);
    warnings.push(warning);
  }
}
