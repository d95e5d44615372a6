// src/services/TabularReportBuilder.ts
import { AnchorSpec, CsvRow } from '../types/report.types';
import { MONTH_NAMES } from '../config/defaults';
import { isCalendarMonth } from './BillingPeriodResolver';
import { ResultMatrix } from './ResultMatrix';

/**
 * Full month name for a section title. Months the billing heuristic pushed
 * past the calendar keep their raw number so they can be traced back.
 */
export function billingMonthLabel(month: number): string {
  if (isCalendarMonth(month)) {
    return MONTH_NAMES[month - 1];
  }
  return `Billing month ${month} (out of calendar range)`;
}

/**
 * Lays the matrix out as one section per billing month:
 *
 *   June
 *   Cycle,<heading>,<heading>...
 *   1,<value>,<value>...
 *   2,,,              <- expected cycle, no report
 *   ...
 *   ""                <- separator
 *
 * Not a flat table; it's meant to be read in a spreadsheet.
 */
export class TabularReportBuilder {
  constructor(
    private readonly anchors: AnchorSpec[],
    private readonly cycleHeading: string
  ) {}

  headingRow(): CsvRow {
    return [this.cycleHeading, ...this.anchors.map(anchor => anchor.heading)];
  }

  build(matrix: ResultMatrix): CsvRow[] {
    const rows: CsvRow[] = [];
    const cycles = matrix.cycles;

    for (const month of matrix.monthsWithData()) {
      for (let cycle = 1; cycle <= cycles; cycle++) {
        if (cycle === 1) {
          rows.push([billingMonthLabel(month)]);
          rows.push(this.headingRow());
        }

        const cell = matrix.get(month, cycle);
        if (cell.hasData) {
          rows.push([cycle, ...cell.fieldValues]);
        } else {
          rows.push([cycle, ...new Array<string>(this.anchors.length).fill('')]);
        }

        if (cycle === cycles) {
          rows.push(['']);
        }
      }
    }

    return rows;
  }
}
