// src/parsers/LineScanner.ts
import { ConsolidatorConfig } from '../types/config.types';
import { AnchorMatch, AnchorSpec, ReportWarning, ScanResult, ScheduleDate } from '../types/report.types';
import { parseStrictInt, sliceRange } from '../utils/offsets';
import { Logger } from '../utils/logger';

type MetadataParse<T> = { value: T } | { reason: string };

/**
 * Single forward pass over one report. Anchors are plain substrings: the text
 * around them is too unpredictable (mojibake, stray mail headers) for anything
 * more structured. Metadata values sit at fixed offsets on the marker lines.
 */
export class LineScanner {
  private readonly logger = new Logger('LineScanner');

  constructor(
    private readonly config: ConsolidatorConfig,
    private readonly anchors: AnchorSpec[]
  ) {}

  scan(lines: string[], fileName: string): ScanResult {
    const matches: AnchorMatch[] = this.anchors.map(anchor => ({ anchor }));
    const warnings: ReportWarning[] = [];
    let readCycleLine: { text: string; lineNumber: number } | undefined;
    let scheduleLine: { text: string; lineNumber: number } | undefined;

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index];
      const lineNumber = index + 1;

      if (!readCycleLine && line.includes(this.config.markers.readCycle)) {
        readCycleLine = { text: line, lineNumber };
      }
      if (!scheduleLine && line.includes(this.config.markers.scheduleDates)) {
        scheduleLine = { text: line, lineNumber };
      }

      for (const match of matches) {
        if (match.line === undefined && line.includes(match.anchor.phrase)) {
          match.line = line;
          match.lineNumber = lineNumber;
        }
      }
    }

    let readCycle: number | undefined;
    if (!readCycleLine) {
      warnings.push(this.warning('ReadCycleMissing', fileName,
        `${fileName} has no "${this.config.markers.readCycle}" line. If this report has no read schedule, this is normal.`));
    } else {
      const parsed = this.parseReadCycle(readCycleLine.text);
      if ('value' in parsed) {
        readCycle = parsed.value;
      } else {
        warnings.push(this.warning('ReadCycleMissing', fileName,
          `${fileName} appears to not have a read cycle (line ${readCycleLine.lineNumber}: ${parsed.reason}). If this report has no read schedule, this is normal.`));
      }
    }

    let schedule: ScheduleDate | undefined;
    if (!scheduleLine) {
      warnings.push(this.warning('ScheduleDateMissing', fileName,
        `${fileName} has no "${this.config.markers.scheduleDates}" line. If this report has no read schedule, this is normal.`));
    } else {
      const parsed = this.parseScheduleDate(scheduleLine.text);
      if ('value' in parsed) {
        schedule = parsed.value;
      } else {
        warnings.push(this.warning('ScheduleDateMissing', fileName,
          `${fileName} appears to not have a schedule date (line ${scheduleLine.lineNumber}: ${parsed.reason}). If this report has no read schedule, this is normal.`));
      }
    }

    const found = matches.filter(match => match.line !== undefined).length;
    this.logger.debug(`${fileName}: ${lines.length} lines, ${found}/${matches.length} anchors matched`);

    return { readCycle, schedule, matches, warnings };
  }

  parseReadCycle(line: string): MetadataParse<number> {
    const slice = sliceRange(line, this.config.offsets.readCycle);
    if (!slice.ok) return { reason: slice.reason };

    const cycle = parseStrictInt(slice.text);
    if (cycle === null) return { reason: `"${slice.text}" is not a cycle number` };
    return { value: cycle };
  }

  parseScheduleDate(line: string): MetadataParse<ScheduleDate> {
    const { scheduleDay, scheduleMonth, scheduleYear } = this.config.offsets;

    const daySlice = sliceRange(line, scheduleDay);
    if (!daySlice.ok) return { reason: daySlice.reason };
    const day = parseStrictInt(daySlice.text);
    if (day === null || day < 1 || day > 31) {
      return { reason: `"${daySlice.text}" is not a day of the month` };
    }

    const monthSlice = sliceRange(line, scheduleMonth);
    if (!monthSlice.ok) return { reason: monthSlice.reason };
    const monthIndex = this.config.monthAbbreviations.indexOf(monthSlice.text);
    if (monthIndex < 0) {
      return { reason: `"${monthSlice.text}" is not a known month abbreviation` };
    }

    const yearSlice = sliceRange(line, scheduleYear);
    if (!yearSlice.ok) return { reason: yearSlice.reason };
    const shortYear = parseStrictInt(yearSlice.text);
    if (shortYear === null || shortYear < 0) {
      return { reason: `"${yearSlice.text}" is not a two-digit year` };
    }

    // Century is not in the report; everything is assumed to be 20xx
    return { value: { day, month: monthIndex + 1, year: 2000 + shortYear } };
  }

  private warning(kind: ReportWarning['kind'], fileName: string, message: string): ReportWarning {
    return { kind, fileName, message };
  }
}
