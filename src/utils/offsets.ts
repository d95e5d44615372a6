// src/utils/offsets.ts
import { OffsetRange, OffsetTable } from '../types/config.types';

export type SliceResult =
  | { ok: true; text: string }
  | { ok: false; reason: string };

/**
 * Minimum line length needed before a range can be read. Open-ended ranges
 * need at least one character past `start`.
 */
export function requiredLength(range: OffsetRange): number {
  return range.end ?? range.start + 1;
}

/**
 * Cut a fixed-offset range out of a line, guarding against lines that are
 * too short to contain it.
 */
export function sliceRange(line: string, range: OffsetRange): SliceResult {
  const needed = requiredLength(range);
  if (line.length < needed) {
    return {
      ok: false,
      reason: `line is ${line.length} characters, at least ${needed} needed to read columns ${describeRange(range)}`
    };
  }
  return { ok: true, text: line.substring(range.start, range.end) };
}

export function describeRange(range: OffsetRange): string {
  return range.end === undefined ? `${range.start}+` : `${range.start}-${range.end}`;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Base-10 integer with optional sign and surrounding whitespace. Anything else
 * (blank, "N/A", "1,234", "12.5") is rejected.
 */
export function parseStrictInt(text: string): number | null {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

const OFFSET_NAMES: Array<keyof OffsetTable> = [
  'readCycle',
  'scheduleDay',
  'scheduleMonth',
  'scheduleYear',
  'fieldValue'
];

/**
 * Problems with an offset table, empty when it is usable.
 */
export function validateOffsetTable(offsets: OffsetTable): string[] {
  const issues: string[] = [];

  for (const name of OFFSET_NAMES) {
    const range = offsets[name];
    if (!Number.isInteger(range.start) || range.start < 0) {
      issues.push(`offsets.${name}.start must be a non-negative integer`);
    }
    if (range.end !== undefined && (!Number.isInteger(range.end) || range.end <= range.start)) {
      issues.push(`offsets.${name}.end must be an integer greater than start`);
    }
  }

  // The schedule date parts are read from the same line and must not overlap
  const scheduleParts: Array<[string, OffsetRange]> = [
    ['scheduleDay', offsets.scheduleDay],
    ['scheduleMonth', offsets.scheduleMonth],
    ['scheduleYear', offsets.scheduleYear]
  ];
  for (let i = 0; i < scheduleParts.length; i++) {
    for (let j = i + 1; j < scheduleParts.length; j++) {
      const [nameA, a] = scheduleParts[i];
      const [nameB, b] = scheduleParts[j];
      if (rangesOverlap(a, b)) {
        issues.push(`offsets.${nameA} overlaps offsets.${nameB}`);
      }
    }
  }

  return issues;
}

function rangesOverlap(a: OffsetRange, b: OffsetRange): boolean {
  const aEnd = a.end ?? Number.POSITIVE_INFINITY;
  const bEnd = b.end ?? Number.POSITIVE_INFINITY;
  return a.start < bEnd && b.start < aEnd;
}
