// src/utils/display.ts
import * as path from 'path';

/**
 * Shorten a report path for console output: directory stripped, and names
 * longer than maxLength cut to head...tail.
 */
export function truncateFileName(filePath: string, maxLength: number = 40): string {
  const name = path.basename(filePath);
  if (name.length <= maxLength) {
    return name;
  }
  const keep = Math.floor((maxLength - 3) / 2);
  return `${name.slice(0, keep)}...${name.slice(name.length - keep)}`;
}

export function formatScheduleDate(day: number, monthName: string, year: number): string {
  return `${monthName} ${day}, ${year}`;
}
