// src/parsers/FieldExtractor.ts
import { OffsetRange } from '../types/config.types';
import { AnchorMatch, FieldValue, MISSING_MARKER } from '../types/report.types';
import { FieldParseFailureError } from '../errors/ConsolidationError';
import { parseStrictInt, sliceRange } from '../utils/offsets';

export class FieldExtractor {
  constructor(private readonly valueRange: OffsetRange) {}

  /**
   * One value per anchor, in column order. An unmatched anchor is reported as
   * Missing; a matched line whose value is not an integer means the layout has
   * drifted and nothing from this run can be trusted.
   */
  extract(matches: AnchorMatch[], fileName: string): FieldValue[] {
    return matches.map(match => this.extractValue(match, fileName));
  }

  extractValue(match: AnchorMatch, fileName: string): FieldValue {
    if (match.line === undefined) {
      return MISSING_MARKER;
    }

    const slice = sliceRange(match.line, this.valueRange);
    if (!slice.ok) {
      throw new FieldParseFailureError(fileName, match.anchor.phrase, match.line, slice.reason, match.lineNumber);
    }

    const value = parseStrictInt(slice.text);
    if (value === null) {
      throw new FieldParseFailureError(
        fileName,
        match.anchor.phrase,
        slice.text.trim(),
        `"${slice.text.trim()}" is not an integer`,
        match.lineNumber
      );
    }
    return value;
  }
}
