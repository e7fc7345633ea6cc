/**
 * Partial date normalization to masked ISO 8601 (YYYY-MM-DD).
 *
 * Components the matched format cannot determine are masked with 'XX'
 * ('XXXX' for the year) instead of taking the parser's defaults.
 */

import {
  ALL_FIELD_DIRECTIVES,
  DAY_DIRECTIVES,
  MONTH_AND_DAY_DIRECTIVES,
  MONTH_DIRECTIVES,
  YEAR_DIRECTIVES,
  directiveIsIncluded,
} from './directives.js';
import { parseDate, type ParsedDate } from './strptime.js';
import { stderrWarnings, type WarningSink } from './warnings.js';

export const YEAR_MASK = 'XXXX';
export const MONTH_MASK = 'XX';
export const DAY_MASK = 'XX';

export interface RevealedFields {
  year: boolean;
  month: boolean;
  day: boolean;
}

export interface DateMatch {
  format: string;
  parsed: ParsedDate;
  revealed: RevealedFields;
  formatted: string;
}

const NOTHING: RevealedFields = { year: false, month: false, day: false };
const EVERYTHING: RevealedFields = { year: true, month: true, day: true };

/**
 * Which of year, month and day a format conveys.
 *
 * Month is only revealed alongside a year, and day only alongside a month,
 * unless the format carries a directive that encodes a complete date on its
 * own (%c, %x, ISO week dates). A month/day format without a year reveals
 * nothing.
 */
export function classifyFormat(format: string): RevealedFields {
  if (directiveIsIncluded(ALL_FIELD_DIRECTIVES, format)) {
    return { ...EVERYTHING };
  }

  if (!directiveIsIncluded(YEAR_DIRECTIVES, format)) {
    return { ...NOTHING };
  }

  if (directiveIsIncluded(MONTH_AND_DAY_DIRECTIVES, format)) {
    return { ...EVERYTHING };
  }

  if (directiveIsIncluded(MONTH_DIRECTIVES, format)) {
    return { year: true, month: true, day: directiveIsIncluded(DAY_DIRECTIVES, format) };
  }

  return { year: true, month: false, day: false };
}

export function maskDate(parsed: ParsedDate, revealed: RevealedFields): string {
  const year = revealed.year ? String(parsed.year).padStart(4, '0') : YEAR_MASK;
  const month = revealed.month ? String(parsed.month).padStart(2, '0') : MONTH_MASK;
  const day = revealed.day ? String(parsed.day).padStart(2, '0') : DAY_MASK;
  return `${year}-${month}-${day}`;
}

/** First format in `expectedFormats` that parses `dateString`, or null. */
export function matchDate(dateString: string, expectedFormats: readonly string[]): DateMatch | null {
  for (const format of expectedFormats) {
    const parsed = parseDate(dateString, format);
    if (!parsed) continue;

    const revealed = classifyFormat(format);
    return { format, parsed, revealed, formatted: maskDate(parsed, revealed) };
  }
  return null;
}

export function unmatchedDateWarning(dateString: string, expectedFormats: readonly string[]): string {
  return (
    `WARNING: Unable to transform date string ${JSON.stringify(dateString)} because it does not match ` +
    `any of the expected formats ${JSON.stringify(expectedFormats)}.`
  );
}

/**
 * Format `dateString` as a masked ISO 8601 date.
 *
 * Formats are tried in order and the FIRST one that parses wins, even when a
 * later format would also match: order `expectedFormats` from most to least
 * specific.
 *
 * - `''` is returned as is, without a warning.
 * - A string that matches no format is returned unchanged and reported
 *   through `warn`.
 *
 * @example
 * const formats = ['%Y', '%Y-%m', '%Y-%m-%d', '%m-%d'];
 * formatDate('2020-01', formats)  // '2020-01-XX'
 * formatDate('01-01', formats)    // 'XXXX-XX-XX'
 */
export function formatDate(
  dateString: string,
  expectedFormats: readonly string[],
  warn: WarningSink = stderrWarnings,
): string {
  if (!dateString) return dateString;

  const match = matchDate(dateString, expectedFormats);
  if (match) return match.formatted;

  warn(unmatchedDateWarning(dateString, expectedFormats));
  return dateString;
}
