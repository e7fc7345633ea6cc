/**
 * Date curation over streams of metadata records (one JSON object per line).
 */

import { formatDate } from './format-date.js';
import { stderrWarnings, type WarningSink } from './warnings.js';

export type CurationRecord = Record<string, unknown>;

export interface FormatDateFieldsOptions {
  dateFields: readonly string[];
  expectedFormats: readonly string[];
  warn?: WarningSink;
}

export class RecordParseError extends Error {
  constructor(
    readonly lineNumber: number,
    detail: string,
  ) {
    super(`Line ${lineNumber}: ${detail}`);
    this.name = 'RecordParseError';
  }
}

function isRecord(value: unknown): value is CurationRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Yield a copy of each record with its date fields formatted. Only non-empty
 * string values are touched; the input records are left as they are.
 */
export function* formatDateFields(
  records: Iterable<CurationRecord>,
  options: FormatDateFieldsOptions,
): Generator<CurationRecord> {
  const warn = options.warn ?? stderrWarnings;

  for (const original of records) {
    const record: CurationRecord = { ...original };

    for (const field of options.dateFields) {
      const value = record[field];
      if (typeof value === 'string' && value) {
        record[field] = formatDate(value, options.expectedFormats, warn);
      }
    }

    yield record;
  }
}

/** Parse one NDJSON line. Blank lines give null. */
export function parseRecordLine(line: string, lineNumber: number): CurationRecord | null {
  if (line.trim().length === 0) return null;

  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RecordParseError(lineNumber, `invalid JSON (${message})`);
  }

  if (!isRecord(value)) {
    throw new RecordParseError(lineNumber, 'expected a JSON object');
  }
  return value;
}
