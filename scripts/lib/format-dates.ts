/**
 * Argument parsing and NDJSON plumbing for scripts/format-dates.ts.
 */

import * as readline from 'readline';
import { formatDateFields, parseRecordLine, type CurationRecord } from '../../src/utils/records.js';
import type { WarningSink } from '../../src/utils/warnings.js';

export interface FormatDatesArgs {
  dateFields: string[];
  expectedFormats: string[] | null;
  input: string | null;
}

/**
 * Parse `--date-fields f1 f2 ... [--expected-date-formats fmt1 ...] [--input file]`.
 * A repeated list flag replaces the values given before it.
 */
export function parseFormatDatesArgs(args: readonly string[]): FormatDatesArgs {
  let dateFields: string[] = [];
  let expectedFormats: string[] | null = null;
  let input: string | null = null;
  let collecting: string[] | null = null;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--date-fields') {
      dateFields = [];
      collecting = dateFields;
    } else if (arg === '--expected-date-formats') {
      expectedFormats = [];
      collecting = expectedFormats;
    } else if (arg === '--input') {
      if (!args[i + 1]) throw new Error('--input requires a file path');
      input = args[i + 1];
      collecting = null;
      i++;
    } else if (collecting) {
      collecting.push(arg);
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (dateFields.length === 0) {
    throw new Error('--date-fields requires at least one field name');
  }
  if (expectedFormats !== null && expectedFormats.length === 0) {
    throw new Error('--expected-date-formats requires at least one format');
  }

  return { dateFields, expectedFormats, input };
}

/** Records of an NDJSON stream; blank lines are skipped, line numbers start at 1. */
export async function* readRecords(stream: NodeJS.ReadableStream): AsyncGenerator<CurationRecord> {
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    const record = parseRecordLine(line, lineNumber);
    if (record) yield record;
  }
}

export interface CurateStreamOptions {
  dateFields: readonly string[];
  expectedFormats: readonly string[];
  warn: WarningSink;
  write: (line: string) => void;
}

/** Curate every record of `stream`, writing one JSON line each. Returns the record count. */
export async function curateStream(stream: NodeJS.ReadableStream, options: CurateStreamOptions): Promise<number> {
  const { dateFields, expectedFormats, warn, write } = options;
  let count = 0;

  for await (const record of readRecords(stream)) {
    for (const curated of formatDateFields([record], { dateFields, expectedFormats, warn })) {
      write(`${JSON.stringify(curated)}\n`);
      count++;
    }
  }

  return count;
}
