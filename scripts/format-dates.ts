#!/usr/bin/env tsx
/**
 * Format date fields of NDJSON records to masked ISO 8601 (YYYY-MM-DD).
 *
 * Incomplete dates are masked with 'XX' (e.g. 2023 -> 2023-XX-XX). Dates that
 * match none of the expected formats are kept as they are and reported on
 * stderr.
 *
 * Usage:
 *   npm run format-dates -- --date-fields date date_submitted \
 *     --expected-date-formats '%Y-%m-%d' '%Y-%m' '%Y' < records.ndjson > curated.ndjson
 *   npm run format-dates -- --date-fields date --input records.ndjson
 *
 * If a date matches several formats, it is parsed with the first one listed.
 * Without --expected-date-formats the DATE_CURATE_EXPECTED_FORMATS defaults
 * apply.
 */

import * as fs from 'fs';
import { resolveExpectedFormats } from '../src/config.js';
import { stderrWarnings } from '../src/utils/warnings.js';
import { curateStream, parseFormatDatesArgs } from './lib/format-dates.js';

async function main(): Promise<void> {
  const { dateFields, expectedFormats, input } = parseFormatDatesArgs(process.argv.slice(2));
  const formats = expectedFormats ?? resolveExpectedFormats();
  const stream = input ? fs.createReadStream(input, 'utf-8') : process.stdin;

  const count = await curateStream(stream, {
    dateFields,
    expectedFormats: formats,
    warn: stderrWarnings,
    write: line => {
      process.stdout.write(line);
    },
  });

  console.error(`Formatted dates in ${count} record(s).`);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`ERROR: ${message}`);
  process.exit(1);
});
