import { Readable } from 'stream';
import { describe, expect, it } from 'vitest';
import { curateStream, parseFormatDatesArgs } from '../scripts/lib/format-dates.js';
import { RecordParseError } from '../src/utils/records.js';
import { collectWarnings } from '../src/utils/warnings.js';

const EXPECTED_FORMATS = ['%Y-%m-%d', '%Y-%m', '%Y'];

describe('parseFormatDatesArgs', () => {
  it('collects values after each flag', () => {
    expect(
      parseFormatDatesArgs([
        '--date-fields', 'date', 'date_submitted',
        '--expected-date-formats', '%Y-%m-%d', '%Y',
        '--input', 'records.ndjson',
      ]),
    ).toEqual({
      dateFields: ['date', 'date_submitted'],
      expectedFormats: ['%Y-%m-%d', '%Y'],
      input: 'records.ndjson',
    });
  });

  it('leaves formats and input unset when not given', () => {
    expect(parseFormatDatesArgs(['--date-fields', 'date'])).toEqual({
      dateFields: ['date'],
      expectedFormats: null,
      input: null,
    });
  });

  it('replaces the values of a repeated flag', () => {
    expect(
      parseFormatDatesArgs([
        '--date-fields', 'date',
        '--expected-date-formats', '%Y',
        '--date-fields', 'collected',
        '--expected-date-formats', '%Y-%m',
      ]),
    ).toEqual({ dateFields: ['collected'], expectedFormats: ['%Y-%m'], input: null });
  });

  it('requires --date-fields', () => {
    expect(() => parseFormatDatesArgs(['--expected-date-formats', '%Y'])).toThrow(
      '--date-fields requires at least one field name',
    );
    expect(() => parseFormatDatesArgs(['--date-fields'])).toThrow('--date-fields requires at least one field name');
  });

  it('rejects an empty format list', () => {
    expect(() => parseFormatDatesArgs(['--date-fields', 'date', '--expected-date-formats'])).toThrow(
      '--expected-date-formats requires at least one format',
    );
  });

  it('rejects arguments outside a flag', () => {
    expect(() => parseFormatDatesArgs(['date', '--date-fields', 'date'])).toThrow('Unexpected argument: date');
    expect(() => parseFormatDatesArgs(['--date-fields', 'date', '--input', 'a.ndjson', 'extra'])).toThrow(
      'Unexpected argument: extra',
    );
  });

  it('requires a path after --input', () => {
    expect(() => parseFormatDatesArgs(['--date-fields', 'date', '--input'])).toThrow('--input requires a file path');
  });
});

describe('curateStream', () => {
  it('writes one curated line per record and skips blank lines', async () => {
    const { warn, warnings } = collectWarnings();
    const written: string[] = [];
    const stream = Readable.from([
      '{"id":1,"date":"2020-03"}\n',
      '\n',
      '{"id":2,"date":"circa 1990"}\n',
      '{"id":3}\n',
    ]);

    const count = await curateStream(stream, {
      dateFields: ['date'],
      expectedFormats: EXPECTED_FORMATS,
      warn,
      write: line => written.push(line),
    });

    expect(count).toBe(3);
    expect(written).toEqual([
      '{"id":1,"date":"2020-03-XX"}\n',
      '{"id":2,"date":"circa 1990"}\n',
      '{"id":3}\n',
    ]);
    expect(warnings).toEqual([
      'WARNING: Unable to transform date string "circa 1990" because it does not match any of the expected formats ["%Y-%m-%d","%Y-%m","%Y"].',
    ]);
  });

  it('stops at a malformed line and reports its number', async () => {
    const { warn } = collectWarnings();
    const written: string[] = [];
    const stream = Readable.from(['{"date":"2021"}\n', '\n', 'not json\n', '{"date":"2022"}\n']);

    const error = await curateStream(stream, {
      dateFields: ['date'],
      expectedFormats: EXPECTED_FORMATS,
      warn,
      write: line => written.push(line),
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RecordParseError);
    expect(error).toMatchObject({ lineNumber: 3 });
    expect(String(error)).toMatch(/^RecordParseError: Line 3: invalid JSON/);
    expect(written).toEqual(['{"date":"2021-XX-XX"}\n']);
  });

  it('rejects a line that is not a JSON object', async () => {
    const stream = Readable.from(['[1, 2]\n']);

    await expect(
      curateStream(stream, { dateFields: ['date'], expectedFormats: EXPECTED_FORMATS, warn: () => {}, write: () => {} }),
    ).rejects.toThrow('Line 1: expected a JSON object');
  });
});
