/**
 * strptime-style parsing of date strings against strftime format patterns.
 *
 * A format compiles to a case-insensitive regular expression anchored at the
 * start of the input (C locale names). The match is greedy and follows the
 * order of each directive's alternatives; input left over after the match
 * fails the parse. Fields the format does not set default to 1900-01-01.
 */

import { addDays, getDaysInMonth, getISODay, startOfISOWeek } from 'date-fns';

export interface ParsedDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];
const MONTH_ABBREVIATIONS = MONTH_NAMES.map(name => name.slice(0, 3));

// Monday first, matching the weekday numbering below (Monday = 0).
const WEEKDAY_NAMES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];
const WEEKDAY_ABBREVIATIONS = WEEKDAY_NAMES.map(name => name.slice(0, 3));

const DEFAULT_YEAR = 1900;
const MIN_YEAR = 1;
const MAX_YEAR = 9999;

/** Alternation with the longest names first. */
function namesPattern(names: readonly string[]): string {
  return [...names].sort((a, b) => b.length - a.length).join('|');
}

const FIELD_PATTERNS = {
  a: namesPattern(WEEKDAY_ABBREVIATIONS),
  A: namesPattern(WEEKDAY_NAMES),
  b: namesPattern(MONTH_ABBREVIATIONS),
  B: namesPattern(MONTH_NAMES),
  d: '3[01]|[12]\\d|0[1-9]|[1-9]| [1-9]',
  f: '[0-9]{1,6}',
  G: '\\d\\d\\d\\d',
  H: '2[0-3]|[0-1]\\d|\\d',
  I: '1[0-2]|0[1-9]|[1-9]',
  j: '36[0-6]|3[0-5]\\d|[12]\\d\\d|0[1-9]\\d|00[1-9]|[1-9]\\d|0[1-9]|[1-9]',
  m: '1[0-2]|0[1-9]|[1-9]',
  M: '[0-5]\\d|\\d',
  p: 'am|pm',
  S: '6[0-1]|[0-5]\\d|\\d',
  u: '[1-7]',
  U: '5[0-3]|[0-4]\\d|\\d',
  V: '5[0-3]|0[1-9]|[1-4]\\d|\\d',
  w: '[0-6]',
  W: '5[0-3]|[0-4]\\d|\\d',
  y: '\\d\\d',
  Y: '\\d\\d\\d\\d',
  z: '[+-]\\d\\d:?[0-5]\\d(?::?[0-5]\\d(?:\\.\\d{1,6})?)?|z',
  Z: 'utc|gmt',
} satisfies Record<string, string>;

type FieldCode = keyof typeof FIELD_PATTERNS;

/** Locale composites (C locale). */
const COMPOSITES = new Map<string, string>([
  ['c', '%a %b %d %H:%M:%S %Y'],
  ['x', '%m/%d/%y'],
  ['X', '%H:%M:%S'],
]);

interface CompiledFormat {
  regex: RegExp;
  /** Field directive of each capture group, in group order. */
  fields: FieldCode[];
}

interface FormatAccumulator {
  source: string;
  fields: FieldCode[];
}

function isFieldCode(code: string): code is FieldCode {
  return Object.prototype.hasOwnProperty.call(FIELD_PATTERNS, code);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function appendFormat(format: string, out: FormatAccumulator): boolean {
  let index = 0;

  while (index < format.length) {
    const char = format[index];

    if (char === '%') {
      const code = format.charAt(index + 1);
      index += 2;

      if (code === '%') {
        out.source += '%';
        continue;
      }

      const composite = COMPOSITES.get(code);
      if (composite !== undefined) {
        if (!appendFormat(composite, out)) return false;
        continue;
      }

      // Unknown directive, or a stray '%' at the end of the format
      if (!isFieldCode(code)) return false;

      out.source += `(${FIELD_PATTERNS[code]})`;
      out.fields.push(code);
      continue;
    }

    const whitespace = /^\s+/.exec(format.slice(index));
    if (whitespace) {
      out.source += '\\s+';
      index += whitespace[0].length;
      continue;
    }

    out.source += escapeRegExp(char);
    index += 1;
  }

  return true;
}

const compiledFormats = new Map<string, CompiledFormat | null>();

function compileFormat(format: string): CompiledFormat | null {
  const cached = compiledFormats.get(format);
  if (cached !== undefined) return cached;

  const out: FormatAccumulator = { source: '', fields: [] };
  const compiled = appendFormat(format, out)
    ? { regex: new RegExp(`^(?:${out.source})`, 'i'), fields: out.fields }
    : null;
  compiledFormats.set(format, compiled);
  return compiled;
}

/** Whether `format` only uses directives the parser understands. */
export function isSupportedFormat(format: string): boolean {
  return compileFormat(format) !== null;
}

interface RawFields {
  year?: number;
  month: number;
  day: number;
  second: number;
  julian?: number;
  weekOfYear?: number;
  weekStartsMonday: boolean;
  isoYear?: number;
  isoWeek?: number;
  /** Monday = 0 */
  weekday?: number;
}

function collectFields(captures: readonly [FieldCode, string][]): RawFields {
  const fields: RawFields = { month: 1, day: 1, second: 0, weekStartsMonday: false };

  for (const [code, raw] of captures) {
    const value = raw.toLowerCase();

    switch (code) {
      case 'y': {
        const twoDigit = Number(value);
        fields.year = twoDigit <= 68 ? twoDigit + 2000 : twoDigit + 1900;
        break;
      }
      case 'Y':
        fields.year = Number(value);
        break;
      case 'G':
        fields.isoYear = Number(value);
        break;
      case 'm':
        fields.month = Number(value);
        break;
      case 'b':
        fields.month = MONTH_ABBREVIATIONS.indexOf(value) + 1;
        break;
      case 'B':
        fields.month = MONTH_NAMES.indexOf(value) + 1;
        break;
      case 'd':
        fields.day = Number(value);
        break;
      case 'S':
        fields.second = Number(value);
        break;
      case 'a':
        fields.weekday = WEEKDAY_ABBREVIATIONS.indexOf(value);
        break;
      case 'A':
        fields.weekday = WEEKDAY_NAMES.indexOf(value);
        break;
      case 'w': {
        const sundayFirst = Number(value);
        fields.weekday = sundayFirst === 0 ? 6 : sundayFirst - 1;
        break;
      }
      case 'u':
        fields.weekday = Number(value) - 1;
        break;
      case 'j':
        fields.julian = Number(value);
        break;
      case 'U':
        fields.weekOfYear = Number(value);
        fields.weekStartsMonday = false;
        break;
      case 'W':
        fields.weekOfYear = Number(value);
        fields.weekStartsMonday = true;
        break;
      case 'V':
        fields.isoWeek = Number(value);
        break;
      default:
        // Time of day and zone: matched, but they do not move the calendar date
        break;
    }
  }

  return fields;
}

/** Local-time date that also works for years 0-99, which `new Date(y, m, d)` maps to 19xx. */
function calendarDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(2000, 0, 1);
  date.setFullYear(year, monthIndex, day);
  return date;
}

function toParsedDate(date: Date): ParsedDate | null {
  const year = date.getFullYear();
  if (year < MIN_YEAR || year > MAX_YEAR) return null;
  return { year, month: date.getMonth() + 1, day: date.getDate() };
}

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (year < MIN_YEAR || year > MAX_YEAR) return false;
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= getDaysInMonth(calendarDate(year, month - 1, 1));
}

/** 1-based day of year for a %U/%W week number and weekday; may fall outside the year. */
function julianFromWeekOfYear(
  year: number,
  weekOfYear: number,
  weekday: number,
  weekStartsMonday: boolean,
): number {
  let firstWeekday = getISODay(calendarDate(year, 0, 1)) - 1;
  let dayOfWeek = weekday;

  if (!weekStartsMonday) {
    firstWeekday = (firstWeekday + 1) % 7;
    dayOfWeek = (dayOfWeek + 1) % 7;
  }

  const weekZeroLength = (7 - firstWeekday) % 7;
  if (weekOfYear === 0) {
    return 1 + dayOfWeek - firstWeekday;
  }
  return 1 + weekZeroLength + 7 * (weekOfYear - 1) + dayOfWeek;
}

/** Week 0 and weeks past the end of the ISO year roll over into the neighbouring year. */
function fromIsoWeekDate(isoYear: number, isoWeek: number, weekday: number): ParsedDate | null {
  const fourthOfJanuary = calendarDate(isoYear, 0, 4);
  return toParsedDate(addDays(startOfISOWeek(fourthOfJanuary), (isoWeek - 1) * 7 + weekday));
}

function resolveDate(fields: RawFields): ParsedDate | null {
  const { isoYear, isoWeek, weekday, weekOfYear } = fields;

  if (fields.year === undefined && isoYear !== undefined) {
    // %G needs %V and a weekday, and cannot be combined with %j
    if (isoWeek === undefined || weekday === undefined) return null;
    if (fields.julian !== undefined) return null;
  } else if (weekOfYear === undefined && isoWeek !== undefined) {
    // %V without %G, or alongside %Y
    return null;
  }

  if (fields.second > 59) return null;

  const year = fields.year ?? DEFAULT_YEAR;
  let julian = fields.julian;

  if (julian === undefined && weekday !== undefined) {
    if (weekOfYear !== undefined) {
      julian = julianFromWeekOfYear(year, weekOfYear, weekday, fields.weekStartsMonday);
    } else if (isoYear !== undefined && isoWeek !== undefined) {
      return fromIsoWeekDate(isoYear, isoWeek, weekday);
    }
  }

  if (julian !== undefined) {
    return toParsedDate(addDays(calendarDate(year, 0, 1), julian - 1));
  }

  if (!isValidCalendarDate(year, fields.month, fields.day)) return null;
  return { year, month: fields.month, day: fields.day };
}

/**
 * Parse `dateString` strictly against a strftime `format`.
 *
 * Returns null when the string does not fit the format, the format uses an
 * unknown directive, or the fields do not form a real calendar date.
 *
 * @example
 * parseDate('2020-1-15', '%Y-%m-%d')   // { year: 2020, month: 1, day: 15 }
 * parseDate('01-01', '%Y-%m')          // null
 */
export function parseDate(dateString: string, format: string): ParsedDate | null {
  const compiled = compileFormat(format);
  if (!compiled) return null;

  const found = compiled.regex.exec(dateString);
  if (!found || found[0].length !== dateString.length) return null;

  const captures = compiled.fields.map((code, index): [FieldCode, string] => [code, found[index + 1]]);
  // The UTC designator of %z is case-sensitive, unlike the rest of the pattern
  if (captures.some(([code, raw]) => code === 'z' && raw === 'z')) return null;

  return resolveDate(collectFields(captures));
}
