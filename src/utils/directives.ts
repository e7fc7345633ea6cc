/**
 * strftime directive tables used to decide which date fields a format conveys.
 *
 * A group is either a single directive or a tuple of directives that only
 * determine a field when they all appear together (e.g. ISO year + ISO week +
 * weekday pin down a full calendar date, none of them does alone).
 */

export type Directive = `%${string}`;

export type DirectiveGroup = Directive | readonly Directive[];

export type DirectiveGroupSet = ReadonlySet<DirectiveGroup>;

export type PrecisionLevel = 'allFields' | 'monthAndDay' | 'year' | 'month' | 'day';

const WEEKDAY_DIRECTIVES: readonly Directive[] = ['%A', '%a', '%w', '%u'];

function withEachWeekday(...directives: Directive[]): readonly Directive[][] {
  return WEEKDAY_DIRECTIVES.map(weekday => [...directives, weekday]);
}

/** Locale date/datetime, or ISO year + ISO week + weekday. */
export const ALL_FIELD_DIRECTIVES: DirectiveGroupSet = new Set<DirectiveGroup>([
  '%c',
  '%x',
  ...withEachWeekday('%G', '%V'),
]);

/** Day of year, or week of year + weekday. Only meaningful alongside a year. */
export const MONTH_AND_DAY_DIRECTIVES: DirectiveGroupSet = new Set<DirectiveGroup>([
  '%j',
  ...withEachWeekday('%U'),
  ...withEachWeekday('%W'),
]);

export const YEAR_DIRECTIVES: DirectiveGroupSet = new Set<DirectiveGroup>(['%y', '%Y']);

export const MONTH_DIRECTIVES: DirectiveGroupSet = new Set<DirectiveGroup>(['%b', '%B', '%m']);

export const DAY_DIRECTIVES: DirectiveGroupSet = new Set<DirectiveGroup>(['%d']);

export const PRECISION_LEVELS: readonly PrecisionLevel[] = ['allFields', 'monthAndDay', 'year', 'month', 'day'];

export const DIRECTIVE_TABLES: Readonly<Record<PrecisionLevel, DirectiveGroupSet>> = Object.freeze({
  allFields: ALL_FIELD_DIRECTIVES,
  monthAndDay: MONTH_AND_DAY_DIRECTIVES,
  year: YEAR_DIRECTIVES,
  month: MONTH_DIRECTIVES,
  day: DAY_DIRECTIVES,
});

/**
 * Whether `format` includes any of `groups`. A tuple group counts only when
 * every directive in it is present.
 *
 * @example
 * directiveIsIncluded(new Set([['%y', '%m', '%d']]), '%y-%m')       // false
 * directiveIsIncluded(new Set([['%y', '%m', '%d']]), '%y-%m-%dT%H') // true
 */
export function directiveIsIncluded(groups: DirectiveGroupSet, format: string): boolean {
  for (const group of groups) {
    if (typeof group === 'string') {
      if (format.includes(group)) return true;
    } else if (group.every(directive => format.includes(directive))) {
      return true;
    }
  }
  return false;
}

/** Precision levels whose directive table `format` satisfies, in table order. */
export function matchedPrecisionLevels(format: string): PrecisionLevel[] {
  return PRECISION_LEVELS.filter(level => directiveIsIncluded(DIRECTIVE_TABLES[level], format));
}

/** JSON-friendly view of a directive table. */
export function describeDirectiveGroups(groups: DirectiveGroupSet): (string | string[])[] {
  return [...groups].map(group => (typeof group === 'string' ? group : [...group]));
}
