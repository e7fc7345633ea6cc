/**
 * about — Server metadata, default formats and directive tables.
 */

import { DIRECTIVE_TABLES, PRECISION_LEVELS, describeDirectiveGroups } from '../utils/directives.js';
import { DAY_MASK, MONTH_MASK, YEAR_MASK } from '../utils/format-date.js';
import { SERVER_NAME } from '../constants.js';

export interface AboutContext {
  version: string;
}

export function getAbout(context: AboutContext, defaultFormats: readonly string[]) {
  const directiveTables: Record<string, (string | string[])[]> = {};
  for (const level of PRECISION_LEVELS) {
    directiveTables[level] = describeDirectiveGroups(DIRECTIVE_TABLES[level]);
  }

  return {
    server: SERVER_NAME,
    version: context.version,
    default_expected_formats: [...defaultFormats],
    directive_tables: directiveTables,
    output: {
      shape: 'YYYY-MM-DD',
      year_mask: YEAR_MASK,
      month_mask: MONTH_MASK,
      day_mask: DAY_MASK,
    },
  };
}
