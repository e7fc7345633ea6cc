/**
 * format_date — Normalize one date string to masked ISO 8601.
 */

import { z } from 'zod';
import { matchDate, unmatchedDateWarning, type RevealedFields } from '../utils/format-date.js';
import { collectWarnings } from '../utils/warnings.js';
import { generateResponseMetadata, type ToolResponse } from '../utils/metadata.js';

export const FormatDateInputSchema = z.object({
  date_string: z.string(),
  expected_formats: z.array(z.string()).min(1).optional(),
});

export type FormatDateInput = z.infer<typeof FormatDateInputSchema>;

export interface FormatDateResult {
  original: string;
  formatted: string;
  matched_format: string | null;
  revealed: RevealedFields | null;
  warnings: string[];
}

export async function formatDateTool(
  input: FormatDateInput,
  defaultFormats: readonly string[],
): Promise<ToolResponse<FormatDateResult>> {
  const expectedFormats = input.expected_formats ?? defaultFormats;
  const { warn, warnings } = collectWarnings();

  const match = input.date_string ? matchDate(input.date_string, expectedFormats) : null;
  if (input.date_string && !match) {
    warn(unmatchedDateWarning(input.date_string, expectedFormats));
  }
  const formatted = match ? match.formatted : input.date_string;

  return {
    results: {
      original: input.date_string,
      formatted,
      matched_format: match?.format ?? null,
      revealed: match?.revealed ?? null,
      warnings,
    },
    _metadata: generateResponseMetadata(),
  };
}
