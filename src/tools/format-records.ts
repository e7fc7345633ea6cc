/**
 * format_records — Normalize the date fields of a batch of records.
 */

import { z } from 'zod';
import { formatDateFields, type CurationRecord } from '../utils/records.js';
import { collectWarnings } from '../utils/warnings.js';
import { generateResponseMetadata, type ToolResponse } from '../utils/metadata.js';

export const FormatRecordsInputSchema = z.object({
  records: z.array(z.record(z.unknown())),
  date_fields: z.array(z.string().min(1)).min(1),
  expected_formats: z.array(z.string()).min(1).optional(),
});

export type FormatRecordsInput = z.infer<typeof FormatRecordsInputSchema>;

export interface FormatRecordsResult {
  records: CurationRecord[];
  warnings: string[];
}

export async function formatRecordsTool(
  input: FormatRecordsInput,
  defaultFormats: readonly string[],
): Promise<ToolResponse<FormatRecordsResult>> {
  const { warn, warnings } = collectWarnings();

  const records = [
    ...formatDateFields(input.records, {
      dateFields: input.date_fields,
      expectedFormats: input.expected_formats ?? defaultFormats,
      warn,
    }),
  ];

  return {
    results: { records, warnings },
    _metadata: generateResponseMetadata(),
  };
}
