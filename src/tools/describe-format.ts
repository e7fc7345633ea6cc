/**
 * describe_format — Report which date fields a format pattern conveys.
 */

import { z } from 'zod';
import { matchedPrecisionLevels, type PrecisionLevel } from '../utils/directives.js';
import { classifyFormat, type RevealedFields } from '../utils/format-date.js';
import { isSupportedFormat } from '../utils/strptime.js';
import { generateResponseMetadata, type ToolResponse } from '../utils/metadata.js';

export const DescribeFormatInputSchema = z.object({
  format: z.string().min(1),
});

export type DescribeFormatInput = z.infer<typeof DescribeFormatInputSchema>;

export interface DescribeFormatResult {
  format: string;
  supported: boolean;
  revealed: RevealedFields;
  precision_levels: PrecisionLevel[];
}

export async function describeFormat(
  input: DescribeFormatInput,
): Promise<ToolResponse<DescribeFormatResult>> {
  return {
    results: {
      format: input.format,
      supported: isSupportedFormat(input.format),
      revealed: classifyFormat(input.format),
      precision_levels: matchedPrecisionLevels(input.format),
    },
    _metadata: generateResponseMetadata(),
  };
}
