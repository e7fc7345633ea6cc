/**
 * Diagnostic sinks. Warnings go to stderr so stdout stays free for the stdio
 * MCP transport and for NDJSON output.
 */

export type WarningSink = (message: string) => void;

export const stderrWarnings: WarningSink = (message) => {
  console.error(message);
};

export interface WarningCollector {
  warn: WarningSink;
  warnings: string[];
}

/** A sink that keeps warnings in memory, for callers that return them as data. */
export function collectWarnings(): WarningCollector {
  const warnings: string[] = [];
  return {
    warn: (message) => {
      warnings.push(message);
    },
    warnings,
  };
}
