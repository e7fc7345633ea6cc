/**
 * Environment configuration for the server and the curation script.
 */

import { z } from 'zod';
import { DEFAULT_EXPECTED_FORMATS, DEFAULT_PORT, FORMATS_ENV_VAR } from './constants.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const expectedFormatsSchema = z.array(z.string().min(1)).min(1);

const portSchema = z.coerce.number().int().min(1).max(65535);

/**
 * Default candidate formats, from a JSON array in DATE_CURATE_EXPECTED_FORMATS.
 * Used whenever a caller does not name its own formats.
 */
export function resolveExpectedFormats(env: Env = process.env): string[] {
  const raw = env[FORMATS_ENV_VAR];
  if (!raw || raw.trim().length === 0) return [...DEFAULT_EXPECTED_FORMATS];

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new ConfigError(`${FORMATS_ENV_VAR} must be a JSON array of format strings, got ${JSON.stringify(raw)}`);
  }

  const parsed = expectedFormatsSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`${FORMATS_ENV_VAR} must be a non-empty JSON array of non-empty strings`);
  }
  return parsed.data;
}

export function resolvePort(env: Env = process.env): number {
  const raw = env.PORT;
  if (!raw) return DEFAULT_PORT;

  const parsed = portSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`PORT must be an integer between 1 and 65535, got ${JSON.stringify(raw)}`);
  }
  return parsed.data;
}
