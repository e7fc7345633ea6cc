/**
 * Response metadata attached to every tool result.
 */

import { SERVER_NAME, SERVER_VERSION } from '../constants.js';

export interface ResponseMetadata {
  server: string;
  version: string;
  note: string;
}

export interface ToolResponse<T> {
  results: T;
  _metadata: ResponseMetadata;
}

export function generateResponseMetadata(): ResponseMetadata {
  return {
    server: SERVER_NAME,
    version: SERVER_VERSION,
    note:
      'Dates are masked ISO 8601 (YYYY-MM-DD). Components the matched format cannot determine ' +
      'are reported as XX (XXXX for the year), never as parser defaults. ' +
      'Strings that match no expected format are returned unchanged.',
  };
}
