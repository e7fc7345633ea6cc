export const SERVER_NAME = 'date-curate-mcp';
export const SERVER_VERSION = '1.0.0';
export const FORMATS_ENV_VAR = 'DATE_CURATE_EXPECTED_FORMATS';
export const DEFAULT_EXPECTED_FORMATS: readonly string[] = ['%Y-%m-%d', '%Y-%m', '%Y'];
export const DEFAULT_PORT = 3000;
