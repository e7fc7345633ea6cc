import { afterEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { buildTools, callTool, registerTools, type ToolContext } from '../src/tools/registry.js';

const CONTEXT: ToolContext = {
  defaultFormats: ['%Y-%m-%d', '%Y-%m', '%Y'],
  about: { version: '1.0.0' },
};

const TextResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
  isError: z.boolean().optional(),
});

function readText(result: unknown): string {
  return TextResultSchema.parse(result).content[0].text;
}

function readPayload(result: unknown): unknown {
  return JSON.parse(readText(result));
}

describe('callTool', () => {
  it('formats a single date with explicit formats', async () => {
    const result = await callTool('format_date', { date_string: '2020-01', expected_formats: ['%Y', '%Y-%m'] }, CONTEXT);

    expect(result.isError).toBeUndefined();
    expect(readPayload(result)).toMatchObject({
      results: {
        original: '2020-01',
        formatted: '2020-01-XX',
        matched_format: '%Y-%m',
        revealed: { year: true, month: true, day: false },
        warnings: [],
      },
      _metadata: { server: 'date-curate-mcp' },
    });
  });

  it('falls back to the configured formats', async () => {
    const result = await callTool('format_date', { date_string: '2021' }, CONTEXT);

    expect(readPayload(result)).toMatchObject({
      results: { formatted: '2021-XX-XX', matched_format: '%Y' },
    });
  });

  it('returns unmatched dates with a warning instead of failing', async () => {
    const result = await callTool('format_date', { date_string: 'circa 1990', expected_formats: ['%Y'] }, CONTEXT);

    expect(result.isError).toBeUndefined();
    expect(readPayload(result)).toMatchObject({
      results: {
        original: 'circa 1990',
        formatted: 'circa 1990',
        matched_format: null,
        revealed: null,
        warnings: [
          'WARNING: Unable to transform date string "circa 1990" because it does not match any of the expected formats ["%Y"].',
        ],
      },
    });
  });

  it('returns an empty date string without a warning', async () => {
    const result = await callTool('format_date', { date_string: '', expected_formats: ['%Y'] }, CONTEXT);

    expect(readPayload(result)).toMatchObject({
      results: { original: '', formatted: '', matched_format: null, revealed: null, warnings: [] },
    });
  });

  it('curates a batch of records', async () => {
    const result = await callTool(
      'format_records',
      {
        records: [
          { name: 'a', date: '2020' },
          { name: 'b', date: 'junk' },
        ],
        date_fields: ['date'],
        expected_formats: ['%Y'],
      },
      CONTEXT,
    );

    expect(readPayload(result)).toMatchObject({
      results: {
        records: [
          { name: 'a', date: '2020-XX-XX' },
          { name: 'b', date: 'junk' },
        ],
        warnings: [
          'WARNING: Unable to transform date string "junk" because it does not match any of the expected formats ["%Y"].',
        ],
      },
    });
  });

  it('describes a format', async () => {
    const result = await callTool('describe_format', { format: '%Y-%m' }, CONTEXT);

    expect(readPayload(result)).toMatchObject({
      results: {
        format: '%Y-%m',
        supported: true,
        revealed: { year: true, month: true, day: false },
        precision_levels: ['year', 'month'],
      },
    });
  });

  it('reports invalid arguments as a tool error', async () => {
    const result = await callTool('format_date', {}, CONTEXT);

    expect(result.isError).toBe(true);
    expect(readText(result)).toBe('Error: Invalid arguments for "format_date": date_string: Required');
  });

  it('rejects unknown tools', async () => {
    const result = await callTool('format_everything', {}, CONTEXT);

    expect(result.isError).toBe(true);
    expect(readText(result)).toBe('Error: Unknown tool "format_everything".');
  });

  it('only answers about when it is configured', async () => {
    const unconfigured = await callTool('about', {}, { defaultFormats: ['%Y'] });
    expect(unconfigured.isError).toBe(true);
    expect(readText(unconfigured)).toBe('About tool not configured.');

    const configured = await callTool('about', {}, CONTEXT);
    expect(readPayload(configured)).toMatchObject({
      server: 'date-curate-mcp',
      version: '1.0.0',
      default_expected_formats: ['%Y-%m-%d', '%Y-%m', '%Y'],
      directive_tables: { year: ['%y', '%Y'], month: ['%b', '%B', '%m'], day: ['%d'] },
    });
  });
});

describe('buildTools', () => {
  it('adds about only with a context', () => {
    expect(buildTools().map(tool => tool.name)).toEqual(['format_date', 'format_records', 'describe_format']);
    expect(buildTools(CONTEXT.about).map(tool => tool.name)).toContain('about');
  });
});

describe('registerTools over MCP', () => {
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    client = undefined;
  });

  it('serves the tools to a connected client', async () => {
    const server = new Server({ name: 'date-curate-mcp', version: '1.0.0' }, { capabilities: { tools: {} } });
    registerTools(server, CONTEXT);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

    const { tools } = await client.listTools();
    expect(tools.map(tool => tool.name)).toEqual(['format_date', 'format_records', 'describe_format', 'about']);

    const result = await client.callTool({
      name: 'format_date',
      arguments: { date_string: '2020-1-15', expected_formats: ['%Y-%m-%d'] },
    });
    expect(readPayload(result)).toMatchObject({ results: { formatted: '2020-01-15' } });
  });
});
