/**
 * Tool registry for the Date Curate MCP server.
 * Shared between the stdio (index.ts) and HTTP (http-server.ts) entry points.
 */

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';

import { formatDateTool, FormatDateInputSchema } from './format-date.js';
import { formatRecordsTool, FormatRecordsInputSchema } from './format-records.js';
import { describeFormat, DescribeFormatInputSchema } from './describe-format.js';
import { getAbout, type AboutContext } from './about.js';
export type { AboutContext } from './about.js';

export interface ToolContext {
  defaultFormats: readonly string[];
  about?: AboutContext;
}

export type ToolCallResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

const EXPECTED_FORMATS_PROPERTY = {
  type: 'array',
  items: { type: 'string' },
  description:
    'Candidate strftime formats (e.g. "%Y-%m-%d", "%Y-%m", "%Y", "%d %B %Y"), tried in order. ' +
    'The FIRST format that parses wins, so list them from most to least specific. ' +
    'Defaults to the server\'s configured formats.',
};

const ABOUT_TOOL: Tool = {
  name: 'about',
  description:
    'Server metadata, the default expected formats, and the directive tables used to decide ' +
    'which date components a format conveys.',
  inputSchema: { type: 'object', properties: {} },
};

export const TOOLS: Tool[] = [
  {
    name: 'format_date',
    description:
      'Normalize one date string to masked ISO 8601 (YYYY-MM-DD). ' +
      'Components the matching format cannot determine are masked: "2020" with "%Y" gives "2020-XX-XX". ' +
      'Month and day are only reported when a year is known. ' +
      'A string that matches none of the formats is returned unchanged with a warning.',
    inputSchema: {
      type: 'object',
      properties: {
        date_string: { type: 'string', description: 'Raw date string, e.g. "2020-1-15" or "March 2019".' },
        expected_formats: EXPECTED_FORMATS_PROPERTY,
      },
      required: ['date_string'],
    },
  },
  {
    name: 'format_records',
    description:
      'Normalize date fields across a batch of metadata records. ' +
      'Each listed field holding a non-empty string is replaced with its masked ISO 8601 form; ' +
      'other fields are copied unchanged. Returns the curated records and any warnings.',
    inputSchema: {
      type: 'object',
      properties: {
        records: {
          type: 'array',
          items: { type: 'object' },
          description: 'Records to curate (JSON objects).',
        },
        date_fields: {
          type: 'array',
          items: { type: 'string' },
          description: 'Names of the fields that hold dates, e.g. ["date", "date_submitted"].',
        },
        expected_formats: EXPECTED_FORMATS_PROPERTY,
      },
      required: ['records', 'date_fields'],
    },
  },
  {
    name: 'describe_format',
    description:
      'Report which components (year, month, day) a strftime format conveys, ' +
      'whether the parser supports every directive in it, and which directive tables it satisfies. ' +
      'Use this to check a format list before curating a large batch.',
    inputSchema: {
      type: 'object',
      properties: {
        format: { type: 'string', description: 'strftime format, e.g. "%Y-%j" or "%G-W%V-%u".' },
      },
      required: ['format'],
    },
  },
];

export function buildTools(context?: AboutContext): Tool[] {
  const tools = [...TOOLS];
  if (context) {
    tools.push(ABOUT_TOOL);
  }
  return tools;
}

function parseArguments<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new Error(`Invalid arguments for "${name}": ${issues}`);
  }
  return parsed.data;
}

function textResult(text: string, isError = false): ToolCallResult {
  return isError
    ? { content: [{ type: 'text', text }], isError: true }
    : { content: [{ type: 'text', text }] };
}

export async function callTool(name: string, args: unknown, context: ToolContext): Promise<ToolCallResult> {
  try {
    let result: unknown;

    switch (name) {
      case 'format_date':
        result = await formatDateTool(parseArguments(name, FormatDateInputSchema, args), context.defaultFormats);
        break;
      case 'format_records':
        result = await formatRecordsTool(parseArguments(name, FormatRecordsInputSchema, args), context.defaultFormats);
        break;
      case 'describe_format':
        result = await describeFormat(parseArguments(name, DescribeFormatInputSchema, args));
        break;
      case 'about':
        if (!context.about) {
          return textResult('About tool not configured.', true);
        }
        result = getAbout(context.about, context.defaultFormats);
        break;
      default:
        return textResult(`Error: Unknown tool "${name}".`, true);
    }

    return textResult(JSON.stringify(result, null, 2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return textResult(`Error: ${message}`, true);
  }
}

export function registerTools(server: Server, context: ToolContext): void {
  const allTools = buildTools(context.about);

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: allTools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(name, args, context);
  });
}
