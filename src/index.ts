#!/usr/bin/env node

/**
 * Date Curate MCP Server — stdio entry point.
 *
 * Normalizes partially-specified dates in record metadata to masked
 * ISO 8601 via Model Context Protocol.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { registerTools } from './tools/registry.js';
import { resolveExpectedFormats } from './config.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';

async function main() {
  const defaultFormats = resolveExpectedFormats();
  console.error(`[${SERVER_NAME}] Default formats: ${JSON.stringify(defaultFormats)}`);

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  registerTools(server, { defaultFormats, about: { version: SERVER_VERSION } });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[${SERVER_NAME}] Server running on stdio`);

  const cleanup = () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`[${SERVER_NAME}] Error during shutdown:`, err);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', cleanup);
  process.on('SIGTERM', cleanup);
}

main().catch((err) => {
  console.error(`[${SERVER_NAME}] Fatal error:`, err);
  process.exit(1);
});
