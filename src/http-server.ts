#!/usr/bin/env node

/**
 * HTTP entry point for the Date Curate MCP server.
 *
 * Endpoints:
 *   GET  /health  → { status, server, version, uptime_seconds }
 *   POST /mcp     → MCP Streamable HTTP transport (new + existing sessions)
 *   GET  /mcp     → SSE stream (existing session) or metadata (no session)
 *   DELETE /mcp   → session termination
 *   OPTIONS *     → CORS preflight
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';

import { registerTools, type ToolContext } from './tools/registry.js';
import { resolveExpectedFormats, resolvePort } from './config.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';

// ---------------------------------------------------------------------------
// Session management
// ---------------------------------------------------------------------------

/** UUID v4 pattern — prevents injection via session ID header. */
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

function validSessionId(raw: string | string[] | undefined): string | undefined {
  if (typeof raw !== 'string' || !UUID_RE.test(raw)) return undefined;
  return raw;
}

const sessions = new Map<string, StreamableHTTPServerTransport>();

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  const port = resolvePort();
  const context: ToolContext = {
    defaultFormats: resolveExpectedFormats(),
    about: { version: SERVER_VERSION },
  };
  console.error(`[${SERVER_NAME}] Default formats: ${JSON.stringify(context.defaultFormats)}`);

  /** Create a fresh MCP server instance (one per session). */
  function createMCPServer(): Server {
    const server = new Server(
      { name: SERVER_NAME, version: SERVER_VERSION },
      { capabilities: { tools: {} } },
    );
    registerTools(server, context);
    return server;
  }

  const httpServer = createHttpServer(async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url || '/', `http://localhost:${port}`);

    // CORS
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, mcp-session-id');
    res.setHeader('Access-Control-Expose-Headers', 'mcp-session-id');

    try {
      if (req.method === 'OPTIONS') {
        res.writeHead(204);
        res.end();
        return;
      }

      if (url.pathname === '/health' && req.method === 'GET') {
        sendJson(res, 200, {
          status: 'ok',
          server: SERVER_NAME,
          version: SERVER_VERSION,
          uptime_seconds: Math.floor(process.uptime()),
        });
        return;
      }

      if (url.pathname === '/mcp') {
        const sessionId = validSessionId(req.headers['mcp-session-id']);

        // Existing session — delegate
        const existing = sessionId ? sessions.get(sessionId) : undefined;
        if (existing) {
          await existing.handleRequest(req, res);
          return;
        }

        if (req.method === 'DELETE') {
          sendJson(res, 404, { error: 'Session not found' });
          return;
        }

        // POST — new session (initialize)
        if (req.method === 'POST') {
          // Store the session before handleRequest so a fast follow-up request finds it.
          const newSessionId = randomUUID();
          const transport = new StreamableHTTPServerTransport({
            sessionIdGenerator: () => newSessionId,
          });

          sessions.set(newSessionId, transport);

          transport.onclose = () => {
            sessions.delete(newSessionId);
          };

          const server = createMCPServer();
          await server.connect(transport);
          await transport.handleRequest(req, res);
          return;
        }

        // GET without session — metadata
        if (req.method === 'GET') {
          sendJson(res, 200, {
            name: SERVER_NAME,
            version: SERVER_VERSION,
            protocol: 'mcp',
            transport: 'streamable-http',
          });
          return;
        }

        sendJson(res, 400, { error: 'Bad request — missing or invalid session' });
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      console.error(`[${SERVER_NAME}] Unhandled error:`, error);
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal server error' });
      }
    }
  });

  httpServer.listen(port, () => {
    console.error(`${SERVER_NAME} v${SERVER_VERSION} HTTP server listening on port ${port}`);
  });

  // -------------------------------------------------------------------------
  // Graceful shutdown
  // -------------------------------------------------------------------------

  const shutdown = (signal: string) => {
    console.error(`[${SERVER_NAME}] Shutting down (${signal})...`);
    for (const [id, transport] of sessions) {
      transport.close().catch((err: unknown) => {
        console.error(`[${SERVER_NAME}] Failed to close session ${id}:`, err);
      });
    }
    sessions.clear();
    httpServer.close(() => process.exit(0));
    setTimeout(() => process.exit(1), 5000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  console.error(`[${SERVER_NAME}] Fatal error:`, err);
  process.exit(1);
});
