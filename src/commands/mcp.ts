/**
 * MCP (Model Context Protocol) server command
 *
 * Serves the capture store to AI assistants over stdio. The store is opened
 * read-only per call, so the server can run next to a live `apisift run`.
 *
 * Start with:  apisift mcp --db ./api_data.db
 * Then add to the client's MCP settings:
 *   { "command": "npx", "args": ["apisift", "mcp"] }
 */

import { resolve } from 'path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { DEFAULTS, loadConfig } from '../config.js';
import { ApisiftError } from '../errors.js';
import { redactHeaders, redactJson, redactUrl } from '../redact.js';
import { CaptureStore } from '../store.js';
import type { CapturedRecord } from '../types.js';
import { formatTimestamp } from '../ui/format.js';

type ToolResult = { content: Array<{ type: 'text'; text: string }> };

const headerMapSchema = z.record(z.string());

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function textResult(data: unknown): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

function parseHeaders(raw: string): Record<string, string> {
  try {
    const parsed = headerMapSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

function redactBody(body: string): string {
  try {
    return JSON.stringify(redactJson(JSON.parse(body)));
  } catch {
    return body;
  }
}

/**
 * One line per capture, without bodies
 */
export function summarizeRecord(record: CapturedRecord) {
  return {
    id: record.id,
    method: record.method,
    url: redactUrl(record.url),
    host: record.host,
    path: record.path,
    status: record.responseStatus,
    responseTime: record.responseTime,
    capturedAt: formatTimestamp(record.timestamp),
  };
}

/**
 * Full capture with parsed headers. Credentials are masked unless
 * `redact` is false.
 */
export function presentRecord(record: CapturedRecord, redact: boolean = true) {
  const requestHeaders = parseHeaders(record.headers);
  const responseHeaders = parseHeaders(record.responseHeaders);

  return {
    id: record.id,
    requestHash: record.requestHash,
    method: record.method,
    url: redact ? redactUrl(record.url) : record.url,
    host: record.host,
    path: record.path,
    queryParams: record.queryParams,
    requestHeaders: redact ? redactHeaders(requestHeaders) : requestHeaders,
    requestBody: redact ? redactBody(record.requestBody) : record.requestBody,
    status: record.responseStatus,
    responseHeaders: redact ? redactHeaders(responseHeaders) : responseHeaders,
    responseBody: redact ? redactBody(record.responseBody) : record.responseBody,
    responseTime: record.responseTime,
    clientIp: record.clientIp,
    capturedAt: formatTimestamp(record.timestamp),
    createdAt: record.createdAt,
  };
}

export function listRecentCaptures(
  store: CaptureStore,
  args: { limit?: number; afterId?: number },
) {
  const limit = args.limit ?? 20;
  const records = args.afterId !== undefined
    ? store.listAfter(args.afterId, limit)
    : store.listRecent(limit);
  const watermark = store.getWatermark();

  return {
    total: watermark.count,
    // Pass as afterId on the next call to get only newer captures
    maxId: watermark.maxId,
    captures: records.map(summarizeRecord),
  };
}

export function getCapture(store: CaptureStore, args: { id: number; redact?: boolean }) {
  const record = store.getRecord(args.id);
  if (!record) {
    throw new ApisiftError(`No capture with id ${args.id}. Use list_recent_captures to find valid ids.`);
  }
  return presentRecord(record, args.redact ?? true);
}

export function captureStats(store: CaptureStore) {
  const watermark = store.getWatermark();
  const [latest] = store.listRecent(1);
  return {
    total: watermark.count,
    maxId: watermark.maxId,
    latestCaptureAt: latest ? formatTimestamp(latest.timestamp) : null,
    topHosts: store.topHosts(10),
  };
}

async function withStore<T>(dbPath: string, fn: (store: CaptureStore) => T): Promise<ToolResult> {
  const store = new CaptureStore(dbPath, { readonly: true });
  try {
    return textResult(fn(store));
  } finally {
    store.close();
  }
}

// ---------------------------------------------------------------------------
// Server assembly
// ---------------------------------------------------------------------------

export interface McpCommandOptions {
  db?: string;
}

export async function mcpCommand(options: McpCommandOptions, configPath?: string): Promise<void> {
  const fileConfig = await loadConfig(configPath);
  const defaultDb = options.db ? resolve(options.db) : fileConfig?.dbPath ?? resolve(DEFAULTS.dbPath);
  const dbFor = (dbPath?: string) => (dbPath ? resolve(dbPath) : defaultDb);

  const server = new McpServer({
    name: 'apisift',
    version: '1.0.0',
  });

  // list_recent_captures
  server.registerTool(
    'list_recent_captures',
    {
      title: 'List Recent Captures',
      description: [
        'List API calls captured by the apisift proxy, newest first.',
        'Pass afterId (the maxId from a previous call) to get only captures',
        'recorded since then, oldest first.',
      ].join(' '),
      inputSchema: {
        limit: z.number().int().min(1).max(500).optional()
          .describe('Maximum captures to return (default: 20)'),
        afterId: z.number().int().min(0).optional()
          .describe('Only return captures with a larger id'),
        dbPath: z.string().optional()
          .describe('Capture database (default: the configured dbPath)'),
      },
    },
    async (args) => withStore(dbFor(args.dbPath), (store) => listRecentCaptures(store, args)),
  );

  // get_capture
  server.registerTool(
    'get_capture',
    {
      title: 'Get Capture',
      description: [
        'Return one captured exchange with request and response headers and bodies.',
        'Credentials in headers, query parameters and JSON bodies are masked by default.',
      ].join(' '),
      inputSchema: {
        id: z.number().int().min(1).describe('Capture id from list_recent_captures'),
        redact: z.boolean().optional().describe('Mask credentials (default: true)'),
        dbPath: z.string().optional()
          .describe('Capture database (default: the configured dbPath)'),
      },
    },
    async (args) => withStore(dbFor(args.dbPath), (store) => getCapture(store, args)),
  );

  // capture_stats
  server.registerTool(
    'capture_stats',
    {
      title: 'Capture Stats',
      description: 'Count of stored captures, the newest capture time and the busiest hosts.',
      inputSchema: {
        dbPath: z.string().optional()
          .describe('Capture database (default: the configured dbPath)'),
      },
    },
    async (args) => withStore(dbFor(args.dbPath), captureStats),
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Keep the process alive until the transport closes
  await new Promise<void>((resolveClosed) => {
    server.server.onclose = resolveClosed;
  });
}
