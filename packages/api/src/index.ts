#!/usr/bin/env node

/**
 * REST API server for kanaroma
 * Exposes the CLI functionality via HTTP endpoints
 */

import { createServer, IncomingMessage, ServerResponse, type IncomingHttpHeaders } from 'http';
import type { Readable } from 'stream';
import { config } from 'dotenv';
import { initAllTables, parsePositiveInt, readConfig, setDebug } from '@kanaroma/core';
import { ConversionCache } from './cache.js';
import { JsonBodyError, routeRequest, type RouteContext } from './routes.js';

export { ConversionCache } from './cache.js';
export {
  ApiError,
  API_DOCS,
  JsonBodyError,
  routeRequest,
  type ApiErrorCode,
  type ApiResponse,
  type RouteContext
} from './routes.js';

export const MAX_JSON_BODY_SIZE = 1 * 1024 * 1024; // 1 MiB

export type BodySource = Readable & { headers: IncomingHttpHeaders };

/**
 * Read and parse a JSON request body.
 *
 * Chunks stay raw bytes until `end`; UTF-8 is decoded once over the whole body.
 * An oversized body is drained rather than destroyed, leaving the socket open
 * for the 413 response.
 */
export async function parseJsonBody(req: BodySource): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const contentLengthHeader = req.headers['content-length'];
    if (contentLengthHeader) {
      const contentLength = Number(contentLengthHeader);
      if (Number.isFinite(contentLength) && contentLength > MAX_JSON_BODY_SIZE) {
        req.resume();
        reject(new JsonBodyError('Payload too large', 413));
        return;
      }
    }

    const chunks: Buffer[] = [];
    let received = 0;

    const onData = (chunk: Buffer) => {
      received += chunk.length;
      if (received > MAX_JSON_BODY_SIZE) {
        req.off('data', onData);
        req.resume();
        reject(new JsonBodyError('Payload too large', 413));
        return;
      }
      chunks.push(chunk);
    };

    req.on('data', onData);

    req.on('end', () => {
      if (received > MAX_JSON_BODY_SIZE) return;

      const body = Buffer.concat(chunks).toString('utf8');
      if (!body) {
        reject(new JsonBodyError('Empty body'));
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new JsonBodyError('Invalid JSON'));
      }
    });

    req.on('error', (err) => {
      reject(err instanceof JsonBodyError ? err : new JsonBodyError(String(err), 400));
    });
  });
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, data: unknown, status = 200, requestId?: string): void {
  const json = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(json);
  if (requestId) {
    console.log(`[${requestId}] Response sent: ${Buffer.byteLength(json)} bytes, status ${status}`);
  }
}

export function createRequestHandler(ctx: RouteContext): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  return async (req, res) => {
    const requestId = Math.random().toString(36).substring(7);
    const startTime = Date.now();
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method ?? 'GET';

    console.log(`[${requestId}] START ${method} ${url.pathname}`);

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    // Handle OPTIONS for CORS preflight
    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      console.log(`[${requestId}] END OPTIONS ${url.pathname} - ${Date.now() - startTime}ms`);
      return;
    }

    try {
      const { status, body } = await routeRequest(method, url.pathname, () => parseJsonBody(req), ctx);
      sendJson(res, body, status, requestId);
      console.log(`[${requestId}] END ${url.pathname} - ${Date.now() - startTime}ms`);
    } catch (error) {
      console.error(`[${requestId}] Request error:`, error);
      const message = error instanceof Error ? error.message : 'Internal server error';
      sendJson(res, { error: message }, 500, requestId);
      console.log(`[${requestId}] END ${url.pathname} ERROR - ${Date.now() - startTime}ms`);
    }
  };
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  config();

  process.on('unhandledRejection', (reason) => {
    console.error('UNHANDLED REJECTION:', reason);
  });

  const settings = readConfig();
  setDebug(settings.debug);

  const port = parsePositiveInt('PORT', process.env.PORT, 3000);
  const cacheSize = parsePositiveInt('KANAROMA_CACHE_SIZE', process.env.KANAROMA_CACHE_SIZE, 500);

  // Fail at startup, not on the first request, if a rule table is malformed
  const tables = initAllTables();
  console.log(`Loaded rule tables: ${tables.join(', ')}`);

  const cache = new ConversionCache(cacheSize);
  const handler = createRequestHandler({ defaultSystem: settings.defaultSystem, cache });
  const server = createServer((req, res) => {
    handler(req, res).catch((error) => {
      console.error('Unhandled request failure:', error);
    });
  });

  // Bind to 0.0.0.0 to allow external connections
  server.listen(port, '0.0.0.0', () => {
    console.log(`kanaroma API server listening on http://0.0.0.0:${port} (default system: ${settings.defaultSystem})`);
    console.log(`Health check: http://0.0.0.0:${port}/health`);
    console.log(`API docs: http://0.0.0.0:${port}/api`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      const { hits, misses } = cache.getStats();
      console.log(`Server closed (cache hits: ${hits}, misses: ${misses})`);
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Run server if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
