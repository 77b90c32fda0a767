import { createServer, type Server } from 'node:http';
import type { RecordStore } from '../db/types.js';
import { errorMessage } from '../errors.js';
import { PLATFORMS, isPlatform } from '../records/types.js';

export interface ApiResponse {
  status: number;
  body: unknown;
}

const MAX_LIMIT = 1000;

/**
 * Read-only query API. Routing is small enough to live here; the handler is
 * separate from the server so it can be exercised without a socket.
 */
export async function handleRequest(store: RecordStore, method: string, rawUrl: string): Promise<ApiResponse> {
  if (method !== 'GET') return { status: 405, body: { detail: 'Method not allowed' } };

  const url = new URL(rawUrl, 'http://localhost');

  if (url.pathname === '/') {
    return {
      status: 200,
      body: { message: 'Workflow popularity API. Query /workflows?platform=&country= for tracked workflows.' },
    };
  }

  if (url.pathname !== '/workflows') return { status: 404, body: { detail: 'Not found' } };

  const platform = url.searchParams.get('platform') ?? undefined;
  const country = url.searchParams.get('country') ?? undefined;
  const limitParam = url.searchParams.get('limit');

  if (platform !== undefined && !isPlatform(platform)) {
    return { status: 400, body: { detail: `Unknown platform "${platform}". Expected one of: ${PLATFORMS.join(', ')}` } };
  }

  const limit = limitParam === null ? undefined : Number(limitParam);
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT)) {
    return { status: 400, body: { detail: `limit must be an integer between 1 and ${MAX_LIMIT}` } };
  }

  const results = await store.list({ platform, country, limit });
  if (results.length === 0) {
    return { status: 404, body: { detail: 'No workflows found for the given criteria' } };
  }
  return { status: 200, body: results };
}

export function createApiServer(store: RecordStore): Server {
  return createServer((req, res) => {
    handleRequest(store, req.method ?? 'GET', req.url ?? '/')
      .catch((err: unknown): ApiResponse => ({ status: 503, body: { detail: errorMessage(err) } }))
      .then(({ status, body }) => {
        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(body));
      }, (err: unknown) => {
        console.error(`API response failed: ${errorMessage(err)}`);
      });
  });
}
