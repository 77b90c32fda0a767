import { QuotaExceededError, SourceRejectedError, TransientSourceError, errorMessage } from '../errors.js';
import type { FetchContext } from './types.js';

export const USER_AGENT = 'flowpulse/0.1.0';

const DEFAULT_TIMEOUT_MS = 15_000;

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  /** Decides whether a 403 body means an exhausted quota rather than a refusal. */
  isQuotaError?: (body: unknown) => boolean;
}

/** Thrown for statuses that concern one resource, e.g. a 404 on a detail lookup. */
export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly label: string) {
    super(`${label} returned ${status}`);
    this.name = 'HttpStatusError';
  }
}

function linkSignal(parent: AbortSignal, timeoutMs: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent.reason);
  const timer = setTimeout(() => controller.abort(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);

  if (parent.aborted) controller.abort(parent.reason);
  else parent.addEventListener('abort', onAbort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent.removeEventListener('abort', onAbort);
    },
  };
}

/** Parse the body, giving up as soon as `signal` aborts. An unparsable body reads as undefined. */
function readBody(res: Response, signal: AbortSignal): Promise<unknown> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    res.json().then(
      (body: unknown) => {
        signal.removeEventListener('abort', onAbort);
        resolve(body);
      },
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve(undefined);
      },
    );
  });
}

/**
 * Rate-limited JSON request. Maps failures onto the ingestion error taxonomy:
 * network errors, timeouts, 408 and 5xx are transient; 429 (and quota 403s)
 * exhaust the source; 404/410 become HttpStatusError for the caller to
 * handle per item; anything else rejects the source. The timeout covers the
 * body as well as the headers.
 */
export async function requestJson(
  url: string,
  label: string,
  ctx: FetchContext,
  options: RequestOptions = {},
): Promise<unknown> {
  await ctx.acquire();

  const { signal, dispose } = linkSignal(ctx.signal, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  try {
    let res: Response;
    let body: unknown;
    try {
      res = await fetch(url, {
        method: options.method ?? 'GET',
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/json', ...options.headers },
        body: options.body,
        signal,
      });
      body = await readBody(res, signal);
    } catch (err) {
      // a run-level abort carries its own reason (deadline, store outage)
      if (ctx.signal.aborted) throw err;
      throw new TransientSourceError(`${label} request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (res.ok) {
      if (body === undefined) throw new TransientSourceError(`${label} returned an unreadable body`);
      return body;
    }

    const { status } = res;
    if (status === 408 || status >= 500) {
      throw new TransientSourceError(`${label} returned ${status}`);
    }
    if (status === 429) {
      throw new QuotaExceededError(`${label} returned 429`);
    }
    if (status === 404 || status === 410) {
      throw new HttpStatusError(status, label);
    }
    if (status === 403 && options.isQuotaError?.(body)) {
      throw new QuotaExceededError(`${label} quota exceeded (403)`);
    }
    throw new SourceRejectedError(`${label} returned ${status}`);
  } finally {
    dispose();
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function asNumeric(value: unknown): string | number | undefined {
  return typeof value === 'string' ? value : asNumber(value);
}

/** Comma-separated env list, upper-cased, blanks dropped. */
export function parseList(value: string | undefined, fallback: string[]): string[] {
  const items = (value ?? '').split(',').map((s) => s.trim().toUpperCase()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}
