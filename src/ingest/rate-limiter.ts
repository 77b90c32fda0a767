import type { SourceName } from '../connectors/types.js';
import { delay, type Sleep } from './delay.js';

export interface RateLimit {
  maxRequests: number;
  windowMs: number;
}

export type RateLimits = Partial<Record<SourceName, RateLimit>>;

export interface AcquireResult {
  waitedMs: number;
}

export interface LimiterClock {
  now: () => number;
  sleep: Sleep;
}

const systemClock: LimiterClock = { now: () => Date.now(), sleep: delay };

/**
 * Sliding-window gate per source. Callers for one source queue up in arrival
 * order; a full window only delays them, it never turns them away.
 * A source without a configured limit passes straight through.
 */
export class RateLimiter {
  private readonly stamps = new Map<SourceName, number[]>();
  private readonly tails = new Map<SourceName, Promise<void>>();

  constructor(
    private readonly limits: RateLimits,
    private readonly clock: LimiterClock = systemClock,
  ) {}

  acquire(source: SourceName, signal?: AbortSignal): Promise<AcquireResult> {
    const previous = this.tails.get(source) ?? Promise.resolve();
    const next = previous.then(() => this.take(source, signal));
    // a cancelled waiter must not block the ones queued behind it
    this.tails.set(source, next.then(() => undefined, () => undefined));
    return next;
  }

  private async take(source: SourceName, signal?: AbortSignal): Promise<AcquireResult> {
    const limit = this.limits[source];
    if (!limit) return { waitedMs: 0 };

    let window = this.stamps.get(source);
    if (!window) {
      window = [];
      this.stamps.set(source, window);
    }

    const started = this.clock.now();
    for (;;) {
      signal?.throwIfAborted();
      const now = this.clock.now();
      while (window.length > 0 && window[0] <= now - limit.windowMs) window.shift();

      if (window.length < limit.maxRequests) {
        window.push(now);
        return { waitedMs: now - started };
      }

      await this.clock.sleep(window[0] + limit.windowMs - now, signal);
    }
  }
}
