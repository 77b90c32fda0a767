import type { FetchContext, RawItem, SourceConnector, SourceName } from '../connectors/types.js';
import type { RecordStore } from '../db/types.js';
import {
  PermanentItemError,
  QuotaExceededError,
  RunTimeoutError,
  SourceRejectedError,
  StoreUnavailableError,
  TransientSourceError,
  errorKind,
  errorMessage,
} from '../errors.js';
import { mergeRecords } from '../records/merge.js';
import { normalizeItem } from '../records/normalize.js';
import { naturalKeyOf, type WorkflowRecord } from '../records/types.js';
import { delay, type Sleep } from './delay.js';
import { KeyedLock } from './keyed-lock.js';
import type { KeywordSource } from './keywords.js';
import { MODE_PROFILES, type Mode } from './modes.js';
import type { RateLimiter } from './rate-limiter.js';
import { RunReportBuilder, type RunReport, type RunStatus, type SourceStats } from './run-report.js';

export interface RetryPolicy {
  /** Retries after the first attempt, so a keyword is tried at most maxRetries + 1 times. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxRetries: 3, baseDelayMs: 1_000, maxDelayMs: 30_000 };

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type RunState = 'pending' | 'running' | 'succeeded' | 'partially_failed' | 'failed';

/** Receives every finalized report: run log, console summary, alerting. */
export type RunReporter = (report: RunReport) => Promise<void>;

export interface IngestionDeps {
  connectors: SourceConnector[];
  store: RecordStore;
  keywords: KeywordSource;
  rateLimiter: RateLimiter;
  retry?: RetryPolicy;
  reporters?: RunReporter[];
  /** Post-run analytics; only invoked for non-dry deep runs that did not fail. */
  analytics?: (report: RunReport) => Promise<void>;
  onStateChange?: (state: RunState) => void;
  logger?: Logger;
  now?: () => Date;
  sleep?: Sleep;
}

export interface RunOptions {
  mode: Mode;
  dryRun?: boolean;
  deadlineMs?: number;
  /** Restrict the run to these sources; defaults to every connector. */
  sources?: SourceName[];
}

interface RunContext {
  store: RecordStore;
  rateLimiter: RateLimiter;
  retry: RetryPolicy;
  logger: Logger;
  now: () => Date;
  sleep: Sleep;
  mode: Mode;
  pagesPerKeyword: number;
  dryRun: boolean;
  report: RunReportBuilder;
  controller: AbortController;
  locks: KeyedLock;
  preview: DryRunPreview;
  /** Sources whose drain returned on its own. */
  finished: Set<SourceName>;
}

interface DryRunPreview {
  inserts: number;
  updates: number;
  unchanged: number;
  /** What each key would hold after the records previewed so far. */
  merged: Map<string, WorkflowRecord>;
}

type KeywordOutcome = 'next' | 'stop';

export function backoffDelay(retry: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
}

export function terminalState(status: RunStatus): RunState {
  switch (status) {
    case 'success':
      return 'succeeded';
    case 'partial_failure':
      return 'partially_failed';
    case 'failure':
      return 'failed';
  }
}

function failRun(ctx: RunContext, source: SourceName, keyword: string, err: StoreUnavailableError): void {
  if (ctx.controller.signal.aborted) return;
  ctx.report.abort('store_unavailable');
  ctx.report.addError({ source, keyword, error_kind: err.kind, message: err.message });
  ctx.logger.error(`  Store unavailable, aborting run: ${err.message}`);
  ctx.controller.abort(err);
}

function sameMetrics(a: WorkflowRecord, b: WorkflowRecord): boolean {
  const keys = Object.keys(a.popularity_metrics);
  return keys.length === Object.keys(b.popularity_metrics).length
    && keys.every((key) => a.popularity_metrics[key] === b.popularity_metrics[key])
    && a.source_url === b.source_url;
}

async function writeRecord(ctx: RunContext, record: WorkflowRecord): Promise<void> {
  try {
    if (ctx.dryRun) {
      const key = naturalKeyOf(record);
      const existing = ctx.preview.merged.get(key)
        ?? await ctx.store.getByKey(record.workflow_name, record.platform, record.country);
      const merged = mergeRecords(existing, record, ctx.now());
      if (!existing) ctx.preview.inserts++;
      else if (sameMetrics(existing, merged)) ctx.preview.unchanged++;
      else ctx.preview.updates++;
      ctx.preview.merged.set(key, merged);
      return;
    }
    await ctx.store.upsert(record);
  } catch (err) {
    if (err instanceof StoreUnavailableError) throw err;
    throw new StoreUnavailableError(`Store write failed: ${errorMessage(err)}`, { cause: err });
  }
}

async function processItem(
  ctx: RunContext,
  source: SourceName,
  keyword: string,
  item: RawItem | PermanentItemError,
  stats: SourceStats,
): Promise<void> {
  stats.attempted++;

  let record: WorkflowRecord;
  try {
    if (item instanceof PermanentItemError) throw item;
    record = normalizeItem(item, ctx.now());
  } catch (err) {
    if (!(err instanceof PermanentItemError)) throw err;
    stats.skipped++;
    ctx.report.addError({ source, keyword, error_kind: err.kind, message: err.message });
    return;
  }

  await ctx.locks.run(naturalKeyOf(record), () => writeRecord(ctx, record));
  stats.succeeded++;
}

function recordSourceError(
  ctx: RunContext,
  source: SourceName,
  keyword: string,
  err: unknown,
  stats: SourceStats,
): KeywordOutcome {
  const message = errorMessage(err);
  ctx.report.addError({ source, keyword, error_kind: errorKind(err), message });

  if (err instanceof QuotaExceededError) {
    stats.state = 'exhausted';
    ctx.logger.warn(`  ${source}: quota exhausted, skipping remaining keywords (${message})`);
    return 'stop';
  }
  if (err instanceof SourceRejectedError) {
    stats.failed++;
    stats.state = 'rejected';
    ctx.logger.error(`  ${source}: rejected, skipping remaining keywords (${message})`);
    return 'stop';
  }
  if (err instanceof PermanentItemError) {
    // thrown rather than yielded, so the sequence for this keyword is over
    stats.skipped++;
    return 'next';
  }

  stats.failed++;
  ctx.logger.error(`  ERROR (${source} "${keyword}"): ${message}`);
  return 'next';
}

/**
 * Drain one keyword, restarting the connector on transient failures. A
 * restarted sequence skips the items already processed, so nothing is
 * merged twice.
 */
async function drainKeyword(
  ctx: RunContext,
  connector: SourceConnector,
  keyword: string,
  fetchCtx: FetchContext,
  stats: SourceStats,
): Promise<KeywordOutcome> {
  const { signal } = ctx.controller;
  const { source } = connector;
  let processed = 0;

  for (let attempt = 0; ; attempt++) {
    try {
      let position = 0;
      for await (const item of connector.fetch([keyword], ctx.mode, ctx.pagesPerKeyword, fetchCtx)) {
        signal.throwIfAborted();
        position++;
        if (position <= processed) continue;
        processed = position;
        await processItem(ctx, source, keyword, item, stats);
      }
      return 'next';
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        failRun(ctx, source, keyword, err);
        return 'stop';
      }
      if (signal.aborted) return 'stop';

      if (err instanceof TransientSourceError && attempt < ctx.retry.maxRetries) {
        stats.retried++;
        const wait = backoffDelay(attempt + 1, ctx.retry);
        ctx.logger.warn(
          `  ${source} "${keyword}": ${err.message}; retry ${attempt + 1}/${ctx.retry.maxRetries} in ${wait}ms`,
        );
        await ctx.sleep(wait, signal).catch(() => undefined);
        if (signal.aborted) return 'stop';
        continue;
      }

      return recordSourceError(ctx, source, keyword, err, stats);
    }
  }
}

async function drainSource(ctx: RunContext, connector: SourceConnector, keywords: string[]): Promise<void> {
  const { source } = connector;
  const { signal } = ctx.controller;
  const stats = ctx.report.source(source);

  const fetchCtx: FetchContext = {
    signal,
    acquire: async () => {
      const { waitedMs } = await ctx.rateLimiter.acquire(source, signal);
      if (waitedMs > 0) stats.rate_limited++;
    },
  };

  ctx.logger.log(`  Draining ${source} (${keywords.length} keywords)...`);
  for (const keyword of keywords) {
    if (signal.aborted) break;
    const outcome = await drainKeyword(ctx, connector, keyword, fetchCtx, stats);
    if (outcome === 'stop') break;
  }

  if (signal.aborted && stats.state === 'completed') stats.state = 'cancelled';
  ctx.finished.add(source);
  ctx.logger.log(
    `    ${source}: ${stats.attempted} attempted, ${stats.succeeded} stored, ${stats.failed} failed, ` +
      `${stats.skipped} skipped, ${stats.retried} retries, ${stats.rate_limited} rate-limited`,
  );
}

function abortion(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

async function publish(report: RunReport, deps: IngestionDeps, logger: Logger): Promise<void> {
  for (const reporter of deps.reporters ?? []) {
    try {
      await reporter(report);
    } catch (err) {
      logger.error(`Run reporter failed: ${errorMessage(err)}`);
    }
  }

  const wantsAnalytics = MODE_PROFILES[report.mode].analytics && !report.dry_run && report.status !== 'failure';
  if (!wantsAnalytics || !deps.analytics) return;

  try {
    await deps.analytics(report);
  } catch (err) {
    logger.error(`Post-run analytics failed: ${errorMessage(err)}`);
  }
}

/**
 * Run every selected source for a mode and return the finalized report.
 * Never rejects: every failure ends up in `report.errors` and `report.status`.
 */
export async function runIngestion(deps: IngestionDeps, options: RunOptions): Promise<RunReport> {
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? console;
  const dryRun = options.dryRun ?? false;
  const profile = MODE_PROFILES[options.mode];

  const report = new RunReportBuilder(options.mode, dryRun, now());
  const controller = new AbortController();
  deps.onStateChange?.('pending');

  const ctx: RunContext = {
    store: deps.store,
    rateLimiter: deps.rateLimiter,
    retry: deps.retry ?? DEFAULT_RETRY_POLICY,
    logger,
    now,
    sleep: deps.sleep ?? delay,
    mode: options.mode,
    pagesPerKeyword: profile.pagesPerKeyword,
    dryRun,
    report,
    controller,
    locks: new KeyedLock(),
    preview: { inserts: 0, updates: 0, unchanged: 0, merged: new Map() },
    finished: new Set(),
  };

  const { deadlineMs } = options;
  const timer = deadlineMs === undefined
    ? undefined
    : setTimeout(() => controller.abort(new RunTimeoutError(deadlineMs)), deadlineMs);

  try {
    const keywords = await deps.keywords.load(options.mode);
    const connectors = options.sources
      ? deps.connectors.filter((c) => options.sources?.includes(c.source))
      : deps.connectors;

    deps.onStateChange?.('running');
    logger.log(
      `Starting ${options.mode} run${dryRun ? ' (dry run)' : ''}: ` +
        `${keywords.length} keywords across ${connectors.length} sources`,
    );

    if (connectors.length === 0) {
      report.addError({ source: null, keyword: null, error_kind: 'UnexpectedError', message: 'No sources selected' });
    }

    const drained = Promise.all(connectors.map((connector) => drainSource(ctx, connector, keywords)));
    // a connector stuck in I/O that ignores the signal must not hold the run past an abort
    await Promise.race([drained, abortion(controller.signal)]);

    if (controller.signal.aborted) {
      for (const connector of connectors) {
        if (ctx.finished.has(connector.source)) continue;
        const stats = report.source(connector.source);
        if (stats.state === 'completed') stats.state = 'cancelled';
      }
      void drained.catch((err: unknown) => logger.error(`Cancelled source failed late: ${errorMessage(err)}`));
    }
  } catch (err) {
    report.addError({ source: null, keyword: null, error_kind: errorKind(err), message: errorMessage(err) });
    logger.error(`Run aborted: ${errorMessage(err)}`);
  } finally {
    clearTimeout(timer);
  }

  const reason: unknown = controller.signal.reason;
  if (controller.signal.aborted && reason instanceof RunTimeoutError) {
    report.abort('timeout');
    report.addError({ source: null, keyword: null, error_kind: reason.kind, message: reason.message });
    logger.error(`  ${reason.message}; cancelled in-flight sources`);
  }

  if (dryRun) {
    const { inserts, updates, unchanged } = ctx.preview;
    logger.log(`DRY RUN: would insert ${inserts}, update ${updates} and leave ${unchanged} workflows unchanged`);
  }

  const final = report.finalize(now());
  deps.onStateChange?.(terminalState(final.status));
  await publish(final, deps, logger);
  return final;
}
