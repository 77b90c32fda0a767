import { randomUUID } from 'node:crypto';
import type { SourceName } from '../connectors/types.js';
import type { ErrorKind } from '../errors.js';
import type { Mode } from './modes.js';

export const RUN_STATUSES = ['success', 'partial_failure', 'failure'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export const SOURCE_STATES = ['completed', 'exhausted', 'rejected', 'cancelled'] as const;

export type SourceState = (typeof SOURCE_STATES)[number];

export interface SourceStats {
  attempted: number;
  succeeded: number;
  failed: number;
  retried: number;
  rate_limited: number;
  skipped: number;
  state: SourceState;
}

export interface RunError {
  source: SourceName | null; // null for run-level errors
  keyword: string | null;
  error_kind: ErrorKind;
  message: string;
}

export interface RunReport {
  readonly run_id: string;
  readonly mode: Mode;
  readonly dry_run: boolean;
  readonly started_at: string;
  readonly finished_at: string;
  readonly duration_ms: number;
  readonly per_source: Readonly<Partial<Record<SourceName, Readonly<SourceStats>>>>;
  readonly errors: readonly RunError[];
  readonly status: RunStatus;
}

export type AbortCause = 'timeout' | 'store_unavailable';

function emptyStats(): SourceStats {
  return { attempted: 0, succeeded: 0, failed: 0, retried: 0, rate_limited: 0, skipped: 0, state: 'completed' };
}

/**
 * Mutable accumulator owned by one run. `finalize` derives the status and
 * hands back a frozen RunReport; the builder refuses changes after that.
 */
export class RunReportBuilder {
  private readonly runId = randomUUID();
  private readonly perSource = new Map<SourceName, SourceStats>();
  private readonly errors: RunError[] = [];
  private abortCause: AbortCause | null = null;
  private finalized = false;

  constructor(
    readonly mode: Mode,
    readonly dryRun: boolean,
    private readonly startedAt: Date,
  ) {}

  source(source: SourceName): SourceStats {
    this.assertOpen();
    let stats = this.perSource.get(source);
    if (!stats) {
      stats = emptyStats();
      this.perSource.set(source, stats);
    }
    return stats;
  }

  addError(error: RunError): void {
    this.assertOpen();
    this.errors.push(error);
  }

  abort(cause: AbortCause): void {
    this.abortCause ??= cause;
  }

  get totalSucceeded(): number {
    let total = 0;
    for (const stats of this.perSource.values()) total += stats.succeeded;
    return total;
  }

  finalize(finishedAt: Date): RunReport {
    this.assertOpen();
    this.finalized = true;

    const per_source: Partial<Record<SourceName, Readonly<SourceStats>>> = {};
    for (const [source, stats] of this.perSource) {
      per_source[source] = Object.freeze({ ...stats });
    }

    return Object.freeze({
      run_id: this.runId,
      mode: this.mode,
      dry_run: this.dryRun,
      started_at: this.startedAt.toISOString(),
      finished_at: finishedAt.toISOString(),
      duration_ms: finishedAt.getTime() - this.startedAt.getTime(),
      per_source: Object.freeze(per_source),
      errors: Object.freeze([...this.errors]),
      status: this.status(),
    });
  }

  private status(): RunStatus {
    const succeeded = this.totalSucceeded;

    if (this.abortCause === 'timeout') return 'partial_failure';
    if (this.abortCause === 'store_unavailable') return succeeded > 0 ? 'partial_failure' : 'failure';

    const sources = [...this.perSource.values()];
    if (sources.length === 0) return this.errors.length > 0 ? 'failure' : 'success';

    const failedCompletely = (s: SourceStats) =>
      s.state === 'exhausted' || s.state === 'rejected' || (s.failed > 0 && s.succeeded === 0);

    if (succeeded === 0 && sources.every(failedCompletely)) return 'failure';
    if (sources.some((s) => s.failed > 0 || s.state === 'exhausted' || s.state === 'rejected')) {
      return 'partial_failure';
    }
    return 'success';
  }

  private assertOpen(): void {
    if (this.finalized) throw new Error('Run report is already finalized');
  }
}

/** Process exit status a scheduler can alert on. */
export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case 'success':
      return 0;
    case 'failure':
      return 1;
    case 'partial_failure':
      return 2;
  }
}
