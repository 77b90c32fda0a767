import type { RecordStore } from '../db/types.js';
import { errorMessage } from '../errors.js';
import type { RunReport } from '../ingest/run-report.js';
import { formatRunError } from './summary.js';

export type HealthStatus = 'healthy' | 'warning' | 'error';

export interface LastRunCheck {
  status: HealthStatus;
  message: string;
  last_run: string | null;
  last_status: RunReport['status'] | null;
  hours_since_last_run: number | null;
}

export interface ErrorRateCheck {
  status: HealthStatus;
  message: string;
  runs: number;
  attempted: number;
  errors: number;
  error_rate: number;
  recent_errors: string[];
}

export interface DatabaseCheck {
  status: HealthStatus;
  message: string;
  total_workflows: number;
  recent_updates: number;
}

export interface HealthReport {
  timestamp: string;
  overall_status: HealthStatus;
  checks: {
    last_run: LastRunCheck;
    error_rate: ErrorRateCheck;
    database: DatabaseCheck;
  };
}

const HOUR_MS = 60 * 60 * 1000;

function hoursBetween(from: Date, to: Date): number {
  return Math.round(((to.getTime() - from.getTime()) / HOUR_MS) * 100) / 100;
}

export function checkLastRun(
  reports: RunReport[],
  { hoursThreshold = 25, now = new Date() }: { hoursThreshold?: number; now?: Date } = {},
): LastRunCheck {
  const last = reports.reduce<RunReport | null>(
    (latest, r) => (!latest || r.finished_at > latest.finished_at ? r : latest),
    null,
  );

  if (!last) {
    return { status: 'error', message: 'No ingestion runs logged', last_run: null, last_status: null, hours_since_last_run: null };
  }

  const hours = hoursBetween(new Date(last.finished_at), now);
  const stale = hours > hoursThreshold;
  const status: HealthStatus = stale || last.status === 'failure' ? 'warning' : 'healthy';

  return {
    status,
    message: `Last run: ${last.finished_at} (${last.mode}, ${last.status})${stale ? `, older than ${hoursThreshold}h` : ''}`,
    last_run: last.finished_at,
    last_status: last.status,
    hours_since_last_run: hours,
  };
}

export function checkErrorRate(
  reports: RunReport[],
  { hours = 24, now = new Date() }: { hours?: number; now?: Date } = {},
): ErrorRateCheck {
  const cutoff = now.getTime() - hours * HOUR_MS;
  const recent = reports.filter((r) => new Date(r.finished_at).getTime() >= cutoff);

  let attempted = 0;
  const lines: string[] = [];
  for (const report of recent) {
    for (const stats of Object.values(report.per_source)) attempted += stats?.attempted ?? 0;
    for (const error of report.errors) lines.push(`${report.finished_at} ${formatRunError(error)}`);
  }

  const errors = lines.length;
  const error_rate = attempted === 0 ? (errors > 0 ? 1 : 0) : Math.round((errors / attempted) * 10_000) / 10_000;

  let status: HealthStatus = 'healthy';
  if (recent.some((r) => r.status === 'failure')) status = 'error';
  else if (errors > 0) status = 'warning';

  return {
    status,
    message: `Found ${errors} errors across ${recent.length} runs in the last ${hours} hours`,
    runs: recent.length,
    attempted,
    errors,
    error_rate,
    recent_errors: lines.slice(-10),
  };
}

export async function checkDatabase(
  store: RecordStore,
  { recentHours = 48, now = new Date() }: { recentHours?: number; now?: Date } = {},
): Promise<DatabaseCheck> {
  try {
    const total_workflows = await store.count();
    const recent_updates = await store.count({ updatedSince: new Date(now.getTime() - recentHours * HOUR_MS) });
    return {
      status: recent_updates > 0 ? 'healthy' : 'warning',
      message: `Total workflows: ${total_workflows}, recent updates: ${recent_updates}`,
      total_workflows,
      recent_updates,
    };
  } catch (err) {
    return {
      status: 'error',
      message: `Database connection failed: ${errorMessage(err)}`,
      total_workflows: 0,
      recent_updates: 0,
    };
  }
}

const SEVERITY: Record<HealthStatus, number> = { healthy: 0, warning: 1, error: 2 };

export function worstStatus(statuses: HealthStatus[]): HealthStatus {
  return statuses.reduce<HealthStatus>((worst, s) => (SEVERITY[s] > SEVERITY[worst] ? s : worst), 'healthy');
}

export async function generateHealthReport(
  reports: RunReport[],
  store: RecordStore,
  { hours = 24, now = new Date() }: { hours?: number; now?: Date } = {},
): Promise<HealthReport> {
  const checks = {
    last_run: checkLastRun(reports, { now }),
    error_rate: checkErrorRate(reports, { hours, now }),
    database: await checkDatabase(store, { now }),
  };

  return {
    timestamp: now.toISOString(),
    overall_status: worstStatus(Object.values(checks).map((c) => c.status)),
    checks,
  };
}
