import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { SOURCE_NAMES } from '../connectors/types.js';
import { ERROR_KINDS } from '../errors.js';
import { MODES } from '../ingest/modes.js';
import type { RunReporter } from '../ingest/orchestrator.js';
import { RUN_STATUSES, SOURCE_STATES, type RunReport } from '../ingest/run-report.js';

const count = z.number().int().nonnegative();

const SourceStatsSchema = z.object({
  attempted: count,
  succeeded: count,
  failed: count,
  retried: count,
  rate_limited: count,
  skipped: count,
  state: z.enum(SOURCE_STATES),
});

const RunErrorSchema = z.object({
  source: z.enum(SOURCE_NAMES).nullable(),
  keyword: z.string().nullable(),
  error_kind: z.enum(ERROR_KINDS),
  message: z.string(),
});

export const RunReportSchema: z.ZodType<RunReport> = z.object({
  run_id: z.string(),
  mode: z.enum(MODES),
  dry_run: z.boolean(),
  started_at: z.string(),
  finished_at: z.string(),
  duration_ms: z.number(),
  per_source: z.record(z.enum(SOURCE_NAMES), SourceStatsSchema),
  errors: z.array(RunErrorSchema),
  status: z.enum(RUN_STATUSES),
});

export interface RunLog {
  reports: RunReport[];
  /** Lines that were not valid run reports. */
  malformed: number;
}

/** Rebuild a RunReport from one parsed log line, or undefined if it is not one. */
export function parseRunReport(value: unknown): RunReport | undefined {
  const result = RunReportSchema.safeParse(value);
  return result.success ? result.data : undefined;
}

export async function appendRunReport(path: string, report: RunReport): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, `${JSON.stringify(report)}\n`, 'utf-8');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Read the JSON-lines run log, oldest first. A missing file is an empty log. */
export async function readRunLog(path: string): Promise<RunLog> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return { reports: [], malformed: 0 };
    throw err;
  }

  const reports: RunReport[] = [];
  let malformed = 0;

  for (const line of text.split('\n')) {
    if (!line.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      malformed++;
      continue;
    }
    const report = parseRunReport(parsed);
    if (report) reports.push(report);
    else malformed++;
  }

  return { reports, malformed };
}

export function runLogReporter(path: string): RunReporter {
  return (report) => appendRunReport(path, report);
}
