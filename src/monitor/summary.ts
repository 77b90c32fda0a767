import type { Logger, RunReporter } from '../ingest/orchestrator.js';
import type { RunError, RunReport } from '../ingest/run-report.js';

export function formatRunError(error: RunError): string {
  const where = error.source ? `${error.source}${error.keyword ? ` "${error.keyword}"` : ''}` : 'run';
  return `${where} ${error.error_kind}: ${error.message}`;
}

export function formatRunSummary(report: RunReport): string[] {
  const totals = { attempted: 0, succeeded: 0, failed: 0 };
  for (const stats of Object.values(report.per_source)) {
    if (!stats) continue;
    totals.attempted += stats.attempted;
    totals.succeeded += stats.succeeded;
    totals.failed += stats.failed;
  }

  const elapsed = (report.duration_ms / 1000).toFixed(1);
  const stored = report.dry_run ? 'previewed' : 'stored';
  return [
    `Run ${report.run_id} (${report.mode}${report.dry_run ? ', dry run' : ''}) finished with ${report.status}`,
    `Done in ${elapsed}s: ${totals.attempted} attempted, ${totals.succeeded} ${stored}, ` +
      `${totals.failed} failed, ${report.errors.length} errors`,
  ];
}

export function consoleReporter(logger: Logger = console): RunReporter {
  return async (report) => {
    for (const line of formatRunSummary(report)) logger.log(line);
    for (const error of report.errors.slice(-10)) logger.error(`  ${formatRunError(error)}`);
  };
}
