import 'dotenv/config';
import { Command, Option } from 'commander';
import { createApiServer } from './api/server.js';
import { loadConfig, parseDeadlineMinutes } from './config.js';
import { createConnectors } from './connectors/index.js';
import { SOURCE_NAMES, isSourceName } from './connectors/types.js';
import { createSupabaseStore } from './db/supabase.js';
import { fileKeywordSource } from './ingest/keywords.js';
import { MODES, parseMode } from './ingest/modes.js';
import { runIngestion } from './ingest/orchestrator.js';
import { RateLimiter } from './ingest/rate-limiter.js';
import { exitCodeFor } from './ingest/run-report.js';
import {
  checkDatabase,
  checkErrorRate,
  checkLastRun,
  generateHealthReport,
  type HealthReport,
  type HealthStatus,
} from './monitor/health.js';
import { readRunLog, runLogReporter } from './monitor/run-log.js';
import { consoleReporter } from './monitor/summary.js';
import { computeCrossPlatformScores, formatCrossPlatform } from './scoring/cross-platform.js';

const program = new Command();

program
  .name('flowpulse')
  .description('Workflow popularity ingestion: YouTube, Discourse and Google Ads signals merged into one store')
  .version('0.1.0');

function positiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive number, got "${value}"`);
  }
  return parsed;
}

program
  .command('ingest')
  .description('Run one ingestion pass and store merged workflow records in Supabase')
  .addOption(new Option('--mode <mode>', 'Ingestion mode').choices([...MODES]).default('full'))
  .option('--dry-run', 'Run the whole pipeline without writing to the store')
  .option('--deadline <minutes>', 'Wall-clock deadline for the run', parseDeadlineMinutes)
  .addOption(new Option('--source <source>', 'Ingest a single source only').choices([...SOURCE_NAMES]))
  .action(async (opts: { mode: string; dryRun?: boolean; deadline?: number; source?: string }) => {
    const config = loadConfig();
    const mode = parseMode(opts.mode);
    const store = createSupabaseStore();

    const report = await runIngestion(
      {
        connectors: createConnectors(config),
        store,
        keywords: fileKeywordSource(config.keywordsPath),
        rateLimiter: new RateLimiter(config.rateLimits),
        retry: config.retry,
        reporters: [consoleReporter(), runLogReporter(config.runLogPath)],
        analytics: async () => {
          console.log('\nComputing cross-platform scores...');
          const scores = computeCrossPlatformScores(await store.list({ limit: 10_000 }));
          console.log(formatCrossPlatform(scores) || 'No workflow appears on more than one platform yet.');
        },
      },
      {
        mode,
        dryRun: opts.dryRun ?? false,
        deadlineMs: opts.deadline ? opts.deadline * 60_000 : config.deadlineMs,
        sources: opts.source && isSourceName(opts.source) ? [opts.source] : undefined,
      },
    );

    process.exitCode = exitCodeFor(report.status);
  });

function printHealth(result: { status: HealthStatus; message: string } | HealthReport, json: boolean): HealthStatus {
  if (json) {
    console.log(JSON.stringify(result, null, 2));
  } else if ('checks' in result) {
    console.log(`Status: ${result.overall_status.toUpperCase()}`);
    console.log('\nDetailed checks:');
    for (const [name, check] of Object.entries(result.checks)) {
      console.log(`  [${check.status}] ${name}: ${check.message}`);
    }
  } else {
    console.log(`Status: ${result.status.toUpperCase()}`);
    console.log(`Message: ${result.message}`);
  }
  return 'checks' in result ? result.overall_status : result.status;
}

program
  .command('monitor')
  .description('Health checks over the run log and the store (default: full report)')
  .option('--check-last-run', 'Check when the last run finished')
  .option('--check-logs', 'Summarize run errors within the window')
  .option('--check-database', 'Check store connectivity and recent updates')
  .option('--hours <n>', 'Time window in hours', positiveNumber, 24)
  .option('--json', 'Output JSON')
  .option('--alert-on-error', 'Exit with code 1 when the status is error')
  .action(async (opts: {
    checkLastRun?: boolean;
    checkLogs?: boolean;
    checkDatabase?: boolean;
    hours: number;
    json?: boolean;
    alertOnError?: boolean;
  }) => {
    const config = loadConfig();
    const store = createSupabaseStore();
    const { reports, malformed } = await readRunLog(config.runLogPath);
    if (malformed > 0 && !opts.json) {
      console.error(`Skipped ${malformed} malformed lines in ${config.runLogPath}`);
    }

    let status: HealthStatus;
    if (opts.checkLastRun) {
      status = printHealth(checkLastRun(reports, { hoursThreshold: opts.hours }), opts.json ?? false);
    } else if (opts.checkLogs) {
      status = printHealth(checkErrorRate(reports, { hours: opts.hours }), opts.json ?? false);
    } else if (opts.checkDatabase) {
      status = printHealth(await checkDatabase(store), opts.json ?? false);
    } else {
      status = printHealth(await generateHealthReport(reports, store, { hours: opts.hours }), opts.json ?? false);
    }

    if (opts.alertOnError && status === 'error') process.exitCode = 1;
  });

program
  .command('serve')
  .description('Serve the read-only workflow query API')
  .option('--port <port>', 'Port to listen on', positiveNumber, 3000)
  .action((opts: { port: number }) => {
    const server = createApiServer(createSupabaseStore());
    server.listen(opts.port, () => {
      console.log(`Serving at http://localhost:${opts.port}`);
      console.log('  /workflows?platform=&country=   tracked workflows');
    });
  });

program
  .command('status')
  .description('Show stored workflow count and the last run')
  .action(async () => {
    const config = loadConfig();
    const store = createSupabaseStore();
    const { reports } = await readRunLog(config.runLogPath);
    const last = reports.at(-1);

    console.log('flowpulse status:');
    console.log(`  Workflows: ${await store.count()}`);
    console.log(`  Runs logged: ${reports.length}`);
    console.log(`  Last run: ${last ? `${last.finished_at} (${last.mode}, ${last.status})` : 'never'}`);
  });

await program.parseAsync();
