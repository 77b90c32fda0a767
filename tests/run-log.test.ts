import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFile, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ERROR_KINDS } from '../src/errors.js';
import { RunReportBuilder, type RunReport } from '../src/ingest/run-report.js';
import { appendRunReport, parseRunReport, readRunLog, runLogReporter } from '../src/monitor/run-log.js';

function sampleReport(): RunReport {
  const builder = new RunReportBuilder('test', false, new Date('2026-03-01T00:00:00Z'));
  const stats = builder.source('youtube');
  stats.attempted = 5;
  stats.succeeded = 4;
  stats.skipped = 1;
  builder.addError({ source: 'youtube', keyword: 'n8n', error_kind: 'PermanentItemError', message: 'no title' });
  return builder.finalize(new Date('2026-03-01T00:01:00Z'));
}

describe('run log', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'run-log-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('appends reports as JSON lines and reads them back in order', async () => {
    const path = join(dir, 'logs', 'runs.jsonl');
    const first = sampleReport();
    const second = sampleReport();

    await appendRunReport(path, first);
    await runLogReporter(path)(second);

    const log = await readRunLog(path);
    expect(log.malformed).toBe(0);
    expect(log.reports).toEqual([first, second]);
  });

  it('counts lines that are not run reports', async () => {
    const path = join(dir, 'runs.jsonl');
    await appendRunReport(path, sampleReport());
    await appendFile(path, 'not json\n{"run_id": 1}\n\n', 'utf-8');

    const log = await readRunLog(path);
    expect(log.reports).toHaveLength(1);
    expect(log.malformed).toBe(2);
  });

  it('treats a missing log as empty', async () => {
    expect(await readRunLog(join(dir, 'missing.jsonl'))).toEqual({ reports: [], malformed: 0 });
  });
});

describe('parseRunReport', () => {
  it('rejects unknown statuses, sources and error kinds', () => {
    const valid = JSON.parse(JSON.stringify(sampleReport()));

    expect(parseRunReport(valid)).toEqual(valid);
    expect(parseRunReport({ ...valid, status: 'unknown' })).toBeUndefined();
    expect(parseRunReport({ ...valid, per_source: { twitter: valid.per_source.youtube } })).toBeUndefined();
    expect(parseRunReport({ ...valid, errors: [{ ...valid.errors[0], error_kind: 'Oops' }] })).toBeUndefined();
    expect(parseRunReport(null)).toBeUndefined();
  });

  it('accepts every error kind the ingestion can record', () => {
    const valid = JSON.parse(JSON.stringify(sampleReport()));

    for (const kind of ERROR_KINDS) {
      const report = parseRunReport({ ...valid, errors: [{ ...valid.errors[0], error_kind: kind }] });
      expect(report?.errors[0].error_kind).toBe(kind);
    }
  });
});
