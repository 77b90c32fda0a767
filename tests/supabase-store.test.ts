import { describe, it, expect, vi, beforeEach } from 'vitest';

const fake = vi.hoisted(() => {
  interface Result {
    data?: unknown;
    count?: number | null;
    error: { message: string } | null;
  }

  const calls: unknown[][] = [];
  const state: { result: Result } = { result: { data: null, error: null } };

  class FakeQuery {
    select(...args: unknown[]) {
      calls.push(['select', ...args]);
      return this;
    }
    eq(...args: unknown[]) {
      calls.push(['eq', ...args]);
      return this;
    }
    gte(...args: unknown[]) {
      calls.push(['gte', ...args]);
      return this;
    }
    order(...args: unknown[]) {
      calls.push(['order', ...args]);
      return this;
    }
    limit(...args: unknown[]) {
      calls.push(['limit', ...args]);
      return this;
    }
    maybeSingle() {
      calls.push(['maybeSingle']);
      return Promise.resolve(state.result);
    }
    then<T>(onFulfilled: (value: Result) => T, onRejected?: (reason: unknown) => T): Promise<T> {
      return Promise.resolve(state.result).then(onFulfilled, onRejected);
    }
  }

  const client = {
    from(table: string) {
      calls.push(['from', table]);
      return new FakeQuery();
    },
    rpc(fn: string, params: unknown) {
      calls.push(['rpc', fn, params]);
      return Promise.resolve(state.result);
    },
  };

  return { calls, state, client, createClient: vi.fn(() => client) };
});

vi.mock('@supabase/supabase-js', () => ({ createClient: fake.createClient }));

import { createSupabaseStore, rowToRecord } from '../src/db/supabase.js';
import { StoreUnavailableError } from '../src/errors.js';
import type { WorkflowRecord } from '../src/records/types.js';

const row = {
  id: 7,
  workflow_name: 'n8n slack',
  platform: 'YouTube',
  country: 'US',
  popularity_metrics: { views: 10, trend_direction: 'rising', junk: null },
  source_url: 'https://www.youtube.com/watch?v=abc',
  last_updated: '2026-03-01T00:00:00+00:00',
};

const record: WorkflowRecord = {
  workflow_name: 'n8n slack',
  platform: 'YouTube',
  country: 'US',
  popularity_metrics: { views: 10, trend_direction: 'rising' },
  source_url: 'https://www.youtube.com/watch?v=abc',
  last_updated: '2026-03-01T00:00:00.000Z',
};

beforeEach(() => {
  fake.calls.length = 0;
  fake.state.result = { data: null, error: null };
  vi.stubEnv('SUPABASE_URL', 'http://localhost:54321');
  vi.stubEnv('SUPABASE_ANON_KEY', 'test-secret');
});

describe('rowToRecord', () => {
  it('keeps only scalar metrics and normalizes the timestamp', () => {
    expect(rowToRecord(row)).toEqual(record);
  });

  it('rejects rows without a natural key', () => {
    expect(() => rowToRecord({ ...row, platform: 'TikTok' })).toThrow(StoreUnavailableError);
    expect(() => rowToRecord(null)).toThrow('Supabase returned an empty workflow row');
  });
});

describe('Supabase record store', () => {
  it('upserts through the merge function', async () => {
    fake.state.result = { data: [row], error: null };

    const merged = await createSupabaseStore().upsert(record);

    expect(merged).toEqual(record);
    expect(fake.calls).toEqual([
      ['rpc', 'upsert_workflow', {
        p_workflow_name: 'n8n slack',
        p_platform: 'YouTube',
        p_country: 'US',
        p_popularity_metrics: { views: 10, trend_direction: 'rising' },
        p_source_url: 'https://www.youtube.com/watch?v=abc',
      }],
    ]);
  });

  it('wraps database errors as StoreUnavailableError', async () => {
    fake.state.result = { data: null, error: { message: 'connection refused' } };

    await expect(createSupabaseStore().upsert(record)).rejects.toThrow(
      new StoreUnavailableError('Supabase upsert failed: connection refused'),
    );
  });

  it('looks a record up by its natural key', async () => {
    const found = await createSupabaseStore().getByKey('n8n slack', 'YouTube', 'US');

    expect(found).toBeNull();
    expect(fake.calls).toEqual([
      ['from', 'workflows'],
      ['select', '*'],
      ['eq', 'workflow_name', 'n8n slack'],
      ['eq', 'platform', 'YouTube'],
      ['eq', 'country', 'US'],
      ['maybeSingle'],
    ]);
  });

  it('lists records with optional filters, newest first', async () => {
    fake.state.result = { data: [row], error: null };

    const records = await createSupabaseStore().list({ platform: 'YouTube', country: 'us' });

    expect(records).toEqual([record]);
    expect(fake.calls).toEqual([
      ['from', 'workflows'],
      ['select', '*'],
      ['eq', 'platform', 'YouTube'],
      ['eq', 'country', 'US'],
      ['order', 'last_updated', { ascending: false }],
      ['limit', 1000],
    ]);
  });

  it('counts records updated since a point in time', async () => {
    fake.state.result = { count: 3, error: null };

    const total = await createSupabaseStore().count({ updatedSince: new Date('2026-02-27T00:00:00Z') });

    expect(total).toBe(3);
    expect(fake.calls).toEqual([
      ['from', 'workflows'],
      ['select', '*', { count: 'exact', head: true }],
      ['gte', 'last_updated', '2026-02-27T00:00:00.000Z'],
    ]);
  });

  it('reports missing credentials on first use', async () => {
    vi.resetModules();
    vi.stubEnv('SUPABASE_URL', '');
    const { createSupabaseStore: freshStore } = await import('../src/db/supabase.js');

    await expect(freshStore().count()).rejects.toThrow('Missing SUPABASE_URL or SUPABASE_ANON_KEY in environment');
  });
});
