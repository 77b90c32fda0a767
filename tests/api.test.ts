import { describe, it, expect } from 'vitest';
import { handleRequest } from '../src/api/server.js';
import { naturalKeyOf, type WorkflowRecord } from '../src/records/types.js';
import { MemoryRecordStore } from './support/memory-store.js';

function seeded(): MemoryRecordStore {
  const store = new MemoryRecordStore();
  const records: WorkflowRecord[] = [
    { workflow_name: 'n8n slack', platform: 'YouTube', country: 'US', popularity_metrics: { views: 10 }, source_url: null, last_updated: '2026-03-01T00:00:00.000Z' },
    { workflow_name: 'n8n slack', platform: 'YouTube', country: 'IN', popularity_metrics: { views: 5 }, source_url: null, last_updated: '2026-03-01T00:00:00.000Z' },
    { workflow_name: 'n8n gmail', platform: 'Discourse', country: 'GLOBAL', popularity_metrics: { views: 7 }, source_url: null, last_updated: '2026-03-01T00:00:00.000Z' },
  ];
  for (const record of records) store.rows.set(naturalKeyOf(record), record);
  return store;
}

describe('handleRequest', () => {
  it('answers the root path', async () => {
    const res = await handleRequest(seeded(), 'GET', '/');
    expect(res.status).toBe(200);
  });

  it('filters workflows by platform and country', async () => {
    const res = await handleRequest(seeded(), 'GET', '/workflows?platform=YouTube&country=in');

    expect(res.status).toBe(200);
    expect(res.body).toEqual([
      { workflow_name: 'n8n slack', platform: 'YouTube', country: 'IN', popularity_metrics: { views: 5 }, source_url: null, last_updated: '2026-03-01T00:00:00.000Z' },
    ]);
  });

  it('applies the limit', async () => {
    const res = await handleRequest(seeded(), 'GET', '/workflows?limit=2');
    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(2);
  });

  it('returns 404 when nothing matches', async () => {
    const res = await handleRequest(seeded(), 'GET', '/workflows?platform=GoogleAds');
    expect(res).toEqual({ status: 404, body: { detail: 'No workflows found for the given criteria' } });
  });

  it('rejects bad parameters, paths and methods', async () => {
    const store = seeded();

    expect((await handleRequest(store, 'GET', '/workflows?platform=TikTok')).status).toBe(400);
    expect((await handleRequest(store, 'GET', '/workflows?limit=0')).status).toBe(400);
    expect((await handleRequest(store, 'GET', '/workflows?limit=abc')).status).toBe(400);
    expect((await handleRequest(store, 'GET', '/nope')).status).toBe(404);
    expect((await handleRequest(store, 'POST', '/workflows')).status).toBe(405);
  });
});
