import type { WorkflowRecord } from './types.js';

/**
 * Reconcile a stored record with a freshly ingested one sharing its natural key.
 *
 * Incoming metrics win on overlap, metrics the incoming record lacks are kept.
 * Nothing is averaged or accumulated: the source is authoritative for freshness only.
 * `source_url` is only replaced by a non-empty incoming value, and `last_updated`
 * always moves to `now`, even when nothing else changed.
 */
export function mergeRecords(
  existing: WorkflowRecord | null,
  incoming: WorkflowRecord,
  now: Date = new Date(),
): WorkflowRecord {
  const last_updated = now.toISOString();

  if (!existing) {
    return { ...incoming, popularity_metrics: { ...incoming.popularity_metrics }, last_updated };
  }

  return {
    workflow_name: existing.workflow_name,
    platform: existing.platform,
    country: existing.country,
    popularity_metrics: { ...existing.popularity_metrics, ...incoming.popularity_metrics },
    source_url: incoming.source_url ? incoming.source_url : existing.source_url,
    last_updated,
  };
}
