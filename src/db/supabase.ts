import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { StoreUnavailableError } from '../errors.js';
import { isPlatform, type MetricValue, type Platform, type WorkflowRecord } from '../records/types.js';
import type { RecordFilter, RecordStore } from './types.js';

const TABLE = 'workflows';
const DEFAULT_LIST_LIMIT = 1000;

let client: SupabaseClient | null = null;

export function getClient(): SupabaseClient {
  if (client) return client;

  const url = process.env.SUPABASE_URL;
  const key = process.env.SUPABASE_SERVICE_ROLE_KEY || process.env.SUPABASE_ANON_KEY;

  if (!url || !key) {
    throw new StoreUnavailableError('Missing SUPABASE_URL or SUPABASE_ANON_KEY in environment');
  }

  client = createClient(url, key, { auth: { persistSession: false } });
  return client;
}

function metricsOf(value: unknown): Record<string, MetricValue> {
  const metrics: Record<string, MetricValue> = {};
  if (typeof value !== 'object' || value === null) return metrics;
  for (const [name, metric] of Object.entries(value)) {
    if (typeof metric === 'number' || typeof metric === 'string') metrics[name] = metric;
  }
  return metrics;
}

/** Validate a `workflows` row coming back from PostgREST. */
export function rowToRecord(row: unknown): WorkflowRecord {
  if (typeof row !== 'object' || row === null) {
    throw new StoreUnavailableError('Supabase returned an empty workflow row');
  }
  const r: Record<string, unknown> = { ...row };
  const { workflow_name, platform, country, source_url, last_updated } = r;

  if (
    typeof workflow_name !== 'string' ||
    typeof platform !== 'string' ||
    !isPlatform(platform) ||
    typeof country !== 'string'
  ) {
    throw new StoreUnavailableError(`Supabase returned a malformed workflow row: ${JSON.stringify(row)}`);
  }

  return {
    workflow_name,
    platform,
    country,
    popularity_metrics: metricsOf(r.popularity_metrics),
    source_url: typeof source_url === 'string' && source_url !== '' ? source_url : null,
    last_updated: typeof last_updated === 'string' ? new Date(last_updated).toISOString() : new Date(0).toISOString(),
  };
}

function storeError(operation: string, message: string): StoreUnavailableError {
  return new StoreUnavailableError(`Supabase ${operation} failed: ${message}`);
}

/**
 * RecordStore over the `workflows` table. Upserts go through the
 * `upsert_workflow` Postgres function so the metric merge happens inside a
 * single INSERT ... ON CONFLICT statement.
 */
export function createSupabaseStore(injected?: SupabaseClient): RecordStore {
  // resolved per call so missing credentials surface as StoreUnavailableError on first use
  const db = () => injected ?? getClient();

  return {
    async upsert(record) {
      const { data, error } = await db().rpc('upsert_workflow', {
        p_workflow_name: record.workflow_name,
        p_platform: record.platform,
        p_country: record.country,
        p_popularity_metrics: record.popularity_metrics,
        p_source_url: record.source_url,
      });
      if (error) throw storeError('upsert', error.message);

      const row: unknown = Array.isArray(data) ? data[0] : data;
      return rowToRecord(row);
    },

    async getByKey(workflowName: string, platform: Platform, country: string) {
      const { data, error } = await db()
        .from(TABLE)
        .select('*')
        .eq('workflow_name', workflowName)
        .eq('platform', platform)
        .eq('country', country)
        .maybeSingle();

      if (error) throw storeError('lookup', error.message);
      return data ? rowToRecord(data) : null;
    },

    async list(filter: RecordFilter = {}) {
      let query = db().from(TABLE).select('*');
      if (filter.platform) query = query.eq('platform', filter.platform);
      if (filter.country) query = query.eq('country', filter.country.toUpperCase());

      const { data, error } = await query
        .order('last_updated', { ascending: false })
        .limit(filter.limit ?? DEFAULT_LIST_LIMIT);

      if (error) throw storeError('list', error.message);
      return (data ?? []).map(rowToRecord);
    },

    async count(options = {}) {
      let query = db().from(TABLE).select('*', { count: 'exact', head: true });
      if (options.updatedSince) query = query.gte('last_updated', options.updatedSince.toISOString());

      const { count, error } = await query;
      if (error) throw storeError('count', error.message);
      return count ?? 0;
    },
  };
}
