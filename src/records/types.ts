export const PLATFORMS = ['YouTube', 'Discourse', 'GoogleAds'] as const;

export type Platform = (typeof PLATFORMS)[number];

export const GLOBAL_COUNTRY = 'GLOBAL';

export type MetricValue = number | string;

export interface WorkflowRecord {
  workflow_name: string;
  platform: Platform;
  country: string; // ISO-like market code, GLOBAL when the source has no geography
  popularity_metrics: Record<string, MetricValue>;
  source_url: string | null;
  last_updated: string; // ISO 8601
}

export interface NaturalKey {
  workflow_name: string;
  platform: Platform;
  country: string;
}

export function naturalKeyOf(record: NaturalKey): string {
  return JSON.stringify([record.workflow_name, record.platform, record.country]);
}

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}
