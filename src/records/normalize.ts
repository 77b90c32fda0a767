import { PermanentItemError } from '../errors.js';
import type {
  DiscourseRawItem,
  GoogleAdsRawItem,
  MonthlySearchVolume,
  RawItem,
  YouTubeRawItem,
} from '../connectors/types.js';
import { GLOBAL_COUNTRY, type MetricValue, type WorkflowRecord } from './types.js';

export type TrendDirection = 'rising' | 'falling' | 'stable';

const TREND_THRESHOLD = 0.1;

/**
 * Coerce a metric to a number. Numeric strings like "1,200" or "200,000+" parse;
 * anything else is undefined.
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string') return undefined;
  const cleaned = value.replace(/[,+\s]/g, '');
  if (cleaned === '') return undefined;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function setMetric(metrics: Record<string, MetricValue>, name: string, value: MetricValue | undefined): void {
  if (value !== undefined) metrics[name] = value;
}

function requireName(name: string | undefined, what: string): string {
  const trimmed = name?.trim();
  if (!trimmed) throw new PermanentItemError(`${what} has no workflow name`);
  return trimmed;
}

function countryOf(value: string | undefined): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed.toUpperCase() : GLOBAL_COUNTRY;
}

function ratio(part: number | undefined, views: number | undefined): number | undefined {
  if (part === undefined || views === undefined) return undefined;
  return views === 0 ? 0 : round(part / views, 4);
}

function normalizeYouTube(item: YouTubeRawItem): Omit<WorkflowRecord, 'last_updated'> {
  const views = toNumber(item.view_count);
  const likes = toNumber(item.like_count);
  const comments = toNumber(item.comment_count);

  const metrics: Record<string, MetricValue> = {};
  setMetric(metrics, 'views', views);
  setMetric(metrics, 'likes', likes);
  setMetric(metrics, 'comments', comments);
  setMetric(metrics, 'like_to_view_ratio', ratio(likes, views));
  setMetric(metrics, 'comment_to_view_ratio', ratio(comments, views));

  return {
    workflow_name: requireName(item.title, `YouTube video ${item.video_id}`),
    platform: 'YouTube',
    country: countryOf(item.region),
    popularity_metrics: metrics,
    source_url: item.video_id ? `https://www.youtube.com/watch?v=${item.video_id}` : null,
  };
}

function normalizeDiscourse(item: DiscourseRawItem): Omit<WorkflowRecord, 'last_updated'> {
  const metrics: Record<string, MetricValue> = {};
  setMetric(metrics, 'views', toNumber(item.views));
  setMetric(metrics, 'replies', toNumber(item.reply_count));
  setMetric(metrics, 'likes', toNumber(item.like_count));
  setMetric(metrics, 'posts', toNumber(item.posts_count));
  metrics.solved = item.has_accepted_answer ? 1 : 0;

  const base = item.base_url.replace(/\/+$/, '');
  const path = item.slug ? `${item.slug}/${item.topic_id}` : String(item.topic_id);

  return {
    workflow_name: requireName(item.title, `Discourse topic ${item.topic_id}`),
    platform: 'Discourse',
    country: GLOBAL_COUNTRY,
    popularity_metrics: metrics,
    source_url: `${base}/t/${path}`,
  };
}

/**
 * Compare the mean of the latest three months against the three before.
 * Fewer than six months of history is reported as stable.
 */
export function trendDirection(volumes: MonthlySearchVolume[]): TrendDirection {
  if (volumes.length < 6) return 'stable';

  const ordered = [...volumes].sort((a, b) => a.year - b.year || a.month - b.month);
  const mean = (slice: MonthlySearchVolume[]) =>
    slice.reduce((sum, v) => sum + v.searches, 0) / slice.length;

  const recent = mean(ordered.slice(-3));
  const prior = mean(ordered.slice(-6, -3));

  if (prior === 0) return recent > 0 ? 'rising' : 'stable';

  const change = (recent - prior) / prior;
  if (change > TREND_THRESHOLD) return 'rising';
  if (change < -TREND_THRESHOLD) return 'falling';
  return 'stable';
}

function micros(value: string | number | undefined): number | undefined {
  const parsed = toNumber(value);
  return parsed === undefined ? undefined : round(parsed / 1_000_000, 2);
}

function normalizeGoogleAds(item: GoogleAdsRawItem): Omit<WorkflowRecord, 'last_updated'> {
  const name = requireName(item.text, 'Keyword idea');
  const country = countryOf(item.country);

  const metrics: Record<string, MetricValue> = {};
  setMetric(metrics, 'search_volume', toNumber(item.avg_monthly_searches));
  setMetric(metrics, 'competition', item.competition?.trim() || undefined);
  setMetric(metrics, 'competition_index', toNumber(item.competition_index));
  setMetric(metrics, 'cpc_low', micros(item.low_bid_micros));
  setMetric(metrics, 'cpc_high', micros(item.high_bid_micros));
  metrics.trend_direction = trendDirection(item.monthly_searches);

  const geo = country === GLOBAL_COUNTRY ? '' : `&geo=${country}`;

  return {
    workflow_name: name,
    platform: 'GoogleAds',
    country,
    popularity_metrics: metrics,
    source_url: `https://trends.google.com/trends/explore?q=${encodeURIComponent(name)}${geo}`,
  };
}

/** Map one raw connector item onto the canonical record shape. */
export function normalizeItem(item: RawItem, now: Date = new Date()): WorkflowRecord {
  const record = item.source === 'youtube'
    ? normalizeYouTube(item)
    : item.source === 'discourse'
      ? normalizeDiscourse(item)
      : normalizeGoogleAds(item);
  return { ...record, last_updated: now.toISOString() };
}
