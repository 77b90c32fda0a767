import type { PermanentItemError } from '../errors.js';
import type { Mode } from '../ingest/modes.js';

export const SOURCE_NAMES = ['youtube', 'discourse', 'google-ads'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export interface YouTubeRawItem {
  source: 'youtube';
  video_id: string;
  title?: string;
  channel_title?: string;
  region?: string;
  view_count?: string | number;
  like_count?: string | number;
  comment_count?: string | number;
  published_at?: string;
}

export interface DiscourseRawItem {
  source: 'discourse';
  base_url: string;
  topic_id: number;
  title?: string;
  slug?: string;
  views?: number;
  reply_count?: number;
  like_count?: number;
  posts_count?: number;
  has_accepted_answer?: boolean;
}

export interface MonthlySearchVolume {
  year: number;
  month: number; // 1-12
  searches: number;
}

export interface GoogleAdsRawItem {
  source: 'google-ads';
  text?: string;
  country?: string;
  avg_monthly_searches?: string | number;
  competition?: string;
  competition_index?: string | number;
  low_bid_micros?: string | number;
  high_bid_micros?: string | number;
  monthly_searches: MonthlySearchVolume[];
}

export type RawItem = YouTubeRawItem | DiscourseRawItem | GoogleAdsRawItem;

export interface FetchContext {
  signal: AbortSignal;
  /** Wait for a rate-limit slot; call once before every outbound request. */
  acquire: () => Promise<void>;
}

/**
 * Connectors yield item-level defects as PermanentItemError values instead of
 * throwing them, so the rest of the sequence can still be drained.
 */
export type ConnectorYield = RawItem | PermanentItemError;

export interface SourceConnector {
  readonly source: SourceName;
  fetch(
    keywords: readonly string[],
    mode: Mode,
    pagesPerKeyword: number,
    ctx: FetchContext,
  ): AsyncIterable<ConnectorYield>;
}

export function isSourceName(value: string): value is SourceName {
  return SOURCE_NAMES.some((name) => name === value);
}
