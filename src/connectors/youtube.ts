import { PermanentItemError, SourceRejectedError } from '../errors.js';
import type { Mode } from '../ingest/modes.js';
import { asArray, asNumeric, asString, isRecord, requestJson } from './http.js';
import type { ConnectorYield, FetchContext, SourceConnector, YouTubeRawItem } from './types.js';

const API_BASE = 'https://www.googleapis.com/youtube/v3';
const PAGE_SIZE = 50;

const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded', 'rateLimitExceeded', 'userRateLimitExceeded']);

export interface YouTubeOptions {
  apiKey?: string;
  regions: string[];
  baseUrl?: string;
}

interface SearchHit {
  video_id: string;
  title?: string;
  channel_title?: string;
  published_at?: string;
}

type VideoStats = Pick<YouTubeRawItem, 'view_count' | 'like_count' | 'comment_count'>;

export function isYouTubeQuotaError(body: unknown): boolean {
  if (!isRecord(body) || !isRecord(body.error)) return false;
  return asArray(body.error.errors).some((e) => isRecord(e) && QUOTA_REASONS.has(asString(e.reason) ?? ''));
}

function parseSearch(body: unknown): { hits: Array<SearchHit | PermanentItemError>; nextPageToken?: string } {
  if (!isRecord(body)) return { hits: [] };

  const hits = asArray(body.items).map((item): SearchHit | PermanentItemError => {
    const id = isRecord(item) && isRecord(item.id) ? asString(item.id.videoId) : undefined;
    if (!id || !isRecord(item)) return new PermanentItemError('YouTube search result without a videoId');
    const snippet: Record<string, unknown> = isRecord(item.snippet) ? item.snippet : {};
    return {
      video_id: id,
      title: asString(snippet.title),
      channel_title: asString(snippet.channelTitle),
      published_at: asString(snippet.publishedAt),
    };
  });

  return { hits, nextPageToken: asString(body.nextPageToken) };
}

function parseStatistics(body: unknown): Map<string, VideoStats> {
  const stats = new Map<string, VideoStats>();
  if (!isRecord(body)) return stats;

  for (const item of asArray(body.items)) {
    if (!isRecord(item) || !isRecord(item.statistics)) continue;
    const id = asString(item.id);
    if (!id) continue;
    stats.set(id, {
      view_count: asNumeric(item.statistics.viewCount),
      like_count: asNumeric(item.statistics.likeCount),
      comment_count: asNumeric(item.statistics.commentCount),
    });
  }

  return stats;
}

async function* fetchVideos(
  options: YouTubeOptions,
  keywords: readonly string[],
  mode: Mode,
  pagesPerKeyword: number,
  ctx: FetchContext,
): AsyncGenerator<ConnectorYield> {
  const { apiKey } = options;
  if (!apiKey) throw new SourceRejectedError('Missing YOUTUBE_API_KEY in environment');

  const base = options.baseUrl ?? API_BASE;
  const order = mode === 'deep' ? 'viewCount' : 'relevance';

  for (const keyword of keywords) {
    for (const region of options.regions) {
      let pageToken: string | undefined;

      for (let page = 0; page < pagesPerKeyword; page++) {
        const params = new URLSearchParams({
          part: 'snippet',
          type: 'video',
          maxResults: String(PAGE_SIZE),
          order,
          q: keyword,
          regionCode: region,
          key: apiKey,
        });
        if (pageToken) params.set('pageToken', pageToken);

        const search = parseSearch(
          await requestJson(`${base}/search?${params}`, `YouTube search "${keyword}" (${region})`, ctx, {
            isQuotaError: isYouTubeQuotaError,
          }),
        );

        const ids = search.hits.flatMap((hit) => (hit instanceof PermanentItemError ? [] : [hit.video_id]));
        const statistics = ids.length > 0
          ? parseStatistics(
            await requestJson(
              `${base}/videos?${new URLSearchParams({ part: 'statistics', id: ids.join(','), key: apiKey })}`,
              'YouTube videos',
              ctx,
              { isQuotaError: isYouTubeQuotaError },
            ),
          )
          : new Map<string, VideoStats>();

        for (const hit of search.hits) {
          if (hit instanceof PermanentItemError) {
            yield hit;
            continue;
          }
          yield { source: 'youtube', region, ...hit, ...statistics.get(hit.video_id) };
        }

        pageToken = search.nextPageToken;
        if (!pageToken) break;
      }
    }
  }
}

export function youtubeConnector(options: YouTubeOptions): SourceConnector {
  return {
    source: 'youtube',
    fetch: (keywords, mode, pagesPerKeyword, ctx) => fetchVideos(options, keywords, mode, pagesPerKeyword, ctx),
  };
}
