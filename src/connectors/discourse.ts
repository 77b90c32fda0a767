import { PermanentItemError } from '../errors.js';
import { HttpStatusError, asArray, asNumber, asString, isRecord, requestJson } from './http.js';
import type { ConnectorYield, DiscourseRawItem, FetchContext, SourceConnector } from './types.js';

export interface DiscourseOptions {
  baseUrl: string;
  apiKey?: string;
  apiUsername?: string;
}

interface SearchTopic {
  id: number;
  title?: string;
  slug?: string;
  has_accepted_answer?: boolean;
}

function authHeaders(options: DiscourseOptions): Record<string, string> {
  if (!options.apiKey) return {};
  return { 'Api-Key': options.apiKey, 'Api-Username': options.apiUsername ?? 'system' };
}

function parseSearchTopics(body: unknown): SearchTopic[] {
  if (!isRecord(body)) return [];
  return asArray(body.topics).flatMap((topic): SearchTopic[] => {
    if (!isRecord(topic)) return [];
    const id = asNumber(topic.id);
    if (id === undefined) return [];
    return [{
      id,
      title: asString(topic.title),
      slug: asString(topic.slug),
      has_accepted_answer: topic.has_accepted_answer === true,
    }];
  });
}

function toRawItem(baseUrl: string, hit: SearchTopic, detail: unknown): DiscourseRawItem {
  const topic: Record<string, unknown> = isRecord(detail) ? detail : {};
  return {
    source: 'discourse',
    base_url: baseUrl,
    topic_id: hit.id,
    title: asString(topic.title) ?? hit.title,
    slug: asString(topic.slug) ?? hit.slug,
    views: asNumber(topic.views),
    reply_count: asNumber(topic.reply_count),
    like_count: asNumber(topic.like_count),
    posts_count: asNumber(topic.posts_count),
    has_accepted_answer: hit.has_accepted_answer || topic.has_accepted_answer === true || isRecord(topic.accepted_answer),
  };
}

async function* fetchTopics(
  options: DiscourseOptions,
  keywords: readonly string[],
  pagesPerKeyword: number,
  ctx: FetchContext,
): AsyncGenerator<ConnectorYield> {
  const base = options.baseUrl.replace(/\/+$/, '');
  const headers = authHeaders(options);

  for (const keyword of keywords) {
    // search pages overlap when new posts land mid-crawl
    const seen = new Set<number>();

    for (let page = 1; page <= pagesPerKeyword; page++) {
      const params = new URLSearchParams({ q: keyword, page: String(page) });
      const topics = parseSearchTopics(
        await requestJson(`${base}/search.json?${params}`, `Discourse search "${keyword}" p${page}`, ctx, { headers }),
      );
      if (topics.length === 0) break;

      for (const hit of topics) {
        if (seen.has(hit.id)) continue;
        seen.add(hit.id);

        try {
          const detail = await requestJson(`${base}/t/${hit.id}.json`, `Discourse topic ${hit.id}`, ctx, { headers });
          yield toRawItem(base, hit, detail);
        } catch (err) {
          if (!(err instanceof HttpStatusError)) throw err;
          yield new PermanentItemError(`Discourse topic ${hit.id} is gone (${err.status})`, { cause: err });
        }
      }
    }
  }
}

export function discourseConnector(options: DiscourseOptions): SourceConnector {
  return {
    source: 'discourse',
    fetch: (keywords, _mode, pagesPerKeyword, ctx) => fetchTopics(options, keywords, pagesPerKeyword, ctx),
  };
}
