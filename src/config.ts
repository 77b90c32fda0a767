import { parseList } from './connectors/http.js';
import { SOURCE_NAMES, type SourceName } from './connectors/types.js';
import type { DiscourseOptions } from './connectors/discourse.js';
import type { GoogleAdsOptions } from './connectors/google-ads.js';
import type { YouTubeOptions } from './connectors/youtube.js';
import { DEFAULT_KEYWORDS_PATH } from './ingest/keywords.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './ingest/orchestrator.js';
import type { RateLimit } from './ingest/rate-limiter.js';

export interface Config {
  youtube: YouTubeOptions;
  discourse: DiscourseOptions;
  googleAds: GoogleAdsOptions;
  rateLimits: Record<SourceName, RateLimit>;
  retry: RetryPolicy;
  deadlineMs: number;
  keywordsPath: string;
  runLogPath: string;
}

export const DEFAULT_RATE_LIMITS: Record<SourceName, RateLimit> = {
  youtube: { maxRequests: 5, windowMs: 1_000 },
  discourse: { maxRequests: 20, windowMs: 60_000 },
  'google-ads': { maxRequests: 1, windowMs: 1_000 },
};

const DEFAULT_DEADLINE_MINUTES = 60;

/** Longest deadline a Node timer can hold (2^31 - 1 ms). */
export const MAX_DEADLINE_MINUTES = Math.floor((2 ** 31 - 1) / 60_000);

type Env = Record<string, string | undefined>;

/** "5/1000" → 5 requests per 1000ms */
export function parseRateLimit(value: string, name: string): RateLimit {
  const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(value);
  const maxRequests = match ? Number(match[1]) : NaN;
  const windowMs = match ? Number(match[2]) : NaN;
  if (!(maxRequests >= 1) || !(windowMs >= 1)) {
    throw new Error(`Invalid ${name}="${value}": expected <maxRequests>/<windowMs>, e.g. 5/1000`);
  }
  return { maxRequests, windowMs };
}

function positiveInt(env: Env, name: string, fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new Error(`Invalid ${name}="${raw}": expected an integer ${range}`);
  }
  return value;
}

/** Parse a `--deadline` value in minutes. */
export function parseDeadlineMinutes(value: string): number {
  const minutes = Number(value);
  if (!Number.isFinite(minutes) || minutes <= 0 || minutes > MAX_DEADLINE_MINUTES) {
    throw new Error(`Expected a deadline between 0 and ${MAX_DEADLINE_MINUTES} minutes, got "${value}"`);
  }
  return minutes;
}

function envName(source: SourceName): string {
  return `RATE_LIMIT_${source.toUpperCase().replace(/-/g, '_')}`;
}

export function loadConfig(env: Env = process.env): Config {
  const rateLimits = { ...DEFAULT_RATE_LIMITS };
  for (const source of SOURCE_NAMES) {
    const name = envName(source);
    const raw = env[name];
    if (raw) rateLimits[source] = parseRateLimit(raw, name);
  }

  return {
    youtube: {
      apiKey: env.YOUTUBE_API_KEY,
      regions: parseList(env.YOUTUBE_REGIONS, ['US', 'IN']),
    },
    discourse: {
      baseUrl: env.DISCOURSE_BASE_URL || 'https://community.n8n.io',
      apiKey: env.DISCOURSE_API_KEY,
      apiUsername: env.DISCOURSE_API_USERNAME,
    },
    googleAds: {
      developerToken: env.GOOGLE_ADS_DEVELOPER_TOKEN,
      accessToken: env.GOOGLE_ADS_ACCESS_TOKEN,
      customerId: env.GOOGLE_ADS_CUSTOMER_ID,
      loginCustomerId: env.GOOGLE_ADS_LOGIN_CUSTOMER_ID,
      countries: parseList(env.GOOGLE_ADS_COUNTRIES, ['US', 'IN']),
    },
    rateLimits,
    retry: {
      maxRetries: positiveInt(env, 'INGEST_MAX_RETRIES', DEFAULT_RETRY_POLICY.maxRetries, 0),
      baseDelayMs: positiveInt(env, 'INGEST_RETRY_BASE_MS', DEFAULT_RETRY_POLICY.baseDelayMs),
      maxDelayMs: positiveInt(env, 'INGEST_RETRY_MAX_MS', DEFAULT_RETRY_POLICY.maxDelayMs),
    },
    deadlineMs: positiveInt(env, 'INGEST_DEADLINE_MINUTES', DEFAULT_DEADLINE_MINUTES, 1, MAX_DEADLINE_MINUTES) * 60_000,
    keywordsPath: env.KEYWORDS_PATH || DEFAULT_KEYWORDS_PATH,
    runLogPath: env.RUN_LOG_PATH || 'logs/runs.jsonl',
  };
}
