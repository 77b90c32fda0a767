import { SourceRejectedError } from '../errors.js';
import { asArray, asNumeric, asString, isRecord, requestJson } from './http.js';
import type { ConnectorYield, FetchContext, GoogleAdsRawItem, MonthlySearchVolume, SourceConnector } from './types.js';

const API_BASE = 'https://googleads.googleapis.com/v17';
const LANGUAGE_ENGLISH = 'languageConstants/1000';
const PAGE_SIZE = 100;

// https://developers.google.com/google-ads/api/data/geotargets
export const GEO_TARGETS: Record<string, number> = {
  AU: 2036,
  BR: 2076,
  CA: 2124,
  DE: 2276,
  FR: 2250,
  GB: 2826,
  IN: 2356,
  US: 2840,
};

const MONTHS = [
  'JANUARY', 'FEBRUARY', 'MARCH', 'APRIL', 'MAY', 'JUNE',
  'JULY', 'AUGUST', 'SEPTEMBER', 'OCTOBER', 'NOVEMBER', 'DECEMBER',
];

export interface GoogleAdsOptions {
  developerToken?: string;
  accessToken?: string;
  customerId?: string;
  loginCustomerId?: string;
  countries: string[];
  baseUrl?: string;
}

function parseMonthlyVolumes(value: unknown): MonthlySearchVolume[] {
  return asArray(value).flatMap((entry): MonthlySearchVolume[] => {
    if (!isRecord(entry)) return [];
    const month = MONTHS.indexOf(asString(entry.month) ?? '') + 1;
    const year = Number(entry.year);
    const searches = Number(entry.monthlySearches ?? 0);
    if (month === 0 || !Number.isFinite(year) || !Number.isFinite(searches)) return [];
    return [{ year, month, searches }];
  });
}

function parseIdeas(body: unknown, country: string): { ideas: GoogleAdsRawItem[]; nextPageToken?: string } {
  if (!isRecord(body)) return { ideas: [] };

  const ideas = asArray(body.results).flatMap((result): GoogleAdsRawItem[] => {
    if (!isRecord(result)) return [];
    const metrics: Record<string, unknown> = isRecord(result.keywordIdeaMetrics) ? result.keywordIdeaMetrics : {};
    return [{
      source: 'google-ads',
      text: asString(result.text),
      country,
      avg_monthly_searches: asNumeric(metrics.avgMonthlySearches),
      competition: asString(metrics.competition),
      competition_index: asNumeric(metrics.competitionIndex),
      low_bid_micros: asNumeric(metrics.lowTopOfPageBidMicros),
      high_bid_micros: asNumeric(metrics.highTopOfPageBidMicros),
      monthly_searches: parseMonthlyVolumes(metrics.monthlySearchVolumes),
    }];
  });

  return { ideas, nextPageToken: asString(body.nextPageToken) || undefined };
}

async function* fetchKeywordIdeas(
  options: GoogleAdsOptions,
  keywords: readonly string[],
  pagesPerKeyword: number,
  ctx: FetchContext,
): AsyncGenerator<ConnectorYield> {
  const { developerToken, accessToken } = options;
  const customerId = options.customerId?.replace(/-/g, '');
  if (!developerToken || !accessToken || !customerId) {
    throw new SourceRejectedError(
      'Missing GOOGLE_ADS_DEVELOPER_TOKEN, GOOGLE_ADS_ACCESS_TOKEN or GOOGLE_ADS_CUSTOMER_ID in environment',
    );
  }

  const unknown = options.countries.filter((c) => GEO_TARGETS[c] === undefined);
  if (unknown.length > 0) {
    throw new SourceRejectedError(`No Google Ads geo target for: ${unknown.join(', ')}`);
  }

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Authorization: `Bearer ${accessToken}`,
    'developer-token': developerToken,
  };
  if (options.loginCustomerId) headers['login-customer-id'] = options.loginCustomerId.replace(/-/g, '');

  const url = `${options.baseUrl ?? API_BASE}/customers/${customerId}:generateKeywordIdeas`;

  for (const keyword of keywords) {
    for (const country of options.countries) {
      let pageToken: string | undefined;

      for (let page = 0; page < pagesPerKeyword; page++) {
        const body = JSON.stringify({
          keywordSeed: { keywords: [keyword] },
          geoTargetConstants: [`geoTargetConstants/${GEO_TARGETS[country]}`],
          language: LANGUAGE_ENGLISH,
          keywordPlanNetwork: 'GOOGLE_SEARCH',
          pageSize: PAGE_SIZE,
          ...(pageToken ? { pageToken } : {}),
        });

        const { ideas, nextPageToken } = parseIdeas(
          await requestJson(url, `Google Ads ideas "${keyword}" (${country})`, ctx, { method: 'POST', headers, body }),
          country,
        );
        yield* ideas;

        pageToken = nextPageToken;
        if (!pageToken) break;
      }
    }
  }
}

export function googleAdsConnector(options: GoogleAdsOptions): SourceConnector {
  return {
    source: 'google-ads',
    fetch: (keywords, _mode, pagesPerKeyword, ctx) => fetchKeywordIdeas(options, keywords, pagesPerKeyword, ctx),
  };
}
