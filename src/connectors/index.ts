import type { Config } from '../config.js';
import { discourseConnector } from './discourse.js';
import { googleAdsConnector } from './google-ads.js';
import type { SourceConnector } from './types.js';
import { youtubeConnector } from './youtube.js';

export function createConnectors(config: Config): SourceConnector[] {
  return [
    youtubeConnector(config.youtube),
    discourseConnector(config.discourse),
    googleAdsConnector(config.googleAds),
  ];
}
