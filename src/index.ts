/**
 * crelist - resilient fetching and parsing of commercial real-estate listings
 *
 * Main library export
 */

import { loadConfig, type FetchConfig } from './config.js';
import { SiteFetcher, type SiteFetcherDeps } from './core/site-fetcher.js';

export * from './types.js';
export { loadConfig, DEFAULT_CONFIG, ENV_PREFIX, type FetchConfig } from './config.js';
export { SiteFetcher, type SiteFetcherDeps, type EscalationFetcher, type RequestOutcome } from './core/site-fetcher.js';
export { TtlCache, type TtlCacheOptions, type CacheEntry } from './core/cache.js';
export { RateLimiter, sleep, type SleepFn } from './core/rate-limiter.js';
export { Semaphore } from './core/semaphore.js';
export { detectChallenge, isChallengePage, CHALLENGE_MARKERS, type ChallengeDetectionResult } from './core/challenge-detection.js';
export { UndiciTransport, type HttpTransport, type TransportResponse } from './core/http-fetch.js';
export { BrowserFetcher, type BrowserFetcherOptions, type BrowserLauncher } from './core/browser-fetch.js';
export { getImpersonationProfile, listImpersonationProfiles, type ImpersonationProfile } from './core/user-agents.js';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './core/log.js';
export {
  normalizeLocation,
  buildSearchUrl,
  buildDetailUrl,
  resolveDetailUrl,
  extractListingId,
  PROPERTY_TYPE_SLUGS,
  type SearchUrlOptions,
} from './core/urls.js';
export { parseAddress, type AddressParts } from './parsers/address.js';
export { parseSearchResults, parseTotalResults, parsePagination } from './parsers/search.js';
export { parsePropertyDetail } from './parsers/detail.js';
export { parsePrice, parseSize, parseCapRate, buildMarketOverview } from './parsers/market.js';
export { createServer, handleToolCall, tools, type PageSource } from './mcp/tools.js';

/**
 * Build a fetcher from the environment plus explicit overrides.
 *
 * @example
 * ```typescript
 * import { createSiteFetcher, buildSearchUrl, parseSearchResults } from 'crelist';
 *
 * const fetcher = createSiteFetcher({ requestDelayMs: 5000 });
 * try {
 *   const html = await fetcher.fetch(buildSearchUrl('Austin, TX', { propertyType: 'office' }));
 *   console.log(parseSearchResults(html));
 * } finally {
 *   await fetcher.close();
 * }
 * ```
 */
export function createSiteFetcher(overrides: Partial<FetchConfig> = {}, deps: SiteFetcherDeps = {}): SiteFetcher {
  return new SiteFetcher(loadConfig(process.env, overrides), deps);
}
