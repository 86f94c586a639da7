/**
 * Runtime configuration, read from `CRELIST_*` environment variables.
 *
 * `loadConfig()` returns a frozen snapshot; a SiteFetcher keeps the one it
 * was constructed with for its whole life.
 */

import { ConfigError } from './types.js';
import { DEFAULT_IMPERSONATION_PROFILE, getImpersonationProfile } from './core/user-agents.js';
import { createLogger } from './core/log.js';
import { DEFAULT_BASE_URL } from './core/urls.js';

const log = createLogger('config');

export const ENV_PREFIX = 'CRELIST_';

export interface FetchConfig {
  /** Minimum spacing between the starts of two outbound requests. */
  requestDelayMs: number;
  maxConcurrentRequests: number;
  /** Per-attempt timeout of the primary transport. */
  timeoutMs: number;
  /** Total attempts per fetch, first one included. */
  maxRetries: number;
  /** Backoff before retry n (0-based) is `retryBaseDelayMs * 2^n`. */
  retryBaseDelayMs: number;
  /** Treat 403 as transient (stale cookies) instead of an immediate block. */
  retryOn403: boolean;
  /** Impersonation profile id, see `listImpersonationProfiles()`. */
  impersonate: string;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  baseUrl: string;
  /** Pause after the warmup request before the first real one. */
  warmupSettleMs: number;
  browserEnabled: boolean;
  /** Navigation timeout of the escalation browser. */
  browserTimeoutMs: number;
  /** How long the escalation browser waits for a challenge to clear. */
  browserChallengeWaitMs: number;
  browserPollIntervalMs: number;
  browserHeadless: boolean;
}

export const DEFAULT_CONFIG: Readonly<FetchConfig> = Object.freeze({
  requestDelayMs: 3000,
  maxConcurrentRequests: 1,
  timeoutMs: 30_000,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  retryOn403: true,
  impersonate: DEFAULT_IMPERSONATION_PROFILE,
  cacheTtlMs: 300_000,
  cacheMaxEntries: 500,
  baseUrl: DEFAULT_BASE_URL,
  warmupSettleMs: 1000,
  browserEnabled: true,
  browserTimeoutMs: 30_000,
  browserChallengeWaitMs: 5000,
  browserPollIntervalMs: 1000,
  browserHeadless: true,
});

type Env = Record<string, string | undefined>;

function readRaw(env: Env, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function readSeconds(env: Env, name: string, fallbackMs: number): number {
  const raw = readRaw(env, name);
  if (raw === undefined) return fallbackMs;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigError(`${ENV_PREFIX}${name} must be a non-negative number of seconds, got "${raw}"`, `${ENV_PREFIX}${name}`);
  }
  return Math.round(seconds * 1000);
}

function readCount(env: Env, name: string, fallback: number): number {
  const raw = readRaw(env, name);
  if (raw === undefined) return fallback;
  const count = Number(raw);
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigError(`${ENV_PREFIX}${name} must be a positive integer, got "${raw}"`, `${ENV_PREFIX}${name}`);
  }
  return count;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readRaw(env, name);
  if (raw === undefined) return fallback;
  const lowered = raw.toLowerCase();
  if (TRUE_VALUES.has(lowered)) return true;
  if (FALSE_VALUES.has(lowered)) return false;
  throw new ConfigError(`${ENV_PREFIX}${name} must be a boolean, got "${raw}"`, `${ENV_PREFIX}${name}`);
}

function readBaseUrl(env: Env, fallback: string): string {
  const raw = readRaw(env, 'BASE_URL');
  if (raw === undefined) return fallback;
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`${ENV_PREFIX}BASE_URL is not a valid URL: "${raw}"`, `${ENV_PREFIX}BASE_URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`${ENV_PREFIX}BASE_URL must use http or https`, `${ENV_PREFIX}BASE_URL`);
  }
  return url.origin;
}

function readProfile(env: Env, fallback: string): string {
  const raw = readRaw(env, 'IMPERSONATE_BROWSER');
  if (raw === undefined) return fallback;
  const profile = getImpersonationProfile(raw);
  if (!profile) {
    log.warn(`Unknown impersonation profile "${raw}", using ${fallback}`);
    return fallback;
  }
  return profile.id;
}

/**
 * Build a configuration snapshot from the environment. Explicit `overrides`
 * win over the environment (tests and the CLI use them).
 */
export function loadConfig(env: Env = process.env, overrides: Partial<FetchConfig> = {}): Readonly<FetchConfig> {
  const d = DEFAULT_CONFIG;
  const config: FetchConfig = {
    requestDelayMs: readSeconds(env, 'REQUEST_DELAY_SECONDS', d.requestDelayMs),
    maxConcurrentRequests: readCount(env, 'MAX_CONCURRENT_REQUESTS', d.maxConcurrentRequests),
    timeoutMs: readSeconds(env, 'TIMEOUT_SECONDS', d.timeoutMs),
    maxRetries: readCount(env, 'MAX_RETRIES', d.maxRetries),
    retryBaseDelayMs: d.retryBaseDelayMs,
    retryOn403: readBoolean(env, 'RETRY_ON_403', d.retryOn403),
    impersonate: readProfile(env, d.impersonate),
    cacheTtlMs: readSeconds(env, 'CACHE_TTL_SECONDS', d.cacheTtlMs),
    cacheMaxEntries: readCount(env, 'CACHE_MAX_ENTRIES', d.cacheMaxEntries),
    baseUrl: readBaseUrl(env, d.baseUrl),
    warmupSettleMs: d.warmupSettleMs,
    browserEnabled: readBoolean(env, 'BROWSER_ENABLED', d.browserEnabled),
    browserTimeoutMs: readSeconds(env, 'BROWSER_TIMEOUT_SECONDS', d.browserTimeoutMs),
    browserChallengeWaitMs: readSeconds(env, 'BROWSER_CHALLENGE_WAIT_SECONDS', d.browserChallengeWaitMs),
    browserPollIntervalMs: d.browserPollIntervalMs,
    browserHeadless: readBoolean(env, 'BROWSER_HEADLESS', d.browserHeadless),
    ...overrides,
  };

  return Object.freeze(config);
}
