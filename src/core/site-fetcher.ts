/**
 * SiteFetcher: the one `fetch(url) -> html` entry point callers depend on.
 *
 * Per call:
 *   1. cache hit → return (no rate limiting)
 *   2. one-time warmup request to the site root (errors swallowed)
 *   3. concurrency slot, then a second cache check
 *   4. up to `maxRetries` attempts, each behind the rate limiter:
 *        200 + real page  → cache, return
 *        200 + challenge  → browser escalation (never retried)
 *        403 / 429 / 5xx  → backoff and retry; typed error on the last attempt
 *        other status     → TransportError, no retry
 *        transport fault  → backoff and retry
 */

import type { FetchConfig } from '../config.js';
import { loadConfig } from '../config.js';
import {
  BlockedError,
  EscalationError,
  RateLimitedError,
  TransportError,
  type ListingFetchError,
} from '../types.js';
import { TtlCache } from './cache.js';
import { detectChallenge } from './challenge-detection.js';
import { UndiciTransport, type HttpTransport, type TransportResponse } from './http-fetch.js';
import { BrowserFetcher } from './browser-fetch.js';
import { RateLimiter, sleep as defaultSleep, type SleepFn } from './rate-limiter.js';
import { Semaphore } from './semaphore.js';
import { DEFAULT_IMPERSONATION_PROFILE, getImpersonationProfile } from './user-agents.js';
import { createLogger } from './log.js';

const log = createLogger('fetch');

/** The browser-side collaborator: only `fetch` and `close` are used. */
export interface EscalationFetcher {
  fetch(url: string): Promise<string>;
  close(): Promise<void>;
}

export interface SiteFetcherDeps {
  transport?: HttpTransport;
  cache?: TtlCache<string>;
  rateLimiter?: RateLimiter;
  /** Factory, so the browser side is only built on the first challenge. */
  createEscalationFetcher?: () => EscalationFetcher;
  sleep?: SleepFn;
  /** Start as if the warmup had already run. */
  skipWarmup?: boolean;
}

/** Result of one transport attempt. */
export type RequestOutcome =
  | { kind: 'success'; content: string }
  | { kind: 'retryable'; error: ListingFetchError }
  | { kind: 'fatal'; error: ListingFetchError };

export class SiteFetcher {
  readonly config: Readonly<FetchConfig>;

  private readonly cache: TtlCache<string>;
  private readonly rateLimiter: RateLimiter;
  private readonly slots: Semaphore;
  private readonly sleep: SleepFn;
  private readonly createEscalationFetcher: () => EscalationFetcher;

  private transport: HttpTransport | null;
  private escalationFetcher: EscalationFetcher | null = null;
  private warmup: Promise<void> | null;

  constructor(config: Readonly<FetchConfig> = loadConfig(), deps: SiteFetcherDeps = {}) {
    this.config = Object.isFrozen(config) ? config : Object.freeze({ ...config });
    this.sleep = deps.sleep ?? defaultSleep;
    this.cache = deps.cache ?? new TtlCache<string>({
      ttlMs: this.config.cacheTtlMs,
      maxEntries: this.config.cacheMaxEntries,
    });
    this.rateLimiter = deps.rateLimiter ?? new RateLimiter(this.config.requestDelayMs, this.sleep);
    this.slots = new Semaphore(this.config.maxConcurrentRequests);
    this.transport = deps.transport ?? null;
    this.createEscalationFetcher = deps.createEscalationFetcher ?? (() => this.defaultEscalationFetcher());
    this.warmup = deps.skipWarmup ? Promise.resolve() : null;
  }

  async fetch(url: string): Promise<string> {
    const cached = this.cache.get(url);
    if (cached !== undefined) {
      log.debug(`Cache hit for ${url}`);
      return cached;
    }

    await this.ensureWarmedUp();

    return this.slots.use(async () => {
      // Another caller may have filled the cache while we waited for the slot.
      const filled = this.cache.get(url);
      if (filled !== undefined) {
        return filled;
      }
      return this.fetchWithRetries(url);
    });
  }

  /** Release the browser and the HTTP session. Safe to call repeatedly. */
  async close(): Promise<void> {
    const escalation = this.escalationFetcher;
    this.escalationFetcher = null;
    if (escalation) {
      await escalation.close();
    }

    const transport = this.transport;
    this.transport = null;
    if (transport) {
      await transport.close();
    }
  }

  private getTransport(): HttpTransport {
    if (!this.transport) {
      const profile =
        getImpersonationProfile(this.config.impersonate) ?? getImpersonationProfile(DEFAULT_IMPERSONATION_PROFILE);
      if (!profile) {
        throw new TransportError(`Unknown impersonation profile: ${this.config.impersonate}`);
      }
      this.transport = new UndiciTransport({ profile, timeoutMs: this.config.timeoutMs });
    }
    return this.transport;
  }

  private defaultEscalationFetcher(): EscalationFetcher {
    return new BrowserFetcher({
      headless: this.config.browserHeadless,
      timeoutMs: this.config.browserTimeoutMs,
      challengeWaitMs: this.config.browserChallengeWaitMs,
      pollIntervalMs: this.config.browserPollIntervalMs,
      userAgent: getImpersonationProfile(this.config.impersonate)?.userAgent,
      sleep: this.sleep,
    });
  }

  /** Hit the site root once to pick up session cookies. Never fails. */
  private ensureWarmedUp(): Promise<void> {
    if (!this.warmup) {
      this.warmup = this.runWarmup();
    }
    return this.warmup;
  }

  private async runWarmup(): Promise<void> {
    try {
      const response = await this.getTransport().get(this.config.baseUrl);
      log.debug(`Warmup ${this.config.baseUrl} -> ${response.status}`);
    } catch (error) {
      log.debug(`Warmup request failed for ${this.config.baseUrl}`, error);
    }
    await this.sleep(this.config.warmupSettleMs);
  }

  private async fetchWithRetries(url: string): Promise<string> {
    const attempts = this.config.maxRetries;
    let lastError: ListingFetchError = new TransportError(`No attempts made for URL: ${url}`, url);

    for (let attempt = 0; attempt < attempts; attempt++) {
      await this.rateLimiter.waitTurn();

      const outcome = await this.attempt(url);
      if (outcome.kind === 'success') {
        return outcome.content;
      }
      if (outcome.kind === 'fatal') {
        throw outcome.error;
      }

      lastError = outcome.error;
      if (attempt < attempts - 1) {
        const backoff = this.config.retryBaseDelayMs * 2 ** attempt;
        log.warn(`Attempt ${attempt + 1}/${attempts} failed for ${url}: ${lastError.message}; retrying in ${backoff}ms`);
        await this.sleep(backoff);
      }
    }

    throw lastError;
  }

  private async attempt(url: string): Promise<RequestOutcome> {
    let response: TransportResponse;
    try {
      response = await this.getTransport().get(url);
    } catch (error) {
      if (error instanceof TransportError) {
        return { kind: 'retryable', error };
      }
      throw error;
    }

    const outcome = this.classify(url, response);
    if (outcome.kind !== 'success') {
      return outcome;
    }

    const challenge = detectChallenge(outcome.content);
    if (challenge.isChallenge) {
      log.info(`Challenge page detected for ${url} (${challenge.details ?? 'no details'})`);
      // Escalation failures are final for this call: no further retries.
      const content = await this.escalate(url);
      this.cache.set(url, content);
      return { kind: 'success', content };
    }

    this.cache.set(url, outcome.content);
    return outcome;
  }

  private classify(url: string, response: TransportResponse): RequestOutcome {
    const { status, body } = response;

    if (status === 200) {
      return { kind: 'success', content: body };
    }
    if (status === 403) {
      const error = new BlockedError(url, status);
      return this.config.retryOn403 ? { kind: 'retryable', error } : { kind: 'fatal', error };
    }
    if (status === 429) {
      return { kind: 'retryable', error: new RateLimitedError(url, status) };
    }
    if (status >= 500) {
      return { kind: 'retryable', error: new TransportError(`Server error (${status}) for URL: ${url}`, url, status) };
    }
    return { kind: 'fatal', error: new TransportError(`Unexpected status ${status} for URL: ${url}`, url, status) };
  }

  private async escalate(url: string): Promise<string> {
    if (!this.config.browserEnabled) {
      throw new EscalationError(`Challenge page detected but browser fallback is disabled for URL: ${url}`, url);
    }

    if (!this.escalationFetcher) {
      this.escalationFetcher = this.createEscalationFetcher();
    }

    try {
      return await this.escalationFetcher.fetch(url);
    } catch (error) {
      if (error instanceof EscalationError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new EscalationError(`Browser fetch failed for URL: ${url}: ${message}`, url);
    }
  }
}
