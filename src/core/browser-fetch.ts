/**
 * Browser-based escalation fetch, used only when the primary transport got
 * an HTTP 200 that turned out to be a challenge page.
 *
 * A single Chromium instance (playwright-extra + stealth plugin) is launched on
 * first use and reused for every later escalation. Each fetch opens its own
 * page, waits for the challenge script to redirect to real content, and closes
 * the page again.
 */

import { chromium as stealthChromium } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { EscalationError } from '../types.js';
import { detectChallenge, MIN_RESOLVED_LENGTH } from './challenge-detection.js';
import { createLogger } from './log.js';
import { sleep as defaultSleep, type SleepFn } from './rate-limiter.js';

const log = createLogger('browser');

// The subset of Playwright's Browser / Page this module drives.

export interface EscalationPage {
  goto(url: string, options?: { timeout?: number; waitUntil?: 'domcontentloaded' | 'load' }): Promise<unknown>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface EscalationBrowser {
  newPage(options?: { userAgent?: string; locale?: string }): Promise<EscalationPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: { headless: boolean }) => Promise<EscalationBrowser>;

export interface BrowserFetcherOptions {
  headless?: boolean;
  /** Navigation timeout per fetch. */
  timeoutMs?: number;
  /** How long to wait for the challenge to clear after navigation. */
  challengeWaitMs?: number;
  pollIntervalMs?: number;
  /** Keeps the browser's UA identical to the primary transport's. */
  userAgent?: string;
  launchBrowser?: BrowserLauncher;
  sleep?: SleepFn;
}

/**
 * Common Chromium launch arguments for anti-bot-detection.
 */
const ANTI_DETECTION_ARGS: readonly string[] = [
  '--disable-blink-features=AutomationControlled',
  '--disable-infobars',
  '--disable-dev-shm-usage',
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--window-size=1920,1080',
  '--disable-features=ChromeUserAgentDataBranding',
  '--no-first-run',
];

let stealthRegistered = false;

const launchStealthChromium: BrowserLauncher = async ({ headless }) => {
  if (!stealthRegistered) {
    stealthChromium.use(StealthPlugin());
    stealthRegistered = true;
  }
  return stealthChromium.launch({ headless, args: [...ANTI_DETECTION_ARGS] });
};

/** Outcome of the wait loop: Pending until one of the other two. */
type ChallengeWaitState =
  | { state: 'pending' }
  | { state: 'resolved'; html: string }
  | { state: 'expired'; html: string };

export class BrowserFetcher {
  private browser: EscalationBrowser | null = null;
  private launching: Promise<EscalationBrowser> | null = null;
  /** Bumped by close(); a launch that straddles a close is discarded. */
  private generation = 0;

  private readonly headless: boolean;
  private readonly timeoutMs: number;
  private readonly challengeWaitMs: number;
  private readonly pollIntervalMs: number;
  private readonly userAgent: string | undefined;
  private readonly launchBrowser: BrowserLauncher;
  private readonly sleep: SleepFn;

  constructor(options: BrowserFetcherOptions = {}) {
    this.headless = options.headless ?? true;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.challengeWaitMs = options.challengeWaitMs ?? 5000;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.userAgent = options.userAgent;
    this.launchBrowser = options.launchBrowser ?? launchStealthChromium;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** True once a browser has been launched and not yet closed. */
  get isRunning(): boolean {
    return this.browser !== null;
  }

  async fetch(url: string): Promise<string> {
    const browser = await this.ensureBrowser();

    let page: EscalationPage;
    try {
      page = await browser.newPage(this.userAgent ? { userAgent: this.userAgent, locale: 'en-US' } : { locale: 'en-US' });
    } catch (error) {
      throw new EscalationError(`Could not open a browser page for URL: ${url}: ${errorMessage(error)}`, url);
    }

    try {
      try {
        await page.goto(url, { timeout: this.timeoutMs, waitUntil: 'domcontentloaded' });
      } catch (error) {
        throw new EscalationError(`Browser navigation failed for URL: ${url}: ${errorMessage(error)}`, url);
      }

      const outcome = await this.waitForChallenge(page);
      if (outcome.state === 'resolved') {
        return outcome.html;
      }

      let html = outcome.state === 'expired' ? outcome.html : '';
      if (!html) {
        try {
          html = await page.content();
        } catch (error) {
          throw new EscalationError(`Could not read the browser page for URL: ${url}: ${errorMessage(error)}`, url);
        }
      }
      if (detectChallenge(html).isChallenge) {
        throw new EscalationError(`Challenge page persisted after browser fetch for URL: ${url}`, url);
      }
      return html;
    } finally {
      await page.close().catch((error: unknown) => {
        log.debug(`Failed to close page for ${url}`, error);
      });
    }
  }

  /**
   * Shut the browser down. Safe to call any number of times, before or after
   * a launch; shutdown failures are logged, never thrown.
   */
  async close(): Promise<void> {
    this.generation += 1;
    const pending = this.launching;
    this.launching = null;

    let browser = this.browser;
    this.browser = null;

    if (!browser && pending) {
      browser = await pending.catch(() => null);
    }
    if (!browser) {
      return;
    }

    try {
      await browser.close();
    } catch (error) {
      log.debug('Browser shutdown failed', error);
    }
  }

  private async ensureBrowser(): Promise<EscalationBrowser> {
    if (this.browser) {
      return this.browser;
    }

    // Concurrent first callers all join the one in-flight launch.
    const generation = this.generation;
    let launching = this.launching;
    if (!launching) {
      const started: Promise<EscalationBrowser> = this.launch().finally(() => {
        if (this.launching === started) {
          this.launching = null;
        }
      });
      this.launching = started;
      launching = started;
    }
    const browser = await launching;

    if (generation !== this.generation) {
      // close() ran during the launch and has shut this browser down.
      log.debug('Browser closed while launching; relaunching');
      return this.ensureBrowser();
    }
    if (!this.browser) {
      this.browser = browser;
    }
    return this.browser;
  }

  private async launch(): Promise<EscalationBrowser> {
    log.info(`Launching escalation browser (headless=${this.headless})`);
    try {
      return await this.launchBrowser({ headless: this.headless });
    } catch (error) {
      throw new EscalationError(
        `Browser runtime unavailable: ${errorMessage(error)}. ` +
          'Install a Chromium build (e.g. `npx playwright-core install chromium`) or disable browser escalation.',
      );
    }
  }

  private async waitForChallenge(page: EscalationPage): Promise<ChallengeWaitState> {
    const deadline = Date.now() + this.challengeWaitMs;
    let outcome: ChallengeWaitState = { state: 'pending' };
    let html = '';

    while (outcome.state === 'pending') {
      if (Date.now() >= deadline) {
        outcome = { state: 'expired', html };
        break;
      }

      await this.sleep(this.pollIntervalMs);
      try {
        html = await page.content();
      } catch (error) {
        // The challenge script navigates away as it resolves; poll again.
        log.debug('Page content unavailable, still waiting', error);
        continue;
      }
      if (!detectChallenge(html).isChallenge && html.length > MIN_RESOLVED_LENGTH) {
        outcome = { state: 'resolved', html };
      }
    }

    return outcome;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
