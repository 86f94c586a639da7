import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BrowserFetcher, type BrowserLauncher, type EscalationBrowser, type EscalationPage } from '../core/browser-fetch.js';
import { setLogLevel } from '../core/log.js';
import { EscalationError } from '../types.js';

const URL_UNDER_TEST = 'https://listings.example.com/Listing/555/';
const CHALLENGE = '<html><body><div id="sec-if-cpt-container"></div></body></html>';
const LISTING = `<html><body><h1>Riverside Office Park</h1>${'<p>Suite details</p>'.repeat(100)}</body></html>`;

/** Page whose content() walks through `contents`, then repeats the last one. */
class FakePage implements EscalationPage {
  readonly visited: string[] = [];
  closed = 0;
  constructor(
    private readonly contents: string[],
    private readonly navigationError?: Error,
  ) {}

  async goto(url: string): Promise<null> {
    if (this.navigationError) throw this.navigationError;
    this.visited.push(url);
    return null;
  }

  async content(): Promise<string> {
    return this.contents.length > 1 ? (this.contents.shift() ?? '') : (this.contents[0] ?? '');
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}

/** Page that is mid-navigation for its first `failures` content() reads. */
class NavigatingPage extends FakePage {
  constructor(
    contents: string[],
    private failures: number,
  ) {
    super(contents);
  }

  async content(): Promise<string> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('Unable to retrieve content because the page is navigating');
    }
    return super.content();
  }
}

class FakeBrowser implements EscalationBrowser {
  readonly pages: FakePage[] = [];
  readonly pageOptions: Array<{ userAgent?: string; locale?: string } | undefined> = [];
  closed = 0;
  constructor(private readonly makePage: () => FakePage) {}

  async newPage(options?: { userAgent?: string; locale?: string }): Promise<FakePage> {
    this.pageOptions.push(options);
    const page = this.makePage();
    this.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}

/** Sleep that moves the fake clock, so the wait loop's deadline is honoured. */
const advancingSleep = async (ms: number): Promise<void> => {
  vi.advanceTimersByTime(ms);
};

describe('BrowserFetcher', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    setLogLevel('silent');
  });

  afterEach(() => {
    vi.useRealTimers();
    setLogLevel(null);
  });

  it('returns the page once the challenge clears', async () => {
    const browser = new FakeBrowser(() => new FakePage([CHALLENGE, CHALLENGE, LISTING]));
    const launchBrowser = vi.fn(async () => browser);
    const fetcher = new BrowserFetcher({ launchBrowser, sleep: advancingSleep, challengeWaitMs: 5000, pollIntervalMs: 1000 });

    await expect(fetcher.fetch(URL_UNDER_TEST)).resolves.toBe(LISTING);

    expect(launchBrowser).toHaveBeenCalledWith({ headless: true });
    expect(browser.pages[0]?.visited).toEqual([URL_UNDER_TEST]);
    expect(browser.pages[0]?.closed).toBe(1);
  });

  it('launches one browser and reuses it', async () => {
    const browser = new FakeBrowser(() => new FakePage([LISTING]));
    const launchBrowser = vi.fn(async () => browser);
    const fetcher = new BrowserFetcher({ launchBrowser, sleep: advancingSleep });

    await fetcher.fetch(URL_UNDER_TEST);
    await fetcher.fetch(`${URL_UNDER_TEST}?again=1`);

    expect(launchBrowser).toHaveBeenCalledTimes(1);
    expect(browser.pages).toHaveLength(2);
    expect(fetcher.isRunning).toBe(true);
  });

  it('shares a single launch between concurrent first callers', async () => {
    const browser = new FakeBrowser(() => new FakePage([LISTING]));
    const launchBrowser = vi.fn(async () => browser);
    const fetcher = new BrowserFetcher({ launchBrowser, sleep: advancingSleep });

    await Promise.all([fetcher.fetch('https://listings.example.com/a'), fetcher.fetch('https://listings.example.com/b')]);

    expect(launchBrowser).toHaveBeenCalledTimes(1);
  });

  it('opens pages with the configured user agent', async () => {
    const browser = new FakeBrowser(() => new FakePage([LISTING]));
    const fetcher = new BrowserFetcher({
      launchBrowser: async () => browser,
      sleep: advancingSleep,
      userAgent: 'test-agent/1.0',
    });

    await fetcher.fetch(URL_UNDER_TEST);

    expect(browser.pageOptions).toEqual([{ userAgent: 'test-agent/1.0', locale: 'en-US' }]);
  });

  it('fails with EscalationError when the challenge persists, and still closes the page', async () => {
    const browser = new FakeBrowser(() => new FakePage([CHALLENGE]));
    const fetcher = new BrowserFetcher({
      launchBrowser: async () => browser,
      sleep: advancingSleep,
      challengeWaitMs: 3000,
      pollIntervalMs: 1000,
    });

    const failure = fetcher.fetch(URL_UNDER_TEST);
    await expect(failure).rejects.toBeInstanceOf(EscalationError);
    await expect(failure).rejects.toThrow(`Challenge page persisted after browser fetch for URL: ${URL_UNDER_TEST}`);
    expect(browser.pages[0]?.closed).toBe(1);
  });

  it('returns a short non-challenge page once the wait expires', async () => {
    const browser = new FakeBrowser(() => new FakePage(['<html><body>Listing removed</body></html>']));
    const fetcher = new BrowserFetcher({
      launchBrowser: async () => browser,
      sleep: advancingSleep,
      challengeWaitMs: 2000,
      pollIntervalMs: 1000,
    });

    await expect(fetcher.fetch(URL_UNDER_TEST)).resolves.toBe('<html><body>Listing removed</body></html>');
  });

  it('reads the page once when there is no wait window', async () => {
    const browser = new FakeBrowser(() => new FakePage([LISTING]));
    const sleep = vi.fn(advancingSleep);
    const fetcher = new BrowserFetcher({ launchBrowser: async () => browser, sleep, challengeWaitMs: 0 });

    await expect(fetcher.fetch(URL_UNDER_TEST)).resolves.toBe(LISTING);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports navigation failures as EscalationError', async () => {
    const browser = new FakeBrowser(() => new FakePage([LISTING], new Error('net::ERR_TIMED_OUT')));
    const fetcher = new BrowserFetcher({ launchBrowser: async () => browser, sleep: advancingSleep });

    await expect(fetcher.fetch(URL_UNDER_TEST)).rejects.toThrow(
      `Browser navigation failed for URL: ${URL_UNDER_TEST}: net::ERR_TIMED_OUT`,
    );
    expect(browser.pages[0]?.closed).toBe(1);
  });

  it('reports a missing browser runtime as EscalationError', async () => {
    const fetcher = new BrowserFetcher({
      launchBrowser: async () => {
        throw new Error("Executable doesn't exist");
      },
      sleep: advancingSleep,
    });

    const failure = fetcher.fetch(URL_UNDER_TEST);
    await expect(failure).rejects.toBeInstanceOf(EscalationError);
    await expect(failure).rejects.toThrow("Browser runtime unavailable: Executable doesn't exist");
    expect(fetcher.isRunning).toBe(false);
  });

  it('keeps polling when the page is navigating away from the challenge', async () => {
    const browser = new FakeBrowser(() => new NavigatingPage([LISTING], 1));
    const fetcher = new BrowserFetcher({ launchBrowser: async () => browser, sleep: advancingSleep, pollIntervalMs: 1000 });

    await expect(fetcher.fetch(URL_UNDER_TEST)).resolves.toBe(LISTING);
    expect(browser.pages[0]?.closed).toBe(1);
  });

  it('reports an unreadable page as EscalationError', async () => {
    const browser = new FakeBrowser(() => new NavigatingPage([LISTING], 1));
    const fetcher = new BrowserFetcher({ launchBrowser: async () => browser, sleep: advancingSleep, challengeWaitMs: 0 });

    const failure = fetcher.fetch(URL_UNDER_TEST);
    await expect(failure).rejects.toBeInstanceOf(EscalationError);
    await expect(failure).rejects.toThrow(
      `Could not read the browser page for URL: ${URL_UNDER_TEST}: Unable to retrieve content because the page is navigating`,
    );
  });

  it('relaunches when close() lands while the browser is still launching', async () => {
    const stale = new FakeBrowser(() => new FakePage([LISTING]));
    const fresh = new FakeBrowser(() => new FakePage([LISTING]));
    let finishLaunch: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      finishLaunch = resolve;
    });
    const launchBrowser = vi
      .fn<BrowserLauncher>()
      .mockImplementationOnce(async () => {
        await gate;
        return stale;
      })
      .mockImplementationOnce(async () => fresh);
    const fetcher = new BrowserFetcher({ launchBrowser, sleep: advancingSleep });

    const fetching = fetcher.fetch(URL_UNDER_TEST);
    const closing = fetcher.close();
    finishLaunch();
    await closing;

    await expect(fetching).resolves.toBe(LISTING);
    expect(stale.closed).toBe(1);
    expect(stale.pages).toHaveLength(0);
    expect(fresh.pages).toHaveLength(1);
    expect(launchBrowser).toHaveBeenCalledTimes(2);
    expect(fetcher.isRunning).toBe(true);
  });

  it('close() shuts the browser down once and is safe to repeat', async () => {
    const browser = new FakeBrowser(() => new FakePage([LISTING]));
    const fetcher = new BrowserFetcher({ launchBrowser: async () => browser, sleep: advancingSleep });

    await fetcher.close();
    await fetcher.fetch(URL_UNDER_TEST);
    await fetcher.close();
    await fetcher.close();

    expect(browser.closed).toBe(1);
    expect(fetcher.isRunning).toBe(false);
  });
});
