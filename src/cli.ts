#!/usr/bin/env node

/**
 * crelist CLI
 *
 * Usage:
 *   crelist fetch <url>                         - Raw page through the full fetch pipeline
 *   crelist search "Austin, TX" --type office   - One page of listings as JSON
 *   crelist detail <urlOrId>                    - One listing as JSON
 *   crelist market "Austin, TX"                 - Market overview as JSON
 *   crelist mcp                                 - MCP server on stdio
 */

import { Command, InvalidArgumentError } from 'commander';
import ora, { type Ora } from 'ora';
import { loadConfig, type FetchConfig } from './config.js';
import { SiteFetcher } from './core/site-fetcher.js';
import { setLogLevel } from './core/log.js';
import { buildSearchUrl, resolveDetailUrl } from './core/urls.js';
import { listImpersonationProfiles } from './core/user-agents.js';
import { parsePagination, parseSearchResults, parseTotalResults } from './parsers/search.js';
import { parsePropertyDetail } from './parsers/detail.js';
import { buildMarketOverview } from './parsers/market.js';
import { filterListings, LISTING_TYPE_LABELS } from './mcp/tools.js';
import { runStdioServer } from './mcp/stdio.js';
import { ConfigError, isListingType, isPropertyType, LISTING_TYPES, PROPERTY_TYPES } from './types.js';
import type { ListingType, PropertyType, SearchResult } from './types.js';
import { readPackageVersion } from './version.js';

interface GlobalOptions {
  delay?: number;
  retries?: number;
  browser: boolean;
  headed?: boolean;
  verbose?: boolean;
  silent?: boolean;
}

interface SearchOptions {
  type?: PropertyType;
  listing: ListingType;
  page: number;
  priceMin?: number;
  priceMax?: number;
  sizeMin?: number;
  sizeMax?: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative number.');
  }
  return parsed;
}

function parsePropertyType(value: string): PropertyType {
  if (!isPropertyType(value)) {
    throw new InvalidArgumentError(`Choose one of: ${PROPERTY_TYPES.join(', ')}.`);
  }
  return value;
}

function parseListingType(value: string): ListingType {
  if (!isListingType(value)) {
    throw new InvalidArgumentError(`Choose one of: ${LISTING_TYPES.join(', ')}.`);
  }
  return value;
}

function writeStdout(data: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    process.stdout.write(data, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

function printJson(value: unknown): Promise<void> {
  return writeStdout(JSON.stringify(value, null, 2) + '\n');
}

const program = new Command();

program
  .name('crelist')
  .description('Fetch and parse commercial real-estate listings')
  .version(readPackageVersion())
  .option('--delay <seconds>', 'Minimum seconds between requests', parseNonNegative)
  .option('--retries <n>', 'Attempts per request', parsePositiveInt)
  .option('--no-browser', 'Never fall back to a browser on challenge pages')
  .option('--headed', 'Run the fallback browser with a visible window')
  .option('-v, --verbose', 'Debug logging on stderr')
  .option('-s, --silent', 'No spinner, errors only');

function buildConfig(): Readonly<FetchConfig> {
  const opts = program.opts<GlobalOptions>();
  if (opts.verbose) setLogLevel('debug');
  else if (opts.silent) setLogLevel('error');

  const overrides: Partial<FetchConfig> = {};
  if (opts.delay !== undefined) overrides.requestDelayMs = Math.round(opts.delay * 1000);
  if (opts.retries !== undefined) overrides.maxRetries = opts.retries;
  if (!opts.browser) overrides.browserEnabled = false;
  if (opts.headed) overrides.browserHeadless = false;
  return loadConfig(process.env, overrides);
}

/**
 * Run one command against a fresh fetcher: spinner on stderr, JSON on stdout,
 * exit code 1 with the message on failure. The fetcher is always closed.
 */
async function withFetcher(label: string, run: (fetcher: SiteFetcher, config: Readonly<FetchConfig>) => Promise<unknown>): Promise<void> {
  let config: Readonly<FetchConfig>;
  try {
    config = buildConfig();
  } catch (error) {
    console.error(error instanceof ConfigError ? `Configuration error: ${error.message}` : error);
    process.exitCode = 1;
    return;
  }

  const fetcher = new SiteFetcher(config);
  const spinner: Ora | null = program.opts<GlobalOptions>().silent ? null : ora(label).start();

  try {
    const output = await run(fetcher, config);
    spinner?.succeed();
    if (typeof output === 'string') {
      await writeStdout(output.endsWith('\n') ? output : output + '\n');
    } else {
      await printJson(output);
    }
  } catch (error) {
    spinner?.fail();
    console.error(`\x1b[31m✖ ${error instanceof Error ? error.message : String(error)}\x1b[0m`);
    process.exitCode = 1;
  } finally {
    await fetcher.close();
  }
}

program
  .command('fetch <url>')
  .description('Fetch a page through cache, rate limiter, retries and browser fallback; print the HTML')
  .action(async (url: string) => {
    await withFetcher(`Fetching ${url}...`, (fetcher) => fetcher.fetch(url));
  });

program
  .command('search <location>')
  .description('Search listings in a location')
  .option('-t, --type <type>', `Property type (${PROPERTY_TYPES.join(', ')})`, parsePropertyType)
  .option('-l, --listing <listing>', 'for-sale or for-lease', parseListingType, 'for-sale')
  .option('-p, --page <n>', 'Results page', parsePositiveInt, 1)
  .option('--price-min <dollars>', 'Minimum price', parseNonNegative)
  .option('--price-max <dollars>', 'Maximum price', parseNonNegative)
  .option('--size-min <sqft>', 'Minimum building size', parseNonNegative)
  .option('--size-max <sqft>', 'Maximum building size', parseNonNegative)
  .action(async (location: string, options: SearchOptions) => {
    await withFetcher(`Searching ${location}...`, async (fetcher, config) => {
      const url = buildSearchUrl(location, {
        propertyType: options.type,
        listingType: options.listing,
        page: options.page,
        baseUrl: config.baseUrl,
      });
      const html = await fetcher.fetch(url);
      const parsed = parseSearchResults(html, { baseUrl: config.baseUrl, listingType: LISTING_TYPE_LABELS[options.listing] });
      const result: SearchResult = {
        queryLocation: location,
        queryPropertyType: options.type,
        queryListingType: options.listing,
        totalResults: parseTotalResults(html) ?? parsed.length,
        page: options.page,
        hasNextPage: parsePagination(html),
        properties: filterListings(parsed, options),
      };
      return result;
    });
  });

program
  .command('detail <urlOrId>')
  .description('Full details of one listing (URL or listing id)')
  .action(async (urlOrId: string) => {
    await withFetcher('Fetching listing...', async (fetcher, config) => {
      const url = resolveDetailUrl(urlOrId, config.baseUrl);
      return parsePropertyDetail(await fetcher.fetch(url), url);
    });
  });

program
  .command('market <location>')
  .description('Aggregate statistics over the first page of for-sale listings')
  .option('-t, --type <type>', `Property type (${PROPERTY_TYPES.join(', ')})`, parsePropertyType)
  .action(async (location: string, options: { type?: PropertyType }) => {
    await withFetcher(`Analyzing ${location}...`, async (fetcher, config) => {
      const url = buildSearchUrl(location, { propertyType: options.type, baseUrl: config.baseUrl });
      const properties = parseSearchResults(await fetcher.fetch(url), {
        baseUrl: config.baseUrl,
        listingType: LISTING_TYPE_LABELS['for-sale'],
      });
      return buildMarketOverview(location, options.type, properties);
    });
  });

program
  .command('profiles')
  .description('List browser impersonation profiles')
  .action(async () => {
    await writeStdout(listImpersonationProfiles().join('\n') + '\n');
  });

program
  .command('mcp')
  .description('Run the MCP server on stdio')
  .action(async () => {
    await runStdioServer(buildConfig());
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
