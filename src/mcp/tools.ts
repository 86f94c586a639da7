/**
 * MCP tool definitions and handlers.
 *
 * Fetch failures come back as ordinary JSON payloads carrying an `error`
 * field, so a client can show them; bad arguments come back with `isError`.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import {
  ListingFetchError,
  PROPERTY_TYPES,
  LISTING_TYPES,
  isListingType,
  isPropertyType,
  type ListingType,
  type PropertySummary,
  type PropertyType,
  type SearchResult,
} from '../types.js';
import { buildSearchUrl, resolveDetailUrl } from '../core/urls.js';
import { parsePagination, parseSearchResults, parseTotalResults } from '../parsers/search.js';
import { parsePropertyDetail } from '../parsers/detail.js';
import { buildMarketOverview, parsePrice, parseSize } from '../parsers/market.js';
import { createLogger } from '../core/log.js';
import { readPackageVersion } from '../version.js';

const log = createLogger('mcp');

/** What the tools need from the fetch pipeline. */
export interface PageSource {
  fetch(url: string): Promise<string>;
}

export interface ToolContext {
  fetcher: PageSource;
  baseUrl: string;
}

/** Card label for each listing type, as the site prints it. */
export const LISTING_TYPE_LABELS: Readonly<Record<ListingType, string>> = {
  'for-sale': 'For Sale',
  'for-lease': 'For Lease',
};

export const tools: Tool[] = [
  {
    name: 'search_properties',
    description:
      'Search commercial real estate listings by location. Returns one page of listing summaries with price, size, cap rate and broker.',
    annotations: {
      title: 'Search Listings',
      readOnlyHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        location: {
          type: 'string',
          description: "City and state ('Houston, TX'), state abbreviation ('TX') or zip code ('77001')",
        },
        property_type: {
          type: 'string',
          enum: [...PROPERTY_TYPES],
          description: 'Restrict to one property type (default: all types)',
        },
        listing_type: {
          type: 'string',
          enum: [...LISTING_TYPES],
          description: 'for-sale (default) or for-lease',
          default: 'for-sale',
        },
        page: {
          type: 'number',
          description: 'Results page, 1-based',
          default: 1,
        },
        price_min: { type: 'number', description: 'Minimum price in dollars' },
        price_max: { type: 'number', description: 'Maximum price in dollars' },
        size_min: { type: 'number', description: 'Minimum building size in square feet' },
        size_max: { type: 'number', description: 'Maximum building size in square feet' },
      },
      required: ['location'],
    },
  },
  {
    name: 'get_property_details',
    description:
      'Full details for one listing: price, size, year built, description, highlights, images and broker contact.',
    annotations: {
      title: 'Listing Details',
      readOnlyHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        url_or_id: {
          type: 'string',
          description: 'Full listing URL or numeric listing id',
        },
      },
      required: ['url_or_id'],
    },
  },
  {
    name: 'get_market_overview',
    description:
      'Aggregate statistics for a location: listing count, average price, price per square foot, cap rate, ranges and type breakdowns.',
    annotations: {
      title: 'Market Overview',
      readOnlyHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        location: {
          type: 'string',
          description: "City and state ('Houston, TX'), state abbreviation ('TX') or zip code ('77001')",
        },
        property_type: {
          type: 'string',
          enum: [...PROPERTY_TYPES],
          description: 'Restrict to one property type (default: all types)',
        },
      },
      required: ['location'],
    },
  },
];

// ── Argument reading ──────────────────────────────────────────────────────────

export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

type Args = Record<string, unknown>;

function requireString(args: Args, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ToolArgumentError(`"${key}" is required and must be a non-empty string`);
  }
  return value.trim();
}

function optionalNumber(args: Args, key: string): number | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ToolArgumentError(`"${key}" must be a number`);
  }
  return value;
}

function optionalPropertyType(args: Args): PropertyType | undefined {
  const value = args['property_type'];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string' || !isPropertyType(value)) {
    throw new ToolArgumentError(`"property_type" must be one of: ${PROPERTY_TYPES.join(', ')}`);
  }
  return value;
}

function optionalListingType(args: Args): ListingType {
  const value = args['listing_type'];
  if (value === undefined || value === null || value === '') return 'for-sale';
  if (typeof value !== 'string' || !isListingType(value)) {
    throw new ToolArgumentError(`"listing_type" must be one of: ${LISTING_TYPES.join(', ')}`);
  }
  return value;
}

function optionalPage(args: Args): number {
  const page = optionalNumber(args, 'page') ?? 1;
  if (!Number.isInteger(page) || page < 1) {
    throw new ToolArgumentError('"page" must be a positive integer');
  }
  return page;
}

// ── Filtering ─────────────────────────────────────────────────────────────────

export interface ListingFilters {
  priceMin?: number;
  priceMax?: number;
  sizeMin?: number;
  sizeMax?: number;
}

function withinBounds(value: number | null, min: number | undefined, max: number | undefined): boolean {
  // Listings that don't state a value are never filtered out.
  if (value === null) return true;
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value > max) return false;
  return true;
}

export function filterListings(properties: PropertySummary[], filters: ListingFilters): PropertySummary[] {
  return properties.filter(
    (property) =>
      withinBounds(parsePrice(property.price), filters.priceMin, filters.priceMax) &&
      withinBounds(parseSize(property.sizeSqft), filters.sizeMin, filters.sizeMax),
  );
}

// ── Handlers ──────────────────────────────────────────────────────────────────

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function searchProperties(context: ToolContext, args: Args): Promise<object> {
  const location = requireString(args, 'location');
  const propertyType = optionalPropertyType(args);
  const listingType = optionalListingType(args);
  const page = optionalPage(args);
  const filters: ListingFilters = {
    priceMin: optionalNumber(args, 'price_min'),
    priceMax: optionalNumber(args, 'price_max'),
    sizeMin: optionalNumber(args, 'size_min'),
    sizeMax: optionalNumber(args, 'size_max'),
  };

  const url = buildSearchUrl(location, { propertyType, listingType, page, baseUrl: context.baseUrl });
  let html: string;
  try {
    html = await context.fetcher.fetch(url);
  } catch (error) {
    if (error instanceof ListingFetchError) {
      log.error(`search_properties failed for ${location}: ${error.message}`);
      return { error: error.message, queryLocation: location, properties: [] };
    }
    throw error;
  }

  const parsed = parseSearchResults(html, { baseUrl: context.baseUrl, listingType: LISTING_TYPE_LABELS[listingType] });
  const result: SearchResult = {
    queryLocation: location,
    queryPropertyType: propertyType,
    queryListingType: listingType,
    totalResults: parseTotalResults(html) ?? parsed.length,
    page,
    hasNextPage: parsePagination(html),
    properties: filterListings(parsed, filters),
  };
  return result;
}

export async function getPropertyDetails(context: ToolContext, args: Args): Promise<object> {
  const url = resolveDetailUrl(requireString(args, 'url_or_id'), context.baseUrl);

  let html: string;
  try {
    html = await context.fetcher.fetch(url);
  } catch (error) {
    if (error instanceof ListingFetchError) {
      log.error(`get_property_details failed for ${url}: ${error.message}`);
      return { error: error.message, url };
    }
    throw error;
  }

  try {
    return parsePropertyDetail(html, url);
  } catch (error) {
    log.error(`Could not parse property page ${url}`, error);
    return { error: `Failed to parse property page: ${errorMessage(error)}`, url };
  }
}

export async function getMarketOverview(context: ToolContext, args: Args): Promise<object> {
  const location = requireString(args, 'location');
  const propertyType = optionalPropertyType(args);

  const url = buildSearchUrl(location, { propertyType, baseUrl: context.baseUrl });
  let html: string;
  try {
    html = await context.fetcher.fetch(url);
  } catch (error) {
    if (error instanceof ListingFetchError) {
      log.error(`get_market_overview failed for ${location}: ${error.message}`);
      return { error: error.message, location };
    }
    throw error;
  }

  const properties = parseSearchResults(html, { baseUrl: context.baseUrl, listingType: LISTING_TYPE_LABELS['for-sale'] });
  return buildMarketOverview(location, propertyType, properties);
}

const HANDLERS: Readonly<Record<string, (context: ToolContext, args: Args) => Promise<object>>> = {
  search_properties: searchProperties,
  get_property_details: getPropertyDetails,
  get_market_overview: getMarketOverview,
};

function textResult(payload: unknown, isError = false): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}

/** Dispatch one tools/call request. Never throws. */
export async function handleToolCall(
  context: ToolContext,
  name: string,
  args: Args | undefined,
): Promise<CallToolResult> {
  const handler = Object.hasOwn(HANDLERS, name) ? HANDLERS[name] : undefined;
  if (!handler) {
    return textResult({ error: 'UnknownTool', message: `Unknown tool: ${name}` }, true);
  }

  log.info(`${name} called`);
  try {
    return textResult(await handler(context, args ?? {}));
  } catch (error) {
    const label = error instanceof Error ? error.name : 'Error';
    return textResult({ error: label, message: errorMessage(error) }, true);
  }
}

export interface CreateServerOptions {
  fetcher: PageSource;
  baseUrl: string;
}

export function createServer(options: CreateServerOptions): Server {
  const context: ToolContext = { fetcher: options.fetcher, baseUrl: options.baseUrl };

  const server = new Server(
    {
      name: 'crelist',
      version: readPackageVersion(),
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleToolCall(context, request.params.name, request.params.arguments),
  );

  return server;
}
