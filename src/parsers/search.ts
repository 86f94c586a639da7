/**
 * Search results page → PropertySummary[]
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { PropertySummary } from '../types.js';
import { DEFAULT_BASE_URL } from '../core/urls.js';
import { parseAddress } from './address.js';

/** Price strings the site shows instead of a number. */
const UNPRICED = new Set(['upon request', 'negotiable', 'call for pricing']);

const PROPERTY_KIND_PATTERN = /\b(office|retail|industrial|apartment|land|hotel)\b/i;

export interface SearchParseOptions {
  baseUrl?: string;
  /** Stamped on every card; the cards themselves don't say. */
  listingType?: string;
}

export function collapseText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Read the placard's data-point list. Items carry their label in a `name`
 * attribute; unlabelled ones are recognised by their content.
 */
function readDataPoints($: cheerio.CheerioAPI, card: cheerio.Cheerio<Element>): Map<string, string> {
  const points = new Map<string, string>();

  card.find('ul.data-points-2c li').each((_, item) => {
    const label = $(item).attr('name');
    const value = collapseText($(item).text());
    if (!value) return;

    if (label) {
      points.set(label, value);
    } else if (value.toLowerCase().includes('cap rate')) {
      points.set('Cap Rate', value);
    } else if (/\d+\s*SF/i.test(value)) {
      points.set('Building Size', value);
    } else if (PROPERTY_KIND_PATTERN.test(value)) {
      points.set('Property Type', value);
    }
  });

  return points;
}

export function parseSearchResults(html: string, options: SearchParseOptions = {}): PropertySummary[] {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const $ = cheerio.load(html);
  const results: PropertySummary[] = [];

  $('article.placard').each((_, element) => {
    const card = $(element);
    const titleLink = card.find('header h4 a').first();

    const name = collapseText(titleLink.text());
    const href = titleLink.attr('href') ?? '';
    if (!name || !href) return;

    const url = href.startsWith('http') ? href : `${baseUrl}${href}`;
    const address = parseAddress(collapseText(card.find('header a.subtitle-beta').first().text()));
    const points = readDataPoints($, card);

    const rawPrice = points.get('Price');
    const price = rawPrice && !UNPRICED.has(rawPrice.toLowerCase()) ? rawPrice : undefined;

    let image = card.find('img.image-hide').first();
    if (image.length === 0) {
      image = card.find('.slide img').first();
    }

    results.push({
      name,
      ...address,
      propertyType: points.get('Property Type'),
      listingType: options.listingType,
      price,
      pricePerSqft: points.get('Price/SF'),
      sizeSqft: points.get('Building Size'),
      lotSize: points.get('Lot Size'),
      capRate: points.get('Cap Rate'),
      url,
      imageUrl: nonEmpty(image.attr('src')),
      brokerCompany: nonEmpty(card.find('[company-logo-carousel] img').first().attr('alt')),
    });
  });

  return results;
}

/** Total result count from the results header, or null when the page has none. */
export function parseTotalResults(html: string): number | null {
  const $ = cheerio.load(html);
  const counter = $('.total-results-digits, .result-count, .search-results-count').first();
  if (counter.length === 0) return null;

  const match = /([\d,]+)/.exec(counter.text());
  if (!match?.[1]) return null;
  return parseInt(match[1].replace(/,/g, ''), 10);
}

export function parsePagination(html: string): boolean {
  const $ = cheerio.load(html);
  return $('a[data-automation-id="NextPage"]').length > 0;
}

export function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
