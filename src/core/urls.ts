/**
 * URL construction for listing search and detail pages.
 */

import { isPropertyType, type ListingType, type PropertyType } from '../types.js';

export const DEFAULT_BASE_URL = 'https://www.loopnet.com';

/** Path segment the site uses for each property type. */
export const PROPERTY_TYPE_SLUGS: Readonly<Record<PropertyType, string>> = {
  office: 'office',
  retail: 'retail',
  industrial: 'industrial',
  multifamily: 'apartment-buildings',
  land: 'land',
  hospitality: 'hospitality',
  'special-purpose': 'commercial-real-estate',
  'health-care': 'health-care-facilities',
};

const ALL_TYPES_SLUG = 'commercial-real-estate';

/**
 * Turn free-form location input into the site's path slug.
 *
 * @example
 * normalizeLocation('Houston, TX')  // 'houston-tx'
 * normalizeLocation('New York, NY') // 'new-york-ny'
 * normalizeLocation('77001')        // '77001'
 */
export function normalizeLocation(location: string): string {
  return location
    .trim()
    .replace(/,/g, '')
    .replace(/\s+/g, '-')
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export interface SearchUrlOptions {
  /** Free-form; anything that is not a known PropertyType searches all types. */
  propertyType?: string;
  listingType?: ListingType;
  /** 1-based */
  page?: number;
  baseUrl?: string;
}

export function buildSearchUrl(location: string, options: SearchUrlOptions = {}): string {
  const { propertyType, listingType = 'for-sale', page = 1, baseUrl = DEFAULT_BASE_URL } = options;

  const slug = normalizeLocation(location);
  const typeSlug = propertyType && isPropertyType(propertyType) ? PROPERTY_TYPE_SLUGS[propertyType] : ALL_TYPES_SLUG;

  let url = `${trimBase(baseUrl)}/search/${typeSlug}/${slug}/${listingType}/`;
  if (page > 1) {
    url += `${page}/`;
  }
  return url;
}

/**
 * Trailing numeric id of a listing URL, or null.
 *
 * Handles `/Listing/1435-River-Ave-Camden-NJ/31948105/` and
 * `/property/4820-mims-ave-laredo-tx-78041/48479-210176/`.
 */
export function extractListingId(url: string): string | null {
  const match = /\/(\d[\d-]*)\/?$/.exec(url.replace(/\/+$/, '') + '/');
  return match?.[1] ?? null;
}

export function buildDetailUrl(listingId: string, baseUrl: string = DEFAULT_BASE_URL): string {
  return `${trimBase(baseUrl)}/Listing/${listingId}/`;
}

/** Accepts a full listing URL or a bare listing id. */
export function resolveDetailUrl(urlOrId: string, baseUrl: string = DEFAULT_BASE_URL): string {
  const value = urlOrId.trim();
  return /^https?:\/\//i.test(value) ? value : buildDetailUrl(value, baseUrl);
}

function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}
