/**
 * Core types for crelist
 */

export const PROPERTY_TYPES = [
  'office',
  'retail',
  'industrial',
  'multifamily',
  'land',
  'hospitality',
  'special-purpose',
  'health-care',
] as const;

export type PropertyType = (typeof PROPERTY_TYPES)[number];

export const LISTING_TYPES = ['for-sale', 'for-lease'] as const;

export type ListingType = (typeof LISTING_TYPES)[number];

export function isPropertyType(value: string): value is PropertyType {
  return PROPERTY_TYPES.some((type) => type === value);
}

export function isListingType(value: string): value is ListingType {
  return LISTING_TYPES.some((type) => type === value);
}

/** A single property card from a search results page. */
export interface PropertySummary {
  name: string;
  /** Street address, or the city when the card carries no street. */
  address: string;
  city: string;
  state: string;
  zipCode?: string;
  /** Free-text type as shown on the card (e.g. "Office", "22 Unit Apartment Building") */
  propertyType?: string;
  listingType?: string;
  /** Raw price text, e.g. "$2,800,000". Absent for "Upon Request" style prices. */
  price?: string;
  pricePerSqft?: string;
  sizeSqft?: string;
  lotSize?: string;
  capRate?: string;
  /** Absolute URL of the listing detail page */
  url: string;
  imageUrl?: string;
  brokerName?: string;
  brokerCompany?: string;
}

/** Full property information from a detail page. */
export interface PropertyDetail {
  name: string;
  address: string;
  city: string;
  state: string;
  zipCode?: string;
  propertyType?: string;
  propertySubtype?: string;
  listingType?: string;
  price?: string;
  pricePerSqft?: string;
  capRate?: string;
  noi?: string;
  sizeSqft?: string;
  lotSize?: string;
  yearBuilt?: string;
  buildingClass?: string;
  zoning?: string;
  parking?: string;
  stories?: number;
  units?: number;
  description?: string;
  highlights: string[];
  images: string[];
  brokerName?: string;
  brokerCompany?: string;
  brokerPhone?: string;
  url: string;
  lastUpdated?: string;
}

export interface SearchResult {
  queryLocation: string;
  queryPropertyType?: string;
  queryListingType?: string;
  totalResults?: number;
  page: number;
  hasNextPage: boolean;
  properties: PropertySummary[];
}

/** Aggregated statistics over the listings of one search page. */
export interface MarketOverview {
  location: string;
  propertyType?: string;
  totalListings: number;
  avgPrice?: string;
  avgPricePerSqft?: string;
  avgCapRate?: string;
  avgSizeSqft?: string;
  priceRange?: string;
  sizeRange?: string;
  listingTypesBreakdown: Record<string, number>;
  propertySubtypesBreakdown: Record<string, number>;
  sampleListings: PropertySummary[];
}

/* ---------- errors ------------------------------------------------------- */

export type ListingFetchErrorCode = 'BLOCKED' | 'RATE_LIMITED' | 'TRANSPORT' | 'ESCALATION';

export class ListingFetchError extends Error {
  constructor(
    message: string,
    public code: ListingFetchErrorCode,
    public url?: string,
  ) {
    super(message);
    this.name = 'ListingFetchError';
  }
}

/** The origin kept refusing the request (403) after retries. */
export class BlockedError extends ListingFetchError {
  constructor(url: string, public status: number = 403) {
    super(`Blocked by origin (${status}) for URL: ${url}`, 'BLOCKED', url);
    this.name = 'BlockedError';
  }
}

/** The origin kept throttling the request (429) after retries. */
export class RateLimitedError extends ListingFetchError {
  constructor(url: string, public status: number = 429) {
    super(`Rate limited (${status}) for URL: ${url}`, 'RATE_LIMITED', url);
    this.name = 'RateLimitedError';
  }
}

/** Network fault, timeout, server error or an unexpected status. */
export class TransportError extends ListingFetchError {
  constructor(message: string, url?: string, public status?: number) {
    super(message, 'TRANSPORT', url);
    this.name = 'TransportError';
  }
}

/** The challenge page could not be resolved through the browser. */
export class EscalationError extends ListingFetchError {
  constructor(message: string, url?: string) {
    super(message, 'ESCALATION', url);
    this.name = 'EscalationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public variable?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
