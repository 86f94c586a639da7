/**
 * Market statistics over the listings of one search page.
 */

import type { MarketOverview, PropertySummary } from '../types.js';

const SAMPLE_SIZE = 5;

const SUFFIX_MULTIPLIERS: Readonly<Record<string, number>> = { k: 1_000, m: 1_000_000, b: 1_000_000_000 };

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const twoDecimals = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 });

/**
 * Dollar amount from listing text: `"$4,500,000"`, `"$2.1M"`, `"$850K"`.
 * Null for anything without a number ("Upon Request").
 */
export function parsePrice(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = /\$?\s*(\d[\d,]*(?:\.\d+)?)\s*([KMB])?\b/i.exec(text);
  if (!match?.[1]) return null;

  const value = parseFloat(match[1].replace(/,/g, ''));
  if (!Number.isFinite(value)) return null;

  const suffix = match[2]?.toLowerCase();
  const multiplier = suffix ? SUFFIX_MULTIPLIERS[suffix] : undefined;
  return multiplier ? Math.round(value * multiplier) : value;
}

/** Square feet from `"25,000 SF"`. Acreage and unit-less text give null. */
export function parseSize(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = /(\d[\d,]*(?:\.\d+)?)\s*SF\b/i.exec(text);
  if (!match?.[1]) return null;
  const value = parseFloat(match[1].replace(/,/g, ''));
  return Number.isFinite(value) ? value : null;
}

/** Percentage from `"6.5%"` or `"6.33% Cap Rate"`. */
export function parseCapRate(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = /(\d+(?:\.\d+)?)\s*%/.exec(text);
  return match?.[1] ? parseFloat(match[1]) : null;
}

function mean(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function range(values: number[], format: (value: number) => string): string | undefined {
  if (values.length === 0) return undefined;
  return `${format(Math.min(...values))} - ${format(Math.max(...values))}`;
}

function countBy(properties: PropertySummary[], key: (property: PropertySummary) => string | undefined): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const property of properties) {
    const value = key(property);
    if (value) {
      counts[value] = (counts[value] ?? 0) + 1;
    }
  }
  return counts;
}

const formatDollars = (value: number): string => `$${wholeNumber.format(value)}`;
const formatSquareFeet = (value: number): string => `${wholeNumber.format(value)} SF`;

export function buildMarketOverview(
  location: string,
  propertyType: string | undefined,
  properties: PropertySummary[],
): MarketOverview {
  const prices: number[] = [];
  const sizes: number[] = [];
  const capRates: number[] = [];
  const pricesPerSqft: number[] = [];

  for (const property of properties) {
    const price = parsePrice(property.price);
    const size = parseSize(property.sizeSqft);
    const capRate = parseCapRate(property.capRate);

    if (price !== null) prices.push(price);
    if (size !== null) sizes.push(size);
    if (capRate !== null) capRates.push(capRate);
    if (price !== null && size !== null && size > 0) {
      pricesPerSqft.push(price / size);
    }
  }

  const avgPrice = mean(prices);
  const avgSize = mean(sizes);
  const avgPricePerSqft = mean(pricesPerSqft);
  const avgCapRate = mean(capRates);

  return {
    location,
    propertyType,
    totalListings: properties.length,
    avgPrice: avgPrice === undefined ? undefined : formatDollars(avgPrice),
    avgPricePerSqft: avgPricePerSqft === undefined ? undefined : `$${twoDecimals.format(avgPricePerSqft)}/SF`,
    avgCapRate: avgCapRate === undefined ? undefined : `${avgCapRate.toFixed(2)}%`,
    avgSizeSqft: avgSize === undefined ? undefined : formatSquareFeet(avgSize),
    priceRange: range(prices, formatDollars),
    sizeRange: range(sizes, formatSquareFeet),
    listingTypesBreakdown: countBy(properties, (property) => property.listingType),
    propertySubtypesBreakdown: countBy(properties, (property) => property.propertyType),
    sampleListings: properties.slice(0, SAMPLE_SIZE),
  };
}
