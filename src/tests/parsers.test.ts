import { readFileSync } from 'fs';
import { describe, expect, it } from 'vitest';
import { parseAddress } from '../parsers/address.js';
import { parsePagination, parseSearchResults, parseTotalResults } from '../parsers/search.js';
import { parsePropertyDetail } from '../parsers/detail.js';

const BASE = 'https://listings.example.com';

function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

describe('parseAddress', () => {
  it('splits street, city, state and zip', () => {
    expect(parseAddress('101 Main St, Dallas, TX 75201')).toEqual({
      address: '101 Main St',
      city: 'Dallas',
      state: 'TX',
      zipCode: '75201',
    });
  });

  it('leaves the zip out when there is none', () => {
    expect(parseAddress('101 Main St, Dallas, tx')).toEqual({ address: '101 Main St', city: 'Dallas', state: 'TX' });
  });

  it('uses the city as the address for two-part input', () => {
    expect(parseAddress('Dallas, TX 75201')).toEqual({ address: 'Dallas', city: 'Dallas', state: 'TX', zipCode: '75201' });
  });

  it('keeps a comma-free string whole', () => {
    expect(parseAddress('  Some Address  ')).toEqual({ address: 'Some Address', city: '', state: '' });
  });
});

describe('parseSearchResults', () => {
  const html = fixture('search-results.html');
  const results = parseSearchResults(html, { baseUrl: BASE, listingType: 'For Sale' });

  it('skips placards without a title link', () => {
    expect(results.map((r) => r.name)).toEqual(['Congress Avenue Tower', 'Main Street Flex', 'Lamar Retail Corner']);
  });

  it('reads a fully populated placard', () => {
    expect(results[0]).toEqual({
      name: 'Congress Avenue Tower',
      address: '1200 Congress Ave',
      city: 'Austin',
      state: 'TX',
      zipCode: '78701',
      propertyType: 'Office Building',
      listingType: 'For Sale',
      price: '$4,500,000',
      sizeSqft: '25,000 SF',
      capRate: '6.5% Cap Rate',
      url: 'https://listings.example.com/Listing/1200-Congress-Ave-Austin-TX/31948105/',
      imageUrl: 'https://images.example.com/31948105/1.jpg',
      brokerCompany: 'Placeholder Realty Group',
    });
  });

  it('drops placeholder prices and classifies unlabelled sizes', () => {
    const flex = results[1];
    expect(flex?.price).toBeUndefined();
    expect(flex?.sizeSqft).toBe('12,000 SF');
    expect(flex?.city).toBe('Round Rock');
    expect(flex?.address).toBe('Round Rock');
    expect(flex?.url).toBe('https://listings.example.com/property/401-main-st-round-rock-tx/48479-210176/');
    expect(flex?.imageUrl).toBe('https://images.example.com/48479/1.jpg');
    expect(flex?.brokerCompany).toBeUndefined();
  });

  it('classifies an unlabelled property type', () => {
    expect(results[2]?.propertyType).toBe('Retail');
    expect(results[2]?.zipCode).toBeUndefined();
    expect(results[2]?.imageUrl).toBeUndefined();
  });

  it('returns an empty list for a page without placards', () => {
    expect(parseSearchResults('<html><body><p>No results</p></body></html>')).toEqual([]);
  });

  it('reads the total result count', () => {
    expect(parseTotalResults(html)).toBe(1284);
    expect(parseTotalResults('<html><body></body></html>')).toBeNull();
  });

  it('detects a next page link', () => {
    expect(parsePagination(html)).toBe(true);
    expect(parsePagination('<html><body><a href="/2/">2</a></body></html>')).toBe(false);
  });
});

describe('parsePropertyDetail', () => {
  const url = `${BASE}/Listing/450-River-Rd-Sacramento-CA/777/`;
  const detail = parsePropertyDetail(fixture('property-detail.html'), url);

  it('reads the hero block', () => {
    expect(detail.name).toBe('Riverside Office Park');
    expect(detail.address).toBe('450 River Rd');
    expect(detail.city).toBe('Sacramento');
    expect(detail.state).toBe('CA');
    expect(detail.zipCode).toBe('95821');
    expect(detail.price).toBe('$3,200,000');
    expect(detail.capRate).toBe('7.25% Cap Rate');
    expect(detail.lastUpdated).toBe('03/01/2026');
    expect(detail.url).toBe(url);
  });

  it('reads feature grid rows and fact attributes', () => {
    expect(detail).toMatchObject({
      propertyType: 'Office',
      propertySubtype: 'Office/Medical',
      sizeSqft: '25,000 SF',
      yearBuilt: '1998',
      buildingClass: 'B',
      parking: '80 Spaces (3.2 Spaces per 1,000 SF Leased)',
      noi: '$232,000',
      zoning: 'C-2',
      stories: 3,
    });
    expect(detail.lotSize).toBeUndefined();
    expect(detail.units).toBeUndefined();
  });

  it('collects highlights, description and unique images', () => {
    expect(detail.highlights).toEqual(['Fully leased to three tenants', 'Walking distance to the river trail']);
    expect(detail.description).toBe('Three-story office building on the river corridor. Recent lobby and roof upgrades.');
    expect(detail.images).toEqual(['https://images.example.com/777/1.jpg', 'https://images.example.com/777/2.jpg']);
  });

  it('reads the broker contact', () => {
    expect(detail.brokerName).toBe('Jordan Sample');
    expect(detail.brokerCompany).toBe('Placeholder Realty Group');
    expect(detail.brokerPhone).toBe('(555) 010-0100');
  });

  it('falls back to defaults on an empty page', () => {
    const empty = parsePropertyDetail('<html><body></body></html>', url);
    expect(empty.name).toBe('Unknown');
    expect(empty.address).toBe('');
    expect(empty.highlights).toEqual([]);
    expect(empty.images).toEqual([]);
    expect(empty.price).toBeUndefined();
  });
});
