/**
 * Property detail page → PropertyDetail
 */

import * as cheerio from 'cheerio';
import type { PropertyDetail } from '../types.js';
import { parseAddress } from './address.js';
import { collapseText, nonEmpty } from './search.js';

/** `data-fact-type` attribute → feature-grid row label. */
const FACT_TYPE_LABELS: ReadonlyArray<readonly [string, string]> = [
  ['BuildingSize', 'Building Size'],
  ['YearBuilt', 'Year Built'],
  ['BuildingClass', 'Building Class'],
  ['Zoning', 'Zoning'],
  ['LotSize', 'Lot Size'],
  ['Parking', 'Parking'],
  ['Stories', 'Stories'],
  ['Units', 'Units'],
  ['CapRate', 'Cap Rate'],
  ['NOI', 'NOI'],
  ['PricePerSF', 'Price Per SF'],
  ['SaleType', 'Sale Type'],
  ['PropertyType', 'Property Type'],
  ['PropertySubType', 'Property Subtype'],
];

function firstInteger(text: string | undefined): number | undefined {
  if (!text) return undefined;
  const match = /(\d+)/.exec(text);
  return match?.[1] ? parseInt(match[1], 10) : undefined;
}

function looksLikeAddress(text: string): boolean {
  return /\b[A-Z]{2}\s*\d{5}\b/.test(text) || /,\s*[A-Z]{2}\b/.test(text);
}

export function parsePropertyDetail(html: string, url: string): PropertyDetail {
  const $ = cheerio.load(html);
  const text = (selector: string): string => collapseText($(selector).first().text());

  const name = text('.profile-hero-main-title .profile-hero__segment') || 'Unknown';

  // Hero subtitle segments: address, price, cap rate in no fixed order
  const segments = $('.profile-hero-sub-title .profile-hero__segment')
    .map((_, el) => collapseText($(el).text()))
    .get();

  const rawAddress = segments.find(looksLikeAddress) ?? segments[segments.length - 1] ?? '';
  const address = parseAddress(rawAddress);

  let price = nonEmpty(text('td.feature-grid__data[data-fact-type="Price"]'));
  if (!price) {
    const priced = segments.find((segment) => segment.startsWith('$'));
    price = priced ? nonEmpty(priced.split('(')[0]) : undefined;
  }

  const facts = new Map<string, string>();
  $('table.property-data tr.feature-grid__row').each((_, row) => {
    const label = collapseText($(row).find('td.feature-grid__title').first().text());
    const value = collapseText($(row).find('td.feature-grid__data').first().text());
    if (label && value) {
      facts.set(label, value);
    }
  });
  for (const [factType, label] of FACT_TYPE_LABELS) {
    if (facts.has(label)) continue;
    const value = text(`td.feature-grid__data[data-fact-type="${factType}"]`);
    if (value) {
      facts.set(label, value);
    }
  }

  const capRate = facts.get('Cap Rate') ?? segments.find((segment) => segment.toLowerCase().includes('cap rate'));

  const highlights = $('.highlights-wrap .bulleted-list li')
    .map((_, el) => collapseText($(el).text()))
    .get()
    .filter((item) => item.length > 0);

  const images: string[] = [];
  $('#mosaic-profile .mosaic-tile img, .mosaic-carousel img').each((_, img) => {
    const src = $(img).attr('src');
    if (src && !images.includes(src)) {
      images.push(src);
    }
  });

  let brokerName: string | undefined;
  const contactName = $('ul.contacts li.contact .contact-name').first();
  if (contactName.length > 0) {
    const first = collapseText(contactName.find('.first-name').first().text());
    const last = collapseText(contactName.find('.last-name').first().text());
    brokerName = first && last ? `${first} ${last}` : nonEmpty(collapseText(contactName.text()));
  }

  const lastUpdated = nonEmpty(text('.last-updated').replace(/^last updated:?/i, ''));

  return {
    name,
    ...address,
    propertyType: facts.get('Property Type'),
    propertySubtype: facts.get('Property Subtype'),
    listingType: facts.get('Sale Type'),
    price,
    pricePerSqft: facts.get('Price Per SF'),
    capRate,
    noi: facts.get('NOI'),
    sizeSqft: facts.get('Building Size'),
    lotSize: facts.get('Lot Size'),
    yearBuilt: facts.get('Year Built'),
    buildingClass: facts.get('Building Class'),
    zoning: facts.get('Zoning'),
    parking: facts.get('Parking'),
    stories: firstInteger(facts.get('Stories')),
    units: firstInteger(facts.get('Units')),
    description: nonEmpty(text('section.description .sales-notes-text')),
    highlights,
    images,
    brokerName,
    brokerCompany: nonEmpty(text('ul.contacts .company-name')),
    brokerPhone: nonEmpty(text('a#broker-phone-number')),
    url,
    lastUpdated,
  };
}
