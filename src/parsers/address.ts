export interface AddressParts {
  address: string;
  city: string;
  state: string;
  zipCode?: string;
}

/**
 * Split a comma-separated address into parts.
 *
 *   "101 Main St, Dallas, TX 75201" → street, city, state, zip
 *   "Dallas, TX 75201"              → city doubles as the address
 *   "Some Address"                  → whole string as the address
 */
export function parseAddress(raw: string): AddressParts {
  const parts = raw.split(',').map((part) => part.trim());
  const first = parts[0] ?? '';
  const last = parts[parts.length - 1] ?? '';

  if (parts.length < 2) {
    return { address: raw.trim(), city: '', state: '' };
  }

  const match = /([A-Za-z]{2})\s*(\d{5})?/.exec(last);
  const state = match?.[1] ? match[1].toUpperCase() : last;
  const zipCode = match?.[2];

  const city = parts.length >= 3 ? (parts[1] ?? '') : first;
  return zipCode ? { address: first, city, state, zipCode } : { address: first, city, state };
}
