/**
 * Browser impersonation profiles.
 *
 * A profile is the network signature the primary transport presents: a real
 * Chrome User-Agent plus the request headers that exact Chrome build sends on
 * a top-level navigation, in the order it sends them. The `Sec-CH-UA` brand
 * list has to agree with the UA version or client-hint fingerprinting flags
 * the request.
 */

export interface ImpersonationProfile {
  id: string;
  userAgent: string;
  /** Navigation headers, User-Agent included, in Chrome's send order. */
  headers: Record<string, string>;
}

export const DEFAULT_IMPERSONATION_PROFILE = 'chrome136';

const WINDOWS_UA = (version: number): string =>
  `Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${version}.0.0.0 Safari/537.36`;

const MAC_UA = (version: number): string =>
  `Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${version}.0.0.0 Safari/537.36`;

const LINUX_UA = (version: number): string =>
  `Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${version}.0.0.0 Safari/537.36`;

// ── Sec-CH-UA header generation ───────────────────────────────────────────────

/**
 * The "Not A Brand" token format varies by Chrome version.
 *
 * Chrome 132-133: `"Not_A Brand";v="8"`
 * Chrome 134-135: `"Not)A;Brand";v="99"`
 * Chrome 136+:    `"Not.A/Brand";v="24"`
 */
function getNotABrandToken(chromeVersion: number): string {
  if (chromeVersion >= 136) {
    return '"Not.A/Brand";v="24"';
  } else if (chromeVersion >= 134) {
    return '"Not)A;Brand";v="99"';
  } else {
    return '"Not_A Brand";v="8"';
  }
}

/**
 * Sec-CH-UA value matching the Chrome major version in `userAgent`, e.g.
 * `"Chromium";v="136", "Google Chrome";v="136", "Not.A/Brand";v="24"`.
 * Falls back to Chrome 136 when the UA carries no Chrome version.
 */
export function getSecCHUA(userAgent: string): string {
  const match = userAgent.match(/Chrome\/(\d+)/i);
  const version = match?.[1] ? parseInt(match[1], 10) : 136;

  const notABrand = getNotABrandToken(version);
  return `"Chromium";v="${version}", "Google Chrome";v="${version}", ${notABrand}`;
}

export function getSecCHUAPlatform(userAgent: string): string {
  if (userAgent.includes('Windows')) return '"Windows"';
  if (userAgent.includes('Macintosh')) return '"macOS"';
  if (userAgent.includes('Linux')) return '"Linux"';
  return '"Unknown"';
}

// ── Profiles ──────────────────────────────────────────────────────────────────

function buildProfile(id: string, userAgent: string): ImpersonationProfile {
  return {
    id,
    userAgent,
    headers: {
      'Sec-CH-UA': getSecCHUA(userAgent),
      'Sec-CH-UA-Mobile': '?0',
      'Sec-CH-UA-Platform': getSecCHUAPlatform(userAgent),
      'Upgrade-Insecure-Requests': '1',
      'User-Agent': userAgent,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7',
      'Sec-Fetch-Site': 'none',
      'Sec-Fetch-Mode': 'navigate',
      'Sec-Fetch-User': '?1',
      'Sec-Fetch-Dest': 'document',
      'Accept-Encoding': 'gzip, deflate, br',
      'Accept-Language': 'en-US,en;q=0.9',
      'Priority': 'u=0, i',
    },
  };
}

const PROFILES = new Map<string, ImpersonationProfile>();

for (const version of [132, 133, 134, 135, 136]) {
  const windows = buildProfile(`chrome${version}`, WINDOWS_UA(version));
  PROFILES.set(windows.id, windows);
  const mac = buildProfile(`chrome${version}_macos`, MAC_UA(version));
  PROFILES.set(mac.id, mac);
}
PROFILES.set('chrome136_linux', buildProfile('chrome136_linux', LINUX_UA(136)));

export function getImpersonationProfile(id: string): ImpersonationProfile | undefined {
  return PROFILES.get(id.trim().toLowerCase());
}

export function listImpersonationProfiles(): string[] {
  return [...PROFILES.keys()];
}
