/**
 * Anti-bot interstitial detection.
 *
 * The edge layer in front of the listing site answers suspicious requests
 * with a small HTTP 200 page that runs a sensor script before redirecting to
 * the real content. Those pages are short and carry vendor-specific markup.
 * Real listing pages are always far larger than the threshold, so a large page
 * that happens to embed a marker string is not a challenge.
 */

/* ---------- public types ------------------------------------------------- */

export interface ChallengeDetectionResult {
  isChallenge: boolean;
  /** The marker that matched, when one did. */
  marker?: string;
  details?: string;
}

/* ---------- constants ---------------------------------------------------- */

/** Pages this long or longer are never treated as challenges. */
export const CHALLENGE_MAX_LENGTH = 10_000;

/** Content a browser must exceed before the challenge counts as resolved. */
export const MIN_RESOLVED_LENGTH = 1000;

export const CHALLENGE_MARKERS: readonly string[] = [
  'sec-if-cpt-container',
  'behavioral-content',
  '/akam/13/pixel_',
];

/* ---------- main export -------------------------------------------------- */

export function detectChallenge(html: string): ChallengeDetectionResult {
  if (html.length >= CHALLENGE_MAX_LENGTH) {
    return { isChallenge: false, details: `Page too large to be a challenge (${html.length} chars)` };
  }

  const marker = CHALLENGE_MARKERS.find((m) => html.includes(m));
  if (!marker) {
    return { isChallenge: false };
  }

  return {
    isChallenge: true,
    marker,
    details: `Matched "${marker}" in a ${html.length}-char page`,
  };
}

export function isChallengePage(html: string): boolean {
  return detectChallenge(html).isChallenge;
}
