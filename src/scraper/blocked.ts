const BLOCK_STATUSES = new Set([401, 403, 429]);

const BLOCK_MARKERS = [
  'access denied',
  'request blocked',
  'forbidden',
  'unusual traffic',
  'cloudflare',
  'attention required',
  'robot check',
  '/captcha',
  'akamai',
  'perimeterx',
  'datadome',
  'sucuri',
  'verification required',
  'are you a human',
  'temporary block',
  'blocked by',
  'ddos protection',
];

export function isBlockStatus(status: number): boolean {
  return BLOCK_STATUSES.has(status);
}

/**
 * Heuristic for "the site refused us" pages: block statuses, bot-wall
 * markers in the body, or a tiny body served with an error status.
 */
export function looksBlocked(text: string, status: number): boolean {
  if (isBlockStatus(status)) return true;

  const low = (text || '').toLowerCase();
  if (BLOCK_MARKERS.some((marker) => low.includes(marker))) return true;

  return low.trim().length < 400 && status >= 400 && status < 600;
}
