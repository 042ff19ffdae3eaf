export const BROWSER_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:127.0) Gecko/20100101 Firefox/127.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15',
];

/** Pool rotated through when a request is blocked. */
export const ROTATION_USER_AGENTS = [
  ...BROWSER_USER_AGENTS,
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
];

/** "{origin}" stands for the target's own origin. */
export const REFERER_STRATEGIES = ['', '{origin}', 'https://www.google.com/', 'https://www.bing.com/'];

export type SiteHint = 'none' | 'same-origin' | 'cross-site';

export type Random = () => number;

export function pick<T>(items: readonly T[], random: Random = Math.random): T {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

/** `k` distinct items in random order. */
export function sample<T>(items: readonly T[], k: number, random: Random = Math.random): T[] {
  const pool = [...items];
  for (let i = pool.length - 1; i > 0; i--) {
    const j = Math.min(i, Math.floor(random() * (i + 1)));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, k);
}

/** Parse `k=v; k2=v2`. Pairs without "=" or with an empty name are dropped. */
export function parseCookies(raw: string | undefined): Record<string, string> {
  const jar: Record<string, string> = {};
  for (const part of (raw ?? '').split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    const name = part.slice(0, eq).trim();
    if (name) jar[name] = part.slice(eq + 1).trim();
  }
  return jar;
}

export function cookieHeader(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .filter(([name, value]) => name && value)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

export function siteHintFor(referer: string | undefined, url: string): SiteHint {
  if (!referer) return 'none';
  let refererHost: string;
  try {
    refererHost = new URL(referer).host;
  } catch {
    return 'cross-site';
  }
  return refererHost === new URL(url).host ? 'same-origin' : 'cross-site';
}

/**
 * Headers of a Chrome navigation request. An empty user agent is replaced
 * by one from the rotation pool.
 */
export function makeHeaders(
  userAgent: string,
  referer: string,
  siteHint: SiteHint,
  cookies: Record<string, string> = {},
  random: Random = Math.random,
): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': userAgent.trim() || pick(ROTATION_USER_AGENTS, random),
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Accept-Encoding': 'gzip, deflate',
    'Cache-Control': 'no-cache',
    Pragma: 'no-cache',
    'Upgrade-Insecure-Requests': '1',
    'sec-ch-ua': '"Chromium";v="127", "Not=A?Brand";v="24", "Google Chrome";v="127"',
    'sec-ch-ua-mobile': '?0',
    'sec-ch-ua-platform': '"Windows"',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Site': siteHint,
  };

  if (referer) headers.Referer = referer;
  const cookie = cookieHeader(cookies);
  if (cookie) headers.Cookie = cookie;
  return headers;
}

export interface HeaderProfile {
  name: string;
  userAgent: string;
  headers: Record<string, string>;
}

/** Non-Chromium header sets, tried in aggressive mode. */
export const ALTERNATE_PROFILES: HeaderProfile[] = [
  {
    name: 'firefox',
    userAgent: BROWSER_USER_AGENTS[1],
    headers: {
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
      'Accept-Encoding': 'gzip, deflate',
      'Upgrade-Insecure-Requests': '1',
      'Sec-Fetch-Mode': 'navigate',
      'Sec-Fetch-Dest': 'document',
      'Sec-Fetch-User': '?1',
      TE: 'trailers',
    },
  },
  {
    name: 'safari',
    userAgent: BROWSER_USER_AGENTS[2],
    headers: {
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      'Accept-Encoding': 'gzip, deflate',
    },
  },
];

export function profileHeaders(
  profile: HeaderProfile,
  referer: string,
  siteHint: SiteHint,
  cookies: Record<string, string> = {},
): Record<string, string> {
  const headers: Record<string, string> = { 'User-Agent': profile.userAgent, ...profile.headers };
  if ('Sec-Fetch-Mode' in profile.headers) headers['Sec-Fetch-Site'] = siteHint;
  if (referer) headers.Referer = referer;
  const cookie = cookieHeader(cookies);
  if (cookie) headers.Cookie = cookie;
  return headers;
}
