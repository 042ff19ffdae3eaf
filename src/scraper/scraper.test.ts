import { describe, it, expect } from 'vitest';
import { isValidUrl, normalizeUrl } from './url.js';
import { looksBlocked } from './blocked.js';
import { cookieHeader, makeHeaders, parseCookies, ROTATION_USER_AGENTS, sample, siteHintFor } from './headers.js';
import { cookieItemsForBrowser } from './browser.js';
import { extractSummary, selectMatches } from './extract.js';
import { linksToCsv } from './csv.js';

describe('normalizeUrl', () => {
  it.each([
    ['  example.com/path ', 'https://example.com/path'],
    ['http:/example.com', 'http://example.com'],
    ['https:////example.com/a', 'https://example.com/a'],
    ['https//example.com', 'https://example.com'],
    ['wwwhttps://example.com', 'https://example.com'],
    ['www.example.com', 'https://www.example.com'],
    ['http:\\\\example.com\\docs', 'http://example.com/docs'],
    ['HTTPS://Example.com', 'HTTPS://Example.com'],
    ['ftp://files.example.com', 'ftp://files.example.com'],
    ['', ''],
  ])('normalizes %j to %j', (input, expected) => {
    expect(normalizeUrl(input)).toBe(expected);
  });
});

describe('isValidUrl', () => {
  it('accepts http and https with a host only', () => {
    expect(isValidUrl('https://example.com/x')).toBe(true);
    expect(isValidUrl('http://localhost:5000')).toBe(true);
    expect(isValidUrl('ftp://files.example.com')).toBe(false);
    expect(isValidUrl('https://')).toBe(false);
    expect(isValidUrl('not a url')).toBe(false);
  });
});

describe('looksBlocked', () => {
  it('treats block statuses as blocked regardless of body', () => {
    expect(looksBlocked('x'.repeat(5000), 403)).toBe(true);
    expect(looksBlocked('', 401)).toBe(true);
    expect(looksBlocked('', 429)).toBe(true);
  });

  it('detects bot-wall markers', () => {
    expect(looksBlocked(`<html>${'a'.repeat(1000)} Attention Required! | Cloudflare</html>`, 200)).toBe(true);
    expect(looksBlocked('Please complete the /captcha', 200)).toBe(true);
  });

  it('treats a short body as blocked only with an error status', () => {
    expect(looksBlocked('Not found', 404)).toBe(true);
    expect(looksBlocked('Server error', 500)).toBe(true);
    expect(looksBlocked('<p>short page</p>', 200)).toBe(false);
    expect(looksBlocked('x'.repeat(400), 404)).toBe(false);
  });
});

describe('headers', () => {
  it('parses cookie strings', () => {
    expect(parseCookies(' sid = abc ; theme=dark=1; broken; =x; ')).toEqual({ sid: 'abc', theme: 'dark=1' });
    expect(parseCookies(undefined)).toEqual({});
    expect(cookieHeader({ a: '1', empty: '', b: '2' })).toBe('a=1; b=2');
  });

  it('derives the fetch site from the referer', () => {
    expect(siteHintFor(undefined, 'https://example.com/a')).toBe('none');
    expect(siteHintFor('https://example.com/', 'https://example.com/a')).toBe('same-origin');
    expect(siteHintFor('https://www.google.com/', 'https://example.com/a')).toBe('cross-site');
  });

  it('builds Chrome navigation headers', () => {
    const headers = makeHeaders('', 'https://www.google.com/', 'cross-site', { sid: 'abc' }, () => 0);
    expect(headers['User-Agent']).toBe(ROTATION_USER_AGENTS[0]);
    expect(headers.Referer).toBe('https://www.google.com/');
    expect(headers['Sec-Fetch-Site']).toBe('cross-site');
    expect(headers.Cookie).toBe('sid=abc');
    expect(headers['Accept-Language']).toBe('en-US,en;q=0.9');
  });

  it('omits Referer and Cookie when empty', () => {
    const headers = makeHeaders('custom-agent', '', 'none');
    expect(headers['User-Agent']).toBe('custom-agent');
    expect('Referer' in headers).toBe(false);
    expect('Cookie' in headers).toBe(false);
  });

  it('samples distinct items', () => {
    const picked = sample(ROTATION_USER_AGENTS, 5, () => 0.5);
    expect(picked).toHaveLength(ROTATION_USER_AGENTS.length);
    expect(new Set(picked).size).toBe(ROTATION_USER_AGENTS.length);
  });
});

describe('cookieItemsForBrowser', () => {
  it('scopes cookies to the URL host', () => {
    expect(cookieItemsForBrowser('sid=abc; x', 'https://shop.example.com/cart')).toEqual([
      { name: 'sid', value: 'abc', domain: 'shop.example.com', path: '/', httpOnly: false, secure: true },
    ]);
    expect(cookieItemsForBrowser('', 'https://example.com')).toEqual([]);
  });
});

const PAGE = `<!doctype html>
<html><head><title> Demo Page </title>
<meta name="description" content=" A demo. ">
</head><body>
<h2>Second</h2>
<h1>Main <em>Title</em></h1>
<h3>  </h3>
<a href="/about">About   us</a>
<a href="https://other.org/x">Other</a>
<a href="mailto:hi@example.com">Mail</a>
<img src="img/logo.png" alt=" Logo ">
<img src="https://cdn.example.com/a.png">
<p class="price">$10</p><p class="price"><span></span></p>
</body></html>`;

describe('extractSummary', () => {
  const summary = extractSummary(PAGE, 'https://example.com/shop/index.html');

  it('reads title and description', () => {
    expect(summary.title).toBe('Demo Page');
    expect(summary.metaDescription).toBe('A demo.');
  });

  it('lists headings H1 first, then H2, then H3, skipping empty ones', () => {
    expect(summary.headings).toEqual([
      { tag: 'H1', text: 'Main Title' },
      { tag: 'H2', text: 'Second' },
    ]);
  });

  it('resolves links and marks same-host ones', () => {
    expect(summary.links).toEqual([
      { href: 'https://example.com/about', text: 'About us', sameHost: true },
      { href: 'https://other.org/x', text: 'Other', sameHost: false },
      { href: 'mailto:hi@example.com', text: 'Mail', sameHost: false },
    ]);
  });

  it('resolves image sources', () => {
    expect(summary.images).toEqual([
      { src: 'https://example.com/shop/img/logo.png', alt: 'Logo' },
      { src: 'https://cdn.example.com/a.png', alt: '' },
    ]);
  });

  it('falls back to og:description', () => {
    const html = '<meta property="og:description" content="From OG">';
    expect(extractSummary(html, 'https://example.com').metaDescription).toBe('From OG');
  });

  it('keeps an empty description when the description tag has no content', () => {
    const html = '<meta name="description"><meta property="og:description" content="From OG">';
    expect(extractSummary(html, 'https://example.com').metaDescription).toBe('');
  });
});

describe('selectMatches', () => {
  it('returns text, or the element HTML when it has none', () => {
    expect(selectMatches(PAGE, 'p.price')).toEqual(['$10', '<p class="price"><span></span></p>']);
    expect(selectMatches(PAGE, 'table')).toEqual([]);
  });

  it('truncates element HTML to 500 characters', () => {
    const html = `<div class="x" data-long="${'y'.repeat(600)}"></div>`;
    expect(selectMatches(html, 'div.x')[0]).toHaveLength(500);
  });

  it('throws on an invalid selector', () => {
    expect(() => selectMatches(PAGE, 'p:bogus')).toThrow();
  });
});

describe('linksToCsv', () => {
  it('writes a header, quotes where needed and uses CRLF', () => {
    const csv = linksToCsv([
      { text: 'About, us', href: 'https://e.com/"q"', sameHost: true },
      { text: '', href: 'https://o.org', sameHost: false },
    ]);
    expect(csv).toBe('text,href,same_host\r\n"About, us","https://e.com/""q""",True\r\n,https://o.org,False\r\n');
  });
});
