import type { ScraperConfig } from '../config/schema.js';
import type { BrowserFetcher } from './browser.js';
import { looksBlocked } from './blocked.js';
import { extractSummary, selectMatches } from './extract.js';
import { ROTATION_USER_AGENTS, pick, type Random } from './headers.js';
import type { PageFetcher } from './http.js';
import type { FetchMethod, FetchedPage, ScrapeRequest, ScrapeResult } from './types.js';
import { isValidUrl, normalizeUrl } from './url.js';

export type ScrapeErrorCode = 'INVALID_URL' | 'INVALID_SELECTOR' | 'BLOCKED' | 'NETWORK_ERROR';

export class ScrapeError extends Error {
  constructor(
    public readonly code: ScrapeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'ScrapeError';
  }
}

export const DEFAULT_DELAY_SECONDS = 1;

/**
 * Delay field from a form or JSON body: a number of seconds within
 * [0, max]; anything unparseable falls back to one second.
 */
export function parseDelay(raw: unknown, max = 10): number {
  const value = typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : NaN;
  if (!Number.isFinite(value)) return DEFAULT_DELAY_SECONDS;
  return Math.min(max, Math.max(0, value));
}

export interface ScrapeServiceDeps {
  http: PageFetcher;
  browser: BrowserFetcher;
  config: ScraperConfig;
  random?: Random;
}

export class ScrapeService {
  constructor(private deps: ScrapeServiceDeps) {}

  browserAvailable(): boolean {
    return this.deps.browser.available();
  }

  async scrape(request: ScrapeRequest): Promise<ScrapeResult> {
    const url = normalizeUrl(request.url);
    if (!isValidUrl(url)) {
      throw new ScrapeError('INVALID_URL', `Please provide a valid URL. You entered: “${request.url}”.`);
    }

    let page: FetchedPage;
    try {
      page = await this.deps.http.fetchPage(url, {
        userAgent: request.userAgent,
        delaySeconds: request.delay ?? DEFAULT_DELAY_SECONDS,
        referer: request.referer,
        primeCookies: request.primeCookies,
        proxy: request.proxy,
        cookies: request.cookies,
        aggressive: request.aggressive,
      });
    } catch (err) {
      throw new ScrapeError('NETWORK_ERROR', `Network error: ${(err as Error).message}`);
    }

    let method: FetchMethod = request.aggressive ? 'http/aggressive' : 'http';
    let blocked = !page.ok || looksBlocked(page.text, page.status);
    let fallbackError: string | null = null;
    const browserAvailable = this.deps.browser.available();

    if ((request.useBrowser || blocked) && browserAvailable) {
      try {
        page = await this.deps.browser.fetchPage(url, {
          userAgent: request.userAgent || pick(ROTATION_USER_AGENTS, this.deps.random),
          referer: request.referer,
          proxy: request.proxy,
          cookies: request.cookies,
          timeoutMs: this.deps.config.browser_timeout_ms,
        });
        method = 'browser';
        blocked = false;
      } catch (err) {
        fallbackError = (err as Error).message;
        console.warn(`Browser fallback for ${url} failed: ${fallbackError}`);
      }
    }

    if (blocked) {
      const hints = [
        ...(browserAvailable ? [] : ['install the browser: npx playwright-core install chromium']),
        'paste real cookies (DevTools) & a real Chrome UA',
        "use a residential proxy in the site's country",
        'set Referer to https://www.google.com/',
      ];
      throw new ScrapeError('BLOCKED', `Request failed/blocked (status ${page.status}). ${hints.join(' | ')}`);
    }

    const summary = extractSummary(page.text, page.url);

    let selectorMatches: string[] | null = null;
    const selector = (request.selector ?? '').trim();
    if (selector) {
      try {
        selectorMatches = selectMatches(page.text, selector);
      } catch (err) {
        throw new ScrapeError('INVALID_SELECTOR', `Invalid CSS selector "${selector}": ${(err as Error).message}`);
      }
    }

    return {
      finalUrl: page.url,
      statusCode: page.status,
      contentType: page.contentType,
      ...summary,
      selector,
      selectorMatches,
      methodUsed: method,
      fallbackError,
    };
  }
}
