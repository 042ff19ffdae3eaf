import { existsSync } from 'node:fs';
import { chromium, type BrowserContextOptions } from 'playwright-core';
import type { FetchedPage } from './types.js';

export interface BrowserFetchOptions {
  userAgent: string;
  referer?: string;
  proxy?: string;
  cookies?: string;
  timeoutMs: number;
}

export interface BrowserFetcher {
  /** Whether a browser binary is installed and can be launched. */
  available(): boolean;
  fetchPage(url: string, options: BrowserFetchOptions): Promise<FetchedPage>;
}

export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  httpOnly: boolean;
  secure: boolean;
}

/** `k=v; k2=v2` as cookies scoped to the URL's host. */
export function cookieItemsForBrowser(raw: string | undefined, url: string): BrowserCookie[] {
  if (!raw) return [];
  const domain = new URL(url).hostname;
  const items: BrowserCookie[] = [];

  for (const part of raw.split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    const name = part.slice(0, eq).trim();
    if (!name) continue;
    items.push({ name, value: part.slice(eq + 1).trim(), domain, path: '/', httpOnly: false, secure: true });
  }

  return items;
}

const BLOCKED_RESOURCES = new Set(['image', 'media', 'font', 'stylesheet']);
const HIDE_WEBDRIVER = `Object.defineProperty(navigator, 'webdriver', { get: () => undefined });`;
const SCROLL_HALF_PAGE = 'window.scrollBy(0, document.body.scrollHeight / 2)';

/**
 * Headless Chromium page loader for sites that refuse plain HTTP clients.
 */
export class PlaywrightFetcher implements BrowserFetcher {
  constructor(private headless = true) {}

  available(): boolean {
    try {
      return existsSync(chromium.executablePath());
    } catch {
      return false;
    }
  }

  async fetchPage(url: string, options: BrowserFetchOptions): Promise<FetchedPage> {
    const target = url.split('#')[0];
    const browser = await chromium.launch({
      headless: this.headless,
      args: ['--disable-blink-features=AutomationControlled', '--no-sandbox'],
    });

    try {
      const contextOptions: BrowserContextOptions = {
        viewport: { width: 1366, height: 768 },
        javaScriptEnabled: true,
        timezoneId: 'Africa/Nairobi',
        locale: 'en-US',
      };
      if (options.proxy) contextOptions.proxy = { server: options.proxy };
      if (options.userAgent) contextOptions.userAgent = options.userAgent;

      const context = await browser.newContext(contextOptions);
      await context.addInitScript(HIDE_WEBDRIVER);

      const cookies = cookieItemsForBrowser(options.cookies, target);
      if (cookies.length > 0) await context.addCookies(cookies);

      const page = await context.newPage();
      await page.route('**/*', (route) =>
        BLOCKED_RESOURCES.has(route.request().resourceType()) ? route.abort() : route.continue(),
      );

      if (options.referer) {
        await page.setExtraHTTPHeaders({ Referer: options.referer, 'Accept-Language': 'en-US,en;q=0.9' });
      }

      page.setDefaultTimeout(options.timeoutMs);
      const response = await page.goto(target, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
      await page.waitForTimeout(800);
      try {
        await page.evaluate(SCROLL_HALF_PAGE);
      } catch (err) {
        console.warn(`Scroll on ${target} failed: ${(err as Error).message}`);
      }
      await page.waitForTimeout(500);

      const text = await page.content();
      const finalUrl = page.url();
      await context.close();

      return {
        status: response?.status() ?? 200,
        ok: true,
        url: finalUrl,
        contentType: response?.headers()['content-type'] ?? 'text/html; charset=utf-8',
        text,
      };
    } finally {
      await browser.close();
    }
  }
}
