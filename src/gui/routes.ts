import { Hono } from 'hono';
import type { ScrapeService } from '../scraper/service.js';
import { ScrapeError, parseDelay } from '../scraper/service.js';
import { linksToCsv } from '../scraper/csv.js';
import { normalizeUrl } from '../scraper/url.js';
import type { LinkStore } from '../server/link-store.js';
import { EMPTY_FORM, renderPage, type FormState } from './page.js';

interface GuiDeps {
  service: ScrapeService;
  links: LinkStore;
  maxDelaySeconds: number;
}

type FormBody = Record<string, string | File>;

function field(body: FormBody, name: string): string {
  const value = body[name];
  return typeof value === 'string' ? value.trim() : '';
}

function formFromBody(body: FormBody, maxDelaySeconds: number): FormState {
  return {
    url: field(body, 'url'),
    selector: field(body, 'selector'),
    delay: parseDelay(field(body, 'delay'), maxDelaySeconds),
    userAgent: field(body, 'user_agent'),
    referer: field(body, 'referer'),
    proxy: field(body, 'proxy'),
    cookies: field(body, 'cookies'),
    primeCookies: field(body, 'prime_cookies') === '1',
    aggressive: field(body, 'aggressive') === '1',
    useBrowser: field(body, 'use_browser') === '1',
  };
}

export function createGuiRoutes(deps: GuiDeps): Hono {
  const app = new Hono();

  app.get('/', (c) => {
    return c.html(renderPage({ form: EMPTY_FORM, browserAvailable: deps.service.browserAvailable() }));
  });

  app.post('/scrape', async (c) => {
    const form = formFromBody(await c.req.parseBody(), deps.maxDelaySeconds);
    const browserAvailable = deps.service.browserAvailable();

    try {
      const result = await deps.service.scrape({
        url: form.url,
        selector: form.selector,
        delay: form.delay,
        userAgent: form.userAgent || undefined,
        referer: form.referer || undefined,
        proxy: form.proxy || undefined,
        cookies: form.cookies || undefined,
        primeCookies: form.primeCookies,
        aggressive: form.aggressive,
        useBrowser: form.useBrowser,
      });
      const linksId = deps.links.save(result.links);
      return c.html(renderPage({ form: { ...form, url: normalizeUrl(form.url) }, browserAvailable, result, linksId }));
    } catch (err) {
      if (err instanceof ScrapeError) {
        const shown = err.code === 'INVALID_URL' ? form : { ...form, url: normalizeUrl(form.url) };
        return c.html(renderPage({ form: shown, browserAvailable, error: err.message }));
      }
      console.error('Unexpected scrape failure:', err);
      return c.html(renderPage({ form, browserAvailable, error: `Unexpected error: ${(err as Error).message}` }));
    }
  });

  app.get('/download-links.csv', (c) => {
    const links = deps.links.get(c.req.query('id') ?? '');
    if (!links || links.length === 0) {
      return c.redirect('/');
    }
    return c.body(linksToCsv(links), 200, {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': 'attachment; filename="links.csv"',
    });
  });

  return app;
}
