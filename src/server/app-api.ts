import { Hono } from 'hono';
import { z } from 'zod';
import type { ScrapeService } from '../scraper/service.js';
import { ScrapeError, parseDelay, type ScrapeErrorCode } from '../scraper/service.js';
import type { LinkStore } from './link-store.js';

interface AppApiDeps {
  service: ScrapeService;
  links: LinkStore;
  maxDelaySeconds: number;
}

const optionalText = z.string().trim().optional();

export const scrapeBodySchema = z.object({
  url: z.string().trim().min(1, 'url is required'),
  selector: optionalText,
  delay: z.union([z.number(), z.string()]).optional(),
  userAgent: optionalText,
  referer: optionalText,
  proxy: optionalText,
  cookies: optionalText,
  primeCookies: z.boolean().optional(),
  aggressive: z.boolean().optional(),
  useBrowser: z.boolean().optional(),
});

export type ScrapeBody = z.infer<typeof scrapeBodySchema>;

type ErrorStatus = 400 | 500 | 502;

const STATUS_BY_CODE: Record<ScrapeErrorCode, ErrorStatus> = {
  INVALID_URL: 400,
  INVALID_SELECTOR: 400,
  BLOCKED: 502,
  NETWORK_ERROR: 502,
};

function errorBody(code: string, message: string) {
  return { ok: false as const, error: { code, message } };
}

export function createAppApi(deps: AppApiDeps): Hono {
  const app = new Hono();

  // POST /scrape
  app.post('/scrape', async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json(errorBody('BAD_REQUEST', 'Request body must be a JSON object'), 400);
    }

    const parsed = scrapeBodySchema.safeParse(raw);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      return c.json(errorBody('BAD_REQUEST', message), 400);
    }

    const body = parsed.data;
    try {
      const result = await deps.service.scrape({
        url: body.url,
        selector: body.selector,
        delay: body.delay === undefined ? undefined : parseDelay(body.delay, deps.maxDelaySeconds),
        userAgent: body.userAgent || undefined,
        referer: body.referer || undefined,
        proxy: body.proxy || undefined,
        cookies: body.cookies || undefined,
        primeCookies: body.primeCookies,
        aggressive: body.aggressive,
        useBrowser: body.useBrowser,
      });
      const scrapeId = deps.links.save(result.links);
      return c.json({ ok: true, data: { ...result, scrapeId } });
    } catch (err) {
      if (err instanceof ScrapeError) {
        return c.json(errorBody(err.code, err.message), STATUS_BY_CODE[err.code]);
      }
      console.error('Unexpected scrape failure:', err);
      return c.json(errorBody('INTERNAL', (err as Error).message), 500);
    }
  });

  return app;
}
