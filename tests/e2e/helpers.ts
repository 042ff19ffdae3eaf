import { join } from 'node:path';
import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import type { AddressInfo } from 'node:net';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { runtimeConfigSchema, type RuntimeConfig } from '../../src/config/schema.js';
import { HttpFetcher } from '../../src/scraper/http.js';
import type { BrowserFetcher } from '../../src/scraper/browser.js';
import { ScrapeService } from '../../src/scraper/service.js';
import { createServer } from '../../src/server/server.js';

export function makeTmpDir(): string {
  const dir = join(tmpdir(), `srt-e2e-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Serve a Hono app on an ephemeral loopback port. */
export function listen(app: Hono): Promise<RunningServer> {
  return new Promise((resolvePromise) => {
    const server = serve({ fetch: app.fetch, hostname: '127.0.0.1', port: 0 }, (info: AddressInfo) => {
      resolvePromise({
        baseUrl: `http://127.0.0.1:${info.port}`,
        close: () =>
          new Promise<void>((resolveClose, reject) => {
            server.close((err) => (err ? reject(err) : resolveClose()));
          }),
      });
    });
  });
}

export const CATALOGUE_HTML = `<!doctype html>
<html><head><title>Fixture Shop</title><meta name="description" content="A shop for tests"></head>
<body>
  <h1>Catalogue</h1>
  <h2>Tools</h2>
  <ul>
    <li class="item"><a href="/items/1">Hammer</a> <span class="price">$12</span></li>
    <li class="item"><a href="/items/2">Saw</a> <span class="price">$30</span></li>
  </ul>
  <a href="https://elsewhere.example.org/">Partner</a>
  <img src="/img/hammer.png" alt="Hammer photo">
</body></html>`;

/**
 * A small website with the behaviours the scraper has to cope with:
 * cookie walls, referer checks, transient errors and hard blocks.
 */
export function createFixtureSite(): Hono {
  const app = new Hono();
  let flakyCalls = 0;

  app.get('/', (c) => {
    c.header('Set-Cookie', 'sid=fixture-session; Path=/; HttpOnly');
    return c.html('<html><head><title>Home</title></head><body>welcome</body></html>');
  });

  app.get('/catalogue', (c) => c.html(CATALOGUE_HTML));

  app.get('/members', (c) => {
    if (!(c.req.header('Cookie') ?? '').includes('sid=fixture-session')) {
      return c.text('Forbidden', 403);
    }
    return c.html('<html><head><title>Members</title></head><body><h1>Members only</h1></body></html>');
  });

  app.get('/no-referer', (c) => {
    if (c.req.header('Referer')) return c.text('Forbidden', 403);
    return c.html('<html><head><title>Direct visitors</title></head><body><h1>Hello</h1></body></html>');
  });

  app.get('/flaky', (c) => {
    flakyCalls++;
    if (flakyCalls === 1) return c.text('Service Unavailable', 503);
    return c.html('<html><head><title>Recovered</title></head><body>ok</body></html>');
  });

  app.get('/wall', (c) => c.text('Access denied', 403));

  return app;
}

export const noBrowser: BrowserFetcher = {
  available: () => false,
  fetchPage: () => Promise.reject(new Error('no browser in tests')),
};

export function testConfig(): RuntimeConfig {
  return runtimeConfigSchema.parse({ scraper: { retries: 1, backoff_ms: 0, timeout_ms: 5000 } });
}

/** The scraping service wired to real HTTP, with pauses removed. */
export function createTestService(config: RuntimeConfig): ScrapeService {
  return new ScrapeService({
    http: new HttpFetcher({ config: config.scraper, sleep: async () => undefined }),
    browser: noBrowser,
    config: config.scraper,
  });
}

export async function startScrapeServer(config: RuntimeConfig = testConfig()): Promise<RunningServer> {
  return listen(createServer({ service: createTestService(config), config }));
}
