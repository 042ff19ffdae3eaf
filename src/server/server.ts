import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import type { RuntimeConfig } from '../config/schema.js';
import type { ScrapeService } from '../scraper/service.js';
import { createAppApi } from './app-api.js';
import { createGuiRoutes } from '../gui/routes.js';
import { LinkStore } from './link-store.js';

export const VERSION = '0.1.0';

export interface ServerDeps {
  service: ScrapeService;
  config: RuntimeConfig;
  links?: LinkStore;
}

export function createServer(deps: ServerDeps): Hono {
  const app = new Hono();
  const links = deps.links ?? new LinkStore(deps.config.scraper.history_size);
  const maxDelaySeconds = deps.config.scraper.max_delay_seconds;

  // Health check
  app.get('/health', (c) => c.json({ ok: true, version: VERSION }));

  // Mount JSON API
  app.route('/api', createAppApi({ service: deps.service, links, maxDelaySeconds }));

  // Mount GUI routes (last, owns '/')
  app.route('/', createGuiRoutes({ service: deps.service, links, maxDelaySeconds }));

  return app;
}

export function startServer(deps: ServerDeps): ServerType {
  const app = createServer(deps);
  const { host, port } = deps.config;

  return serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    console.log(`scrape-runtime v${VERSION} listening on http://${host}:${info.port}`);
  });
}
