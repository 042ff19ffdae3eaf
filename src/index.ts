import { resolve } from 'node:path';
import { loadConfigOrDefaults } from './config/loader.js';
import { HttpFetcher } from './scraper/http.js';
import { PlaywrightFetcher } from './scraper/browser.js';
import { ScrapeService } from './scraper/service.js';
import { startServer } from './server/server.js';

const configPath = process.argv[2] ?? resolve('scraper.config.yaml');
const config = loadConfigOrDefaults(configPath);

const browser = new PlaywrightFetcher(config.scraper.headless);
const service = new ScrapeService({
  http: new HttpFetcher({ config: config.scraper }),
  browser,
  config: config.scraper,
});

if (!browser.available()) {
  console.warn('Chromium is not installed; blocked pages cannot fall back to the browser.');
  console.warn('Install it with: npx playwright-core install chromium');
}

const server = startServer({ service, config });

function shutdown(): void {
  server.close();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
