export { ScrapeClient, ScrapeApiError } from './scrape-client.js';
export type { ScrapeClientConfig, ScrapeParams, ScrapeData, HealthResult, FetchFn } from './scrape-client.js';
