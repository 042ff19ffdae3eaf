/**
 * Thin HTTP client for the scraping service JSON API.
 */

export interface ScrapeParams {
  url: string;
  selector?: string;
  /** Seconds to wait before the first request. */
  delay?: number;
  userAgent?: string;
  referer?: string;
  proxy?: string;
  /** `k=v; k2=v2` */
  cookies?: string;
  primeCookies?: boolean;
  aggressive?: boolean;
  useBrowser?: boolean;
}

export interface ScrapeData {
  finalUrl: string;
  statusCode: number;
  contentType: string;
  title: string;
  metaDescription: string;
  headings: Array<{ tag: 'H1' | 'H2' | 'H3'; text: string }>;
  links: Array<{ href: string; text: string; sameHost: boolean }>;
  images: Array<{ src: string; alt: string }>;
  selector: string;
  selectorMatches: string[] | null;
  methodUsed: 'http' | 'http/aggressive' | 'browser';
  fallbackError: string | null;
  /** Id for the links CSV download. */
  scrapeId: string;
}

export interface HealthResult {
  ok: boolean;
  version: string;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ScrapeClientConfig {
  baseUrl: string;
  fetch?: FetchFn;
}

interface ErrorEnvelope {
  ok: false;
  error: { code: string; message: string };
}

interface DataEnvelope {
  ok: true;
  data: ScrapeData;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  return (
    isObject(value) &&
    value.ok === false &&
    isObject(value.error) &&
    typeof value.error.code === 'string' &&
    typeof value.error.message === 'string'
  );
}

function isDataEnvelope(value: unknown): value is DataEnvelope {
  return isObject(value) && value.ok === true && isObject(value.data);
}

function isHealth(value: unknown): value is HealthResult {
  return isObject(value) && typeof value.ok === 'boolean' && typeof value.version === 'string';
}

export class ScrapeClient {
  private baseUrl: string;
  private fetchImpl: FetchFn;

  constructor(config: ScrapeClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Scrape one page. Failures reported by the service (invalid URL, block,
   * network error) are thrown as ScrapeApiError with the service's code.
   */
  async scrape(params: ScrapeParams): Promise<ScrapeData> {
    const res = await this.fetchImpl(`${this.baseUrl}/api/scrape`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(params),
    });

    const text = await res.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new ScrapeApiError('scrape', res.status, 'INVALID_RESPONSE', text);
    }

    if (isErrorEnvelope(body)) {
      throw new ScrapeApiError('scrape', res.status, body.error.code, body.error.message);
    }
    if (!res.ok || !isDataEnvelope(body)) {
      throw new ScrapeApiError('scrape', res.status, 'INVALID_RESPONSE', text);
    }
    return body.data;
  }

  async health(): Promise<HealthResult> {
    const res = await this.fetchImpl(`${this.baseUrl}/health`);
    const body: unknown = await res.json();
    if (!res.ok || !isHealth(body)) {
      throw new ScrapeApiError('health', res.status, 'UNHEALTHY', JSON.stringify(body));
    }
    return body;
  }

  /**
   * The links of an earlier scrape as CSV. The service only keeps recent
   * scrapes; an expired id answers with a redirect.
   */
  async linksCsv(scrapeId: string): Promise<string> {
    const res = await this.fetchImpl(`${this.baseUrl}/download-links.csv?id=${encodeURIComponent(scrapeId)}`, {
      redirect: 'manual',
    });
    if (res.status !== 200) {
      throw new ScrapeApiError('download-links.csv', res.status, 'NOT_FOUND', `No links stored for scrape "${scrapeId}"`);
    }
    return res.text();
  }
}

export class ScrapeApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly detail: string,
  ) {
    super(`Scrape API error on ${endpoint}: ${statusCode} ${code} - ${detail}`);
    this.name = 'ScrapeApiError';
  }
}
