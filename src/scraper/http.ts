import { fetch as undiciFetch, ProxyAgent, type Dispatcher } from 'undici';
import type { ScraperConfig } from '../config/schema.js';
import { isBlockStatus, looksBlocked } from './blocked.js';
import {
  ALTERNATE_PROFILES,
  REFERER_STRATEGIES,
  ROTATION_USER_AGENTS,
  makeHeaders,
  parseCookies,
  pick,
  profileHeaders,
  sample,
  siteHintFor,
  type Random,
} from './headers.js';
import type { FetchedPage } from './types.js';

export interface HttpResponseLike {
  status: number;
  url: string;
  headers: {
    get(name: string): string | null;
    getSetCookie(): string[];
  };
  text(): Promise<string>;
}

export interface FetchInit {
  headers: Record<string, string>;
  redirect: 'follow';
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

export interface HttpFetchOptions {
  userAgent?: string;
  delaySeconds?: number;
  referer?: string;
  primeCookies?: boolean;
  proxy?: string;
  cookies?: string;
  aggressive?: boolean;
}

export interface PageFetcher {
  fetchPage(url: string, options?: HttpFetchOptions): Promise<FetchedPage>;
}

export interface HttpFetcherDeps {
  config: Pick<ScraperConfig, 'timeout_ms' | 'retries' | 'backoff_ms' | 'max_delay_seconds'>;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  random?: Random;
}

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);
const ROTATION_UA_LIMIT = 5;
const ROTATION_PAUSE_MS = 400;
const PRIME_PAUSE_MS = 300;

const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Plain HTTP page fetcher that behaves like a browser navigation and
 * works around 401/403/429 answers by rotating user agents and referers.
 */
export class HttpFetcher implements PageFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: Random;

  constructor(private deps: HttpFetcherDeps) {
    this.fetchImpl = deps.fetch ?? defaultFetch;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  async fetchPage(url: string, options: HttpFetchOptions = {}): Promise<FetchedPage> {
    const delay = Math.min(this.deps.config.max_delay_seconds, Math.max(0, options.delaySeconds ?? 0));
    if (delay > 0) await this.sleep(delay * 1000);

    const dispatcher = options.proxy ? new ProxyAgent(options.proxy) : undefined;
    try {
      return await this.navigate(new Session(this.fetchImpl, dispatcher), url, options);
    } finally {
      await dispatcher?.close();
    }
  }

  private async navigate(session: Session, url: string, options: HttpFetchOptions): Promise<FetchedPage> {
    const origin = new URL(url).origin;
    const cookies = parseCookies(options.cookies);
    const userAgent = () => options.userAgent || pick(ROTATION_USER_AGENTS, this.random);

    if (options.primeCookies) {
      try {
        await this.get(session, origin, makeHeaders(userAgent(), origin, 'same-origin', cookies, this.random));
        await this.sleep(PRIME_PAUSE_MS);
      } catch (err) {
        console.warn(`Cookie priming for ${origin} failed: ${(err as Error).message}`);
      }
    }

    const siteHint = siteHintFor(options.referer, url);
    const first = await this.get(
      session,
      url,
      makeHeaders(userAgent(), options.referer || origin, siteHint, cookies, this.random),
    );
    if (!isBlockStatus(first.status)) return first;

    for (const ua of sample(ROTATION_USER_AGENTS, Math.min(ROTATION_USER_AGENTS.length, ROTATION_UA_LIMIT), this.random)) {
      for (const strategy of REFERER_STRATEGIES) {
        const headers =
          strategy === '{origin}'
            ? makeHeaders(ua, origin, 'same-origin', cookies, this.random)
            : strategy
              ? makeHeaders(ua, strategy, 'cross-site', cookies, this.random)
              : makeHeaders(ua, '', 'none', cookies, this.random);

        await this.sleep(ROTATION_PAUSE_MS);
        const page = await this.get(session, url, headers);
        if (!isBlockStatus(page.status) && page.ok && !looksBlocked(page.text, page.status)) {
          return page;
        }
      }
    }

    if (!options.aggressive) return first;

    for (const profile of ALTERNATE_PROFILES) {
      const page = await this.get(session, url, profileHeaders(profile, options.referer || origin, siteHint, cookies));
      if (page.status >= 200 && page.status < 400) return page;
    }

    return first;
  }

  /**
   * One GET with retries on 429/5xx answers and on network errors,
   * backing off exponentially. The last answer is returned even when it
   * is still an error status.
   */
  private async get(session: Session, url: string, headers: Record<string, string>): Promise<FetchedPage> {
    const { retries, backoff_ms: backoffMs, timeout_ms: timeoutMs } = this.deps.config;

    for (let attempt = 0; ; attempt++) {
      let page: FetchedPage;
      try {
        page = await session.get(url, headers, timeoutMs);
      } catch (err) {
        if (attempt >= retries) throw err;
        await this.sleep(backoffMs * 2 ** attempt);
        continue;
      }

      if (!RETRY_STATUSES.has(page.status) || attempt >= retries) return page;
      await this.sleep(backoffMs * 2 ** attempt);
    }
  }
}

/** Keeps cookies the server sets across the requests of one fetch. */
class Session {
  private readonly jar = new Map<string, string>();

  constructor(
    private fetchImpl: FetchLike,
    private dispatcher?: Dispatcher,
  ) {}

  async get(url: string, headers: Record<string, string>, timeoutMs: number): Promise<FetchedPage> {
    const response = await this.fetchImpl(url, {
      headers: this.withJar(headers),
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
      dispatcher: this.dispatcher,
    });

    for (const setCookie of response.headers.getSetCookie()) {
      const pair = setCookie.split(';')[0];
      const eq = pair.indexOf('=');
      if (eq > 0) this.jar.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }

    return {
      status: response.status,
      ok: response.status < 400,
      url: response.url || url,
      contentType: response.headers.get('content-type') ?? '',
      text: await response.text(),
    };
  }

  /** Cookies given by the caller win over cookies the server set. */
  private withJar(headers: Record<string, string>): Record<string, string> {
    if (this.jar.size === 0) return headers;
    const fromJar = [...this.jar].map(([name, value]) => `${name}=${value}`);
    const given = headers.Cookie ? headers.Cookie.split('; ') : [];
    const givenNames = new Set(given.map((pair) => pair.split('=')[0]));
    const merged = [...fromJar.filter((pair) => !givenNames.has(pair.split('=')[0])), ...given];
    return { ...headers, Cookie: merged.join('; ') };
  }
}
