export interface FetchedPage {
  status: number;
  /** Status below 400. */
  ok: boolean;
  /** URL after redirects. */
  url: string;
  contentType: string;
  text: string;
}

export interface ScrapeRequest {
  url: string;
  selector?: string;
  /** Polite delay before the first request, in seconds. */
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

export interface Heading {
  tag: 'H1' | 'H2' | 'H3';
  text: string;
}

export interface PageLink {
  href: string;
  text: string;
  sameHost: boolean;
}

export interface PageImage {
  src: string;
  alt: string;
}

export type FetchMethod = 'http' | 'http/aggressive' | 'browser';

export interface ScrapeResult {
  finalUrl: string;
  statusCode: number;
  contentType: string;
  title: string;
  metaDescription: string;
  headings: Heading[];
  links: PageLink[];
  images: PageImage[];
  selector: string;
  /** null when no selector was given. */
  selectorMatches: string[] | null;
  methodUsed: FetchMethod;
  fallbackError: string | null;
}
