import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { Heading, PageImage, PageLink } from './types.js';

export interface PageSummary {
  title: string;
  metaDescription: string;
  headings: Heading[];
  links: PageLink[];
  images: PageImage[];
}

const HEADING_TAGS = ['h1', 'h2', 'h3'] as const;
const MATCH_HTML_LIMIT = 500;

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function resolveHref(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Text of an element with a space between the text of adjacent child
 * elements, so `<p>a<b>b</b></p>` reads "a b".
 */
function spacedText<T extends AnyNode>($: CheerioAPI, selection: Cheerio<T>): string {
  const clone = selection.clone();
  clone.find('*').each((_, child) => {
    $(child).prepend(' ').append(' ');
  });
  return collapse(clone.text());
}

export function extractSummary(html: string, baseUrl: string): PageSummary {
  const $ = load(html);

  const title = $('title').first().text().trim();

  // The first tag present decides, even when its content is missing
  let meta = $('meta[name="description"]').first();
  if (meta.length === 0) meta = $('meta[property="og:description"]').first();
  const description = meta.attr('content') ?? '';

  const headings: Heading[] = [];
  for (const tag of HEADING_TAGS) {
    $(tag).each((_, el) => {
      const text = spacedText($, $(el));
      if (text) headings.push({ tag: tag === 'h1' ? 'H1' : tag === 'h2' ? 'H2' : 'H3', text });
    });
  }

  const baseHost = new URL(baseUrl).host;
  const links: PageLink[] = [];
  $('a[href]').each((_, el) => {
    const href = resolveHref($(el).attr('href') ?? '', baseUrl);
    if (href === null) return;
    links.push({ href, text: spacedText($, $(el)), sameHost: new URL(href).host === baseHost });
  });

  const images: PageImage[] = [];
  $('img[src]').each((_, el) => {
    const src = resolveHref($(el).attr('src') ?? '', baseUrl);
    if (src === null) return;
    images.push({ src, alt: ($(el).attr('alt') ?? '').trim() });
  });

  return { title, metaDescription: description.trim(), headings, links, images };
}

/**
 * Text of every element matching `selector`; an element without text is
 * reported as its (whitespace-collapsed, truncated) HTML instead.
 * Throws on an invalid selector.
 */
export function selectMatches(html: string, selector: string): string[] {
  const $ = load(html);
  const matches: string[] = [];

  $(selector).each((_, el) => {
    const text = spacedText($, $(el));
    matches.push(text || collapse($.html(el)).slice(0, MATCH_HTML_LIMIT));
  });

  return matches;
}
