import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';

export type { CheerioAPI };

export const loadHtml = (html: string): CheerioAPI => cheerio.load(html);

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/**
 * Text of a selection with a space between neighbouring elements, so
 * `<span>Posted</span><span>May 31, 2025</span>` reads as two words. `<br>` counts as a space.
 */
export const spacedText = <T extends AnyNode>($: CheerioAPI, selection: Cheerio<T>): string => {
  const copy = selection.clone();
  copy.find('script, style, noscript, template').remove();
  copy.find('br').replaceWith(' ');
  copy.find('*').each((_, el) => {
    $(el).prepend(' ').append(' ');
  });
  return normalizeWhitespace(copy.text());
};

/** Visible page text, whitespace-collapsed, used for free-text date scanning. */
export const pageText = ($: CheerioAPI): string => {
  const body = $('body');
  return body.length ? spacedText($, body) : spacedText($, $.root());
};

const metaContent = ($: CheerioAPI, selector: string): string | null => {
  const value = $(selector).first().attr('content');
  const trimmed = value ? normalizeWhitespace(value) : '';
  return trimmed || null;
};

export const firstHeading = ($: CheerioAPI): string | null => {
  const text = normalizeWhitespace($('h1').first().text());
  return text || null;
};

/** og:title, then twitter:title, then the first `<h1>`. */
export const extractTitle = ($: CheerioAPI): string | null =>
  metaContent($, 'meta[property="og:title"]') ?? metaContent($, 'meta[name="twitter:title"]') ?? firstHeading($);

export const extractMetaProperty = ($: CheerioAPI, property: string): string | null =>
  metaContent($, `meta[property="${property}"]`);

export interface LinkDiscoveryOptions {
  baseUrl: string;
  /** Only anchors appearing after the first element matching this predicate are considered */
  startAfter?: (tagName: string, text: string) => boolean;
  accept?: (url: string) => boolean;
  max?: number;
}

const resolveSameOrigin = (href: string, base: URL): string | null => {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#') || /^(mailto|tel|javascript):/i.test(trimmed)) return null;
  try {
    const resolved = new URL(trimmed, base);
    if (resolved.origin !== base.origin) return null;
    resolved.hash = '';
    return resolved.toString();
  } catch {
    return null;
  }
};

/**
 * Anchor hrefs resolved to absolute same-origin URLs, de-duplicated in document order.
 */
export const extractLinks = ($: CheerioAPI, options: LinkDiscoveryOptions): string[] => {
  const base = new URL(options.baseUrl);
  let anchors = $('a[href]').toArray();

  if (options.startAfter) {
    const startAfter = options.startAfter;
    const all = $<Element, '*'>('*').toArray();
    const marker = all.find((el) => startAfter(el.tagName.toLowerCase(), normalizeWhitespace($(el).text())));
    if (marker) {
      const order = new Map(all.map((el, index) => [el, index] as const));
      const markerIndex = order.get(marker) ?? -1;
      anchors = anchors.filter((el) => (order.get(el) ?? -1) > markerIndex);
    }
  }

  const urls: string[] = [];
  const seen = new Set<string>();
  const max = options.max ?? Number.POSITIVE_INFINITY;
  for (const anchor of anchors) {
    const href = $(anchor).attr('href');
    if (!href) continue;
    const url = resolveSameOrigin(href, base);
    if (!url || seen.has(url)) continue;
    if (options.accept && !options.accept(url)) continue;
    seen.add(url);
    urls.push(url);
    if (urls.length >= max) break;
  }
  return urls;
};

/** Text of every `<p>`, whitespace-collapsed, empty blocks dropped. */
export const paragraphTexts = ($: CheerioAPI): string[] =>
  $('p')
    .toArray()
    .map((el) => spacedText($, $(el)).replace(/ ([,.;:!?])/g, '$1'))
    .filter(Boolean);

/** Body fields from the BLOX API arrive either as one HTML string or as a list of fragments. */
export const htmlFragmentsToParagraphs = (raw: string | readonly string[]): string[] => {
  const html = typeof raw === 'string' ? raw : raw.join('');
  if (!html.trim()) return [];
  return paragraphTexts(loadHtml(html));
};
