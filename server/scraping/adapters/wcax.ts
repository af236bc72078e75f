import type { CalendarDate } from '../../../shared/types';
import { UNTITLED, collectArticles } from '../adapter';
import { dateFromUrlPath } from '../dates';
import { extractLinks, extractMetaProperty, firstHeading, loadHtml, normalizeWhitespace, paragraphTexts, type CheerioAPI } from '../html';
import { filterParagraphs, type ParagraphRules } from '../paragraphs';
import type { ExtractionOutcome, SiteAdapter } from '../types';

export const WCAX_BASE_URL = 'https://www.wcax.com';
export const WCAX_LISTING_URL = `${WCAX_BASE_URL}/news/`;

export const LOCAL_CATEGORIES = [
  'vermont',
  'new hampshire',
  'local',
  'vt',
  'nh',
  'news',
  'crime',
  'education',
  'health',
  'politics',
  'business',
];

const EXCLUDED_TITLE_PHRASES = ['programming note', 'this day in history', 'history'];

export const WCAX_RULES: ParagraphRules = {
  skipAll: [['copyright', 'wcax']],
};

export const extractCategory = ($: CheerioAPI): string => {
  const section = extractMetaProperty($, 'article:section');
  if (section) return section;
  return normalizeWhitespace($('a[class*="category" i]').first().text());
};

export const discoverWcaxUrls = (html: string, targetDate: CalendarDate, maxCandidates: number): string[] =>
  extractLinks(loadHtml(html), {
    baseUrl: WCAX_BASE_URL,
    accept: (url) => dateFromUrlPath(url) === targetDate,
    max: maxCandidates,
  });

export const extractWcaxArticle = (html: string, url: string, fallbackDate: CalendarDate): ExtractionOutcome => {
  const $ = loadHtml(html);
  const title = firstHeading($) ?? UNTITLED;

  const excluded = EXCLUDED_TITLE_PHRASES.find((phrase) => title.toLowerCase().includes(phrase));
  if (excluded) {
    return { kind: 'rejected', reason: `excluded title "${title}"` };
  }

  // Pages without any category metadata are kept.
  const category = extractCategory($).toLowerCase();
  if (category && !LOCAL_CATEGORIES.some((local) => category.includes(local))) {
    return { kind: 'rejected', reason: `category "${category}" is not in the allow list` };
  }

  const publishedDate = dateFromUrlPath(url) ?? fallbackDate;
  const body = filterParagraphs(paragraphTexts($), WCAX_RULES);
  if (body.kind === 'rejected') {
    return body;
  }

  return {
    kind: 'article',
    article: { url, title, publishedDate, paragraphs: body.paragraphs },
  };
};

export const wcaxAdapter: SiteAdapter = {
  slug: 'wcax',
  name: 'WCAX',
  scrape: async (targetDate, ctx) => {
    ctx.logger.info('Fetching URLs for date', { url: WCAX_LISTING_URL, targetDate });
    const listing = await ctx.fetcher.text(WCAX_LISTING_URL);
    const urls = discoverWcaxUrls(listing, targetDate, ctx.config.scraping.maxCandidates);
    ctx.logger.info('Found matching URLs', { count: urls.length });

    return collectArticles(
      urls,
      targetDate,
      ctx,
      async (url) => extractWcaxArticle(await ctx.fetcher.text(url), url, targetDate),
      { label: 'Scraping' },
    );
  },
};
