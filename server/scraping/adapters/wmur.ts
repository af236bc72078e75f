import type { CalendarDate } from '../../../shared/types';
import { UNTITLED, collectArticles } from '../adapter';
import { findUsDate } from '../dates';
import { extractLinks, extractTitle, loadHtml, pageText, paragraphTexts } from '../html';
import { filterParagraphs, type ParagraphRules } from '../paragraphs';
import type { ExtractionOutcome, SiteAdapter } from '../types';

export const WMUR_BASE_URL = 'https://www.wmur.com';
export const WMUR_LISTING_URL = `${WMUR_BASE_URL}/local-news`;

// Weather and recurring feature segments share the /article/ path with news.
const NON_NEWS_URL_KEYWORDS = ['grow-it-green', 'nh-chronicle', 'forecast', 'hour-by-hour'];

const PROMOTIONAL_TITLE_PHRASES = ['wmur', 'hearst television news'];

export const WMUR_RULES: ParagraphRules = {
  hardStop: ["subscribe to wmur's youtube channel", 'hearst television participates'],
  skipAll: [
    ['download the free wmur app', 'wmur'],
    ['get the wmur app', 'wmur'],
    ['copyright', 'wmur'],
  ],
};

export const cleanWmurTitle = (title: string): string =>
  title.replace(/\s*[-|]\s*WMUR.*$/i, '').trim();

export const discoverWmurUrls = (html: string, maxCandidates: number): string[] =>
  extractLinks(loadHtml(html), {
    baseUrl: WMUR_BASE_URL,
    startAfter: (tag, text) => (tag === 'h1' || tag === 'h2') && text.toLowerCase().includes('local news'),
    accept: (url) => {
      if (!url.includes('/article/')) return false;
      const lowered = url.toLowerCase();
      return !NON_NEWS_URL_KEYWORDS.some((keyword) => lowered.includes(keyword));
    },
    max: maxCandidates,
  });

export const extractWmurArticle = (html: string, url: string, fallbackDate: CalendarDate): ExtractionOutcome => {
  const $ = loadHtml(html);
  const title = cleanWmurTitle(extractTitle($) ?? UNTITLED) || UNTITLED;

  const lowered = title.toLowerCase();
  const promo = PROMOTIONAL_TITLE_PHRASES.find((phrase) => lowered.includes(phrase));
  if (promo) {
    return { kind: 'rejected', reason: `promotional title "${title}"` };
  }

  const publishedDate = findUsDate(pageText($)) ?? fallbackDate;
  const body = filterParagraphs(paragraphTexts($), WMUR_RULES);
  if (body.kind === 'rejected') {
    return body;
  }

  return {
    kind: 'article',
    article: { url, title, publishedDate, paragraphs: body.paragraphs },
  };
};

export const wmurAdapter: SiteAdapter = {
  slug: 'wmur',
  name: 'WMUR',
  scrape: async (targetDate, ctx) => {
    ctx.logger.info('Fetching candidate URLs', { url: WMUR_LISTING_URL });
    const listing = await ctx.fetcher.text(WMUR_LISTING_URL);
    const candidates = discoverWmurUrls(listing, ctx.config.scraping.maxCandidates);
    ctx.logger.info('Found candidates', { count: candidates.length });

    return collectArticles(
      candidates,
      targetDate,
      ctx,
      async (url) => extractWmurArticle(await ctx.fetcher.text(url), url, targetDate),
      { label: 'Checking' },
    );
  },
};
