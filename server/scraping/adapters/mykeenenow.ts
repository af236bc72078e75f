import type { CalendarDate } from '../../../shared/types';
import { errorMessage } from '../../errors';
import { UNTITLED, collectArticles } from '../adapter';
import { findUsDate } from '../dates';
import { extractLinks, firstHeading, loadHtml, pageText, paragraphTexts } from '../html';
import { filterParagraphs, type ParagraphRules } from '../paragraphs';
import type { ExtractionOutcome, ScrapeContext, SiteAdapter } from '../types';

export const MYKEENENOW_BASE_URL = 'https://mykeenenow.com';
export const MYKEENENOW_LISTING_URL = `${MYKEENENOW_BASE_URL}/news/`;

export const MYKEENENOW_RULES: ParagraphRules = {
  skipAll: [['story ©', 'saga communications']],
};

export const discoverMyKeeneNowCandidates = (html: string): string[] =>
  extractLinks(loadHtml(html), {
    baseUrl: MYKEENENOW_BASE_URL,
    accept: (url) => url.includes('/news/'),
  });

/**
 * The site's URLs carry no date, so every candidate page is fetched and its visible text
 * scanned. At most `maxCandidates` pages are checked.
 */
export const filterCandidatesByPageDate = async (
  candidates: readonly string[],
  targetDate: CalendarDate,
  ctx: ScrapeContext,
): Promise<Map<string, string>> => {
  const matches = new Map<string, string>();
  const scanned = candidates.slice(0, ctx.config.scraping.maxCandidates);

  for (let i = 0; i < scanned.length; i += 1) {
    const url = scanned[i];
    ctx.logger.info(`Date check ${i + 1}/${scanned.length}`, { url });
    try {
      const html = await ctx.fetcher.text(url);
      if (findUsDate(pageText(loadHtml(html))) === targetDate) {
        matches.set(url, html);
      }
    } catch (error) {
      ctx.logger.warn('Failed to check date', { url, error: errorMessage(error) });
    }
    if (i < scanned.length - 1) {
      await ctx.delay(ctx.config.scraping.requestDelayMs);
    }
  }

  return matches;
};

export const extractMyKeeneNowArticle = (html: string, url: string, fallbackDate: CalendarDate): ExtractionOutcome => {
  const $ = loadHtml(html);
  const title = firstHeading($) ?? UNTITLED;
  const publishedDate = findUsDate(pageText($)) ?? fallbackDate;
  const body = filterParagraphs(paragraphTexts($), MYKEENENOW_RULES);
  if (body.kind === 'rejected') {
    return body;
  }
  return {
    kind: 'article',
    article: { url, title, publishedDate, paragraphs: body.paragraphs },
  };
};

export const myKeeneNowAdapter: SiteAdapter = {
  slug: 'mykeenenow',
  name: 'My Keene Now',
  scrape: async (targetDate, ctx) => {
    ctx.logger.info('Fetching URLs for date (slow scan)', { url: MYKEENENOW_LISTING_URL, targetDate });
    const listing = await ctx.fetcher.text(MYKEENENOW_LISTING_URL);
    const candidates = discoverMyKeeneNowCandidates(listing);
    const pages = await filterCandidatesByPageDate(candidates, targetDate, ctx);
    ctx.logger.info('Found matching URLs', { count: pages.size, scanned: Math.min(candidates.length, ctx.config.scraping.maxCandidates) });

    // Pages fetched during the date scan are reused, so no request is made here.
    return collectArticles(
      [...pages.keys()],
      targetDate,
      ctx,
      async (url) => extractMyKeeneNowArticle(pages.get(url) ?? '', url, targetDate),
      { label: 'Scraping', politeDelay: false },
    );
  },
};
