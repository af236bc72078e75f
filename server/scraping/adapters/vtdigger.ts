import type { CalendarDate } from '../../../shared/types';
import { UNTITLED, collectArticles } from '../adapter';
import { dateFromUrlPath, findUsDate } from '../dates';
import { extractLinks, firstHeading, loadHtml, pageText, paragraphTexts } from '../html';
import { filterParagraphs, type ParagraphRules } from '../paragraphs';
import type { ExtractionOutcome, SiteAdapter } from '../types';

export const VTDIGGER_BASE_URL = 'https://vtdigger.org';

const PLACEHOLDER_TITLES = ['vtdigger', 'vtdiggers'];
const PROMOTIONAL_TITLE_PHRASES = ['vtdigger announces', 'giving tuesday'];

export const VTDIGGER_RULES: ParagraphRules = {
  firstParagraph: {
    reject: ['commentaries are opinion pieces contributed by readers and newsmakers'],
    rejectPrefixes: ['Born'],
  },
  rejectArticle: ['young writers project', 'giving tuesday'],
  hardStop: ['have something to say? submit a commentary here', "vermont's newsletter", 'request a correction'],
  skipExact: ['vtdigger', 'news in pursuit of truth'],
  skip: ['reader donations'],
};

/** Home-page links whose `/YYYY/MM/DD/` path matches the target date. */
export const discoverVtdiggerUrls = (html: string, targetDate: CalendarDate, maxCandidates: number): string[] =>
  extractLinks(loadHtml(html), {
    baseUrl: VTDIGGER_BASE_URL,
    accept: (url) => dateFromUrlPath(url) === targetDate,
    max: maxCandidates,
  });

export const extractVtdiggerArticle = (html: string, url: string, fallbackDate: CalendarDate): ExtractionOutcome => {
  const $ = loadHtml(html);
  const title = firstHeading($) ?? UNTITLED;

  const lowered = title.toLowerCase().trim();
  if (PLACEHOLDER_TITLES.includes(lowered)) {
    return { kind: 'rejected', reason: `placeholder title "${title}"` };
  }
  const promo = PROMOTIONAL_TITLE_PHRASES.find((phrase) => lowered.includes(phrase));
  if (promo) {
    return { kind: 'rejected', reason: `promotional title "${title}"` };
  }

  const publishedDate = dateFromUrlPath(url) ?? findUsDate(pageText($)) ?? fallbackDate;
  const body = filterParagraphs(paragraphTexts($), VTDIGGER_RULES);
  if (body.kind === 'rejected') {
    return body;
  }

  return {
    kind: 'article',
    article: { url, title, publishedDate, paragraphs: body.paragraphs },
  };
};

export const vtdiggerAdapter: SiteAdapter = {
  slug: 'vtdigger',
  name: 'VTDigger',
  scrape: async (targetDate, ctx) => {
    ctx.logger.info('Fetching URLs for date', { url: VTDIGGER_BASE_URL, targetDate });
    const listing = await ctx.fetcher.text(VTDIGGER_BASE_URL);
    const urls = discoverVtdiggerUrls(listing, targetDate, ctx.config.scraping.maxCandidates);
    ctx.logger.info('Found matching URLs', { count: urls.length });

    return collectArticles(
      urls,
      targetDate,
      ctx,
      async (url) => extractVtdiggerArticle(await ctx.fetcher.text(url), url, targetDate),
      { label: 'Scraping' },
    );
  },
};
