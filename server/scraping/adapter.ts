import type { Article, CalendarDate } from '../../shared/types';
import { errorMessage } from '../errors';
import type { ExtractionOutcome, ScrapeContext } from './types';

export const UNTITLED = 'Untitled';

/**
 * Final gate before an article leaves an adapter: exact target-date match and a non-empty body.
 */
export const finalizeOutcome = (outcome: ExtractionOutcome, targetDate: CalendarDate): ExtractionOutcome => {
  if (outcome.kind !== 'article') return outcome;
  const { article } = outcome;
  if (article.publishedDate !== targetDate) {
    return { kind: 'rejected', reason: `published ${article.publishedDate}, wanted ${targetDate}` };
  }
  if (article.paragraphs.length === 0) {
    return { kind: 'unusable', reason: 'no body paragraphs' };
  }
  return outcome;
};

export interface CollectOptions {
  /** Progress log prefix, e.g. `Scraping` */
  label: string;
  /** Wait `requestDelayMs` between URLs (default true); off when `extract` makes no request */
  politeDelay?: boolean;
}

/**
 * Fetches and extracts each URL in turn. A failure on one URL is logged and the loop moves on.
 */
export const collectArticles = async (
  urls: readonly string[],
  targetDate: CalendarDate,
  ctx: ScrapeContext,
  extract: (url: string) => Promise<ExtractionOutcome>,
  options: CollectOptions,
): Promise<Article[]> => {
  const articles: Article[] = [];
  const total = urls.length;

  for (let i = 0; i < total; i += 1) {
    const url = urls[i];
    ctx.logger.info(`${options.label} ${i + 1}/${total}`, { url });
    try {
      const outcome = finalizeOutcome(await extract(url), targetDate);
      if (outcome.kind === 'article') {
        articles.push(outcome.article);
      } else if (outcome.kind === 'rejected') {
        ctx.logger.info('Article skipped', { url, reason: outcome.reason });
      } else {
        ctx.logger.debug('Article unusable', { url, reason: outcome.reason });
      }
    } catch (error) {
      ctx.logger.error('Failed to scrape article', { url, error: errorMessage(error) });
    }
    if (options.politeDelay !== false && i < total - 1) {
      await ctx.delay(ctx.config.scraping.requestDelayMs);
    }
  }

  return articles;
};
