import type { AppConfig, SiteSlug } from '../../shared/config';
import type { Article, CalendarDate } from '../../shared/types';
import type { Fetcher } from '../http/fetcher';
import type { Logger } from '../obs/logger';

export interface ScrapeContext {
  config: AppConfig;
  logger: Logger;
  fetcher: Fetcher;
  /** Politeness pause between requests to the same site */
  delay: (ms: number) => Promise<void>;
}

export interface SiteAdapter {
  slug: SiteSlug;
  name: string;
  /**
   * Articles published on `targetDate`. Per-article failures are logged and skipped;
   * only site-wide failures (e.g. an unreachable listing page) reject.
   */
  scrape: (targetDate: CalendarDate, ctx: ScrapeContext) => Promise<Article[]>;
}

export type ExtractionOutcome =
  | { kind: 'article'; article: Article }
  | { kind: 'rejected'; reason: string }
  | { kind: 'unusable'; reason: string };
