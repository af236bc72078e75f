import type { SiteSlug } from './config';

/** ISO `YYYY-MM-DD`. Validated with `isCalendarDate` at every boundary. */
export type CalendarDate = string;

export interface Article {
  url: string;
  title: string;
  publishedDate: CalendarDate;
  paragraphs: string[];
}

export interface ArticleFileMetadata {
  title: string | null;
  site: string | null;
  published: string | null;
  url: string | null;
}

export interface ParsedArticleFile extends ArticleFileMetadata {
  body: string;
}

export interface SavedArticle {
  site: SiteSlug;
  title: string;
  url: string;
  path: string;
}

export interface SiteWriteResult {
  manifestPath: string | null;
  files: SavedArticle[];
  failures: Array<{ title: string; error: string }>;
}

export type SiteRunStatus = 'ok' | 'failed';

export interface SiteRunReport {
  site: SiteSlug;
  status: SiteRunStatus;
  articleCount: number;
  files: string[];
  error?: string;
  elapsedMs: number;
}

export interface ScrapeRunReport {
  targetDate: CalendarDate;
  startedAt: string;
  finishedAt: string;
  sites: SiteRunReport[];
  swept: string[];
}

export type ReviewState = 'original' | 'rewritten' | 'published';

export interface ArchiveEntry {
  site: SiteSlug;
  date: CalendarDate;
  filename: string;
  title: string;
  url: string | null;
  originalPath: string;
  state: ReviewState;
  currentPath: string;
}

/** A merged rewrite is never in the `original` state: it only exists once the model has written it. */
export interface MergedEntry {
  site: SiteSlug;
  date: CalendarDate;
  filename: string;
  state: Exclude<ReviewState, 'original'>;
  currentPath: string;
}
