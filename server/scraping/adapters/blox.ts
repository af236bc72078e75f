import { z } from 'zod';
import type { AppConfig, SiteSlug } from '../../../shared/config';
import type { Article, CalendarDate } from '../../../shared/types';
import { UNTITLED, finalizeOutcome } from '../adapter';
import { dateFromIsoTimestamp } from '../dates';
import { htmlFragmentsToParagraphs, normalizeWhitespace } from '../html';
import { filterParagraphs, type ParagraphRules } from '../paragraphs';
import type { ExtractionOutcome, SiteAdapter } from '../types';

/**
 * Sites on the BLOX CMS expose `/search/?f=json`, which returns `{ rows: [...] }` newest first.
 */
export interface BloxSiteOptions {
  slug: SiteSlug;
  name: string;
  baseUrl: string;
  /** Referer sent with the XHR-style request */
  refererPath: string;
  category: string;
  limit: number;
  /** Keys tried, in order, when `starttime` is an object */
  timestampKeys: readonly string[];
  stopWords: readonly string[];
  cookie: (config: AppConfig) => string | undefined;
  /** When true a missing cookie skips the site instead of querying anonymously */
  requireCookie: boolean;
}

const SHORT_PARAGRAPH_LENGTH = 50;

const SearchResponseSchema = z.object({
  rows: z.array(z.unknown()).default([]),
});

const RowSchema = z
  .object({
    title: z.string().optional(),
    url: z.string().optional(),
    starttime: z.unknown().optional(),
    content: z.unknown().optional(),
    body: z.unknown().optional(),
  })
  .passthrough();

export type BloxRow = z.infer<typeof RowSchema>;

export type BloxTimestamp =
  | { kind: 'string'; value: string }
  | { kind: 'object'; value: string | null }
  | { kind: 'missing' };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const classifyTimestamp = (raw: unknown, keys: readonly string[]): BloxTimestamp => {
  if (typeof raw === 'string') {
    return raw.trim() ? { kind: 'string', value: raw } : { kind: 'missing' };
  }
  if (isRecord(raw)) {
    for (const key of keys) {
      const candidate = raw[key];
      if (typeof candidate === 'string' && candidate.trim()) {
        return { kind: 'object', value: candidate };
      }
    }
    return { kind: 'object', value: null };
  }
  return { kind: 'missing' };
};

export const timestampToDate = (timestamp: BloxTimestamp): CalendarDate | null => {
  switch (timestamp.kind) {
    case 'string':
      return dateFromIsoTimestamp(timestamp.value);
    case 'object':
      return timestamp.value ? dateFromIsoTimestamp(timestamp.value) : null;
    case 'missing':
      return null;
  }
};

const bodyField = (raw: unknown): string | string[] | null => {
  if (typeof raw === 'string') return raw.trim() ? raw : null;
  if (Array.isArray(raw)) return raw.length ? raw.map((fragment) => String(fragment)) : null;
  return null;
};

/** `content` wins over `body` unless it is empty; either may be one HTML string or a list of fragments. */
export const rowBody = (row: BloxRow): string | string[] | null => bodyField(row.content) ?? bodyField(row.body);

const absoluteUrl = (url: string, baseUrl: string): string | null => {
  try {
    return new URL(url, baseUrl).toString();
  } catch {
    return null;
  }
};

export const bloxRules = (stopWords: readonly string[]): ParagraphRules => ({
  skipShort: { phrases: stopWords, maxLength: SHORT_PARAGRAPH_LENGTH },
});

export const extractBloxRow = (
  raw: unknown,
  site: Pick<BloxSiteOptions, 'baseUrl' | 'timestampKeys' | 'stopWords'>,
): ExtractionOutcome => {
  const parsed = RowSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: 'unusable', reason: 'malformed row' };
  }
  const row = parsed.data;

  const publishedDate = timestampToDate(classifyTimestamp(row.starttime, site.timestampKeys));
  if (!publishedDate) {
    return { kind: 'unusable', reason: 'missing or unparseable starttime' };
  }
  const url = row.url ? absoluteUrl(row.url, site.baseUrl) : null;
  if (!url) {
    return { kind: 'unusable', reason: 'missing url' };
  }
  const body = rowBody(row);
  if (!body) {
    return { kind: 'unusable', reason: 'missing body' };
  }

  const paragraphs = filterParagraphs(htmlFragmentsToParagraphs(body), bloxRules(site.stopWords));
  if (paragraphs.kind === 'rejected') {
    return paragraphs;
  }

  return {
    kind: 'article',
    article: {
      url,
      title: normalizeWhitespace(row.title ?? '') || UNTITLED,
      publishedDate,
      paragraphs: paragraphs.paragraphs,
    },
  };
};

export const searchParams = (site: Pick<BloxSiteOptions, 'category' | 'limit'>): Array<[string, string]> => [
  ['f', 'json'],
  ['t', 'article'],
  ['c[]', site.category],
  ['l', String(site.limit)],
  ['sort', 'starttime'],
  ['sd', 'desc'],
];

export const createBloxAdapter = (site: BloxSiteOptions): SiteAdapter => ({
  slug: site.slug,
  name: site.name,
  scrape: async (targetDate, ctx) => {
    const cookie = site.cookie(ctx.config);
    if (!cookie) {
      if (site.requireCookie) {
        ctx.logger.warn('No session cookie configured; skipping site');
        return [];
      }
      ctx.logger.warn('No session cookie configured; querying anonymously');
    }

    ctx.logger.info('Contacting search API', { targetDate, category: site.category });
    const headers: Record<string, string> = {
      Accept: 'application/json, text/javascript, */*; q=0.01',
      'X-Requested-With': 'XMLHttpRequest',
      Referer: new URL(site.refererPath, site.baseUrl).toString(),
    };
    if (cookie) headers.Cookie = cookie;

    const payload = await ctx.fetcher.json(new URL('/search/', site.baseUrl).toString(), {
      headers,
      params: searchParams(site),
    });
    const { rows } = SearchResponseSchema.parse(payload);
    ctx.logger.info('Search API returned rows', { count: rows.length });

    const articles: Article[] = [];
    for (const row of rows) {
      const outcome = finalizeOutcome(extractBloxRow(row, site), targetDate);
      if (outcome.kind === 'article') {
        ctx.logger.info('Matched article', { title: outcome.article.title.slice(0, 60) });
        articles.push(outcome.article);
      } else {
        ctx.logger.debug('Row skipped', { reason: outcome.reason });
      }
    }
    return articles;
  },
});
