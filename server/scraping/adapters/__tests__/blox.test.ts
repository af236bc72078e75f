import { describe, expect, it } from 'vitest';
import { createFakeFetcher, createRecordingLogger, createTestContext, testConfig } from '../../../testing/fakes';
import { classifyTimestamp, extractBloxRow, rowBody, searchParams, timestampToDate } from '../blox';
import { keeneSentinelAdapter } from '../keenesentinel';
import { reformerAdapter } from '../reformer';

const site = {
  baseUrl: 'https://www.keenesentinel.com',
  timestampKeys: ['iso8601', 'value', 'iso'],
  stopWords: ['copyright', 'subscribe'],
};

const SEARCH_URL = 'https://www.keenesentinel.com/search/';

describe('classifyTimestamp', () => {
  it('normalizes string, object and missing shapes', () => {
    expect(classifyTimestamp('2025-12-16T10:00:00-05:00', site.timestampKeys)).toEqual({
      kind: 'string',
      value: '2025-12-16T10:00:00-05:00',
    });
    expect(classifyTimestamp({ utc: 'ignored', value: '2025-12-16T10:00:00' }, site.timestampKeys)).toEqual({
      kind: 'object',
      value: '2025-12-16T10:00:00',
    });
    expect(classifyTimestamp({ utc: '2025-12-16' }, site.timestampKeys)).toEqual({ kind: 'object', value: null });
    expect(classifyTimestamp(1734361200, site.timestampKeys)).toEqual({ kind: 'missing' });
    expect(classifyTimestamp('  ', site.timestampKeys)).toEqual({ kind: 'missing' });
  });

  it('prefers keys in the configured order', () => {
    const raw = { iso: '2025-12-15T00:00:00', iso8601: '2025-12-16T00:00:00' };
    expect(timestampToDate(classifyTimestamp(raw, site.timestampKeys))).toBe('2025-12-16');
  });
});

describe('rowBody', () => {
  it('uses content before body and accepts fragment lists', () => {
    expect(rowBody({ content: '<p>Content</p>', body: '<p>Body</p>' })).toBe('<p>Content</p>');
    expect(rowBody({ body: ['<p>One</p>', '<p>Two</p>'] })).toEqual(['<p>One</p>', '<p>Two</p>']);
    expect(rowBody({ content: '', body: '<p>Body</p>' })).toBe('<p>Body</p>');
    expect(rowBody({ content: [], body: '<p>Body</p>' })).toBe('<p>Body</p>');
    expect(rowBody({ content: [] })).toBeNull();
  });
});

describe('extractBloxRow', () => {
  it('builds an article with an absolute URL and filtered paragraphs', () => {
    const outcome = extractBloxRow(
      {
        title: '  Keene  council approves budget ',
        url: '/news/local/keene-council-approves-budget/article_1.html',
        starttime: { iso8601: '2025-12-16T19:30:00-05:00' },
        content: ['<p>The council voted 12-3.</p>', '<p>Subscribe today</p>', '<p>The budget takes effect in July.</p>'],
      },
      site,
    );
    expect(outcome).toEqual({
      kind: 'article',
      article: {
        url: 'https://www.keenesentinel.com/news/local/keene-council-approves-budget/article_1.html',
        title: 'Keene council approves budget',
        publishedDate: '2025-12-16',
        paragraphs: ['The council voted 12-3.', 'The budget takes effect in July.'],
      },
    });
  });

  it('marks rows without a usable date, url or body as unusable', () => {
    expect(extractBloxRow({ url: '/a', content: '<p>x</p>' }, site)).toEqual({
      kind: 'unusable',
      reason: 'missing or unparseable starttime',
    });
    expect(extractBloxRow({ starttime: '2025-12-16', content: '<p>x</p>' }, site)).toEqual({
      kind: 'unusable',
      reason: 'missing url',
    });
    expect(extractBloxRow({ starttime: '2025-12-16', url: '/a' }, site)).toEqual({ kind: 'unusable', reason: 'missing body' });
    expect(extractBloxRow('not a row', site)).toEqual({ kind: 'unusable', reason: 'malformed row' });
  });

  it('falls back to Untitled', () => {
    const outcome = extractBloxRow({ url: '/a', starttime: '2025-12-16', body: '<p>Text</p>' }, site);
    expect(outcome.kind === 'article' && outcome.article.title).toBe('Untitled');
  });
});

describe('searchParams', () => {
  it('asks for newest articles in the category', () => {
    expect(searchParams({ category: 'news/local', limit: 100 })).toEqual([
      ['f', 'json'],
      ['t', 'article'],
      ['c[]', 'news/local'],
      ['l', '100'],
      ['sort', 'starttime'],
      ['sd', 'desc'],
    ]);
  });
});

describe('keeneSentinelAdapter', () => {
  const rows = {
    rows: [
      { title: 'Today', url: '/news/local/today.html', starttime: { iso8601: '2025-12-16T08:00:00-05:00' }, content: '<p>Now.</p>' },
      { title: 'Yesterday', url: '/news/local/yesterday.html', starttime: '2025-12-15T08:00:00-05:00', content: '<p>Then.</p>' },
      { title: 'No body', url: '/news/local/empty.html', starttime: '2025-12-16T09:00:00-05:00' },
    ],
  };

  it('sends the configured cookie and keeps rows for the target date', async () => {
    const fetcher = createFakeFetcher({ [SEARCH_URL]: JSON.stringify(rows) });
    const ctx = createTestContext(fetcher, { config: testConfig({ KEENESENTINEL_COOKIE: 'test-session=placeholder' }) });

    const articles = await keeneSentinelAdapter.scrape('2025-12-16', ctx);

    expect(articles).toEqual([
      {
        url: 'https://www.keenesentinel.com/news/local/today.html',
        title: 'Today',
        publishedDate: '2025-12-16',
        paragraphs: ['Now.'],
      },
    ]);
    expect(fetcher.calls[0].options?.headers).toEqual({
      Accept: 'application/json, text/javascript, */*; q=0.01',
      'X-Requested-With': 'XMLHttpRequest',
      Referer: 'https://www.keenesentinel.com/news/local/',
      Cookie: 'test-session=placeholder',
    });
  });

  it('queries anonymously and warns when no cookie is configured', async () => {
    const fetcher = createFakeFetcher({ [SEARCH_URL]: JSON.stringify({}) });
    const logger = createRecordingLogger();

    const articles = await keeneSentinelAdapter.scrape('2025-12-16', createTestContext(fetcher, { logger }));

    expect(articles).toEqual([]);
    expect(fetcher.calls).toHaveLength(1);
    expect(fetcher.calls[0].options?.headers?.Cookie).toBeUndefined();
    expect(logger.records[0]).toEqual({
      level: 'warn',
      message: 'No session cookie configured; querying anonymously',
      meta: {},
    });
  });

  it('propagates search API failures', async () => {
    const ctx = createTestContext(createFakeFetcher({ [SEARCH_URL]: 'not json' }));
    await expect(keeneSentinelAdapter.scrape('2025-12-16', ctx)).rejects.toThrow();
  });
});

describe('reformerAdapter', () => {
  it('skips the site without a session cookie', async () => {
    const fetcher = createFakeFetcher({});
    const articles = await reformerAdapter.scrape('2025-12-16', createTestContext(fetcher));
    expect(articles).toEqual([]);
    expect(fetcher.calls).toHaveLength(0);
  });
});
