import { describe, expect, it } from 'vitest';
import { finalizeOutcome } from '../../adapter';
import { createFakeFetcher, createRecordingLogger, createTestContext } from '../../../testing/fakes';
import { WMUR_LISTING_URL, cleanWmurTitle, discoverWmurUrls, extractWmurArticle, wmurAdapter } from '../wmur';

const listing = `
  <body>
    <nav><a href="/article/nav-link/1">Trending</a></nav>
    <h2>Local News</h2>
    <a href="/article/keene-budget-vote/100">Keene budget vote</a>
    <a href="/article/weekend-forecast/101">Weekend forecast</a>
    <a href="/article/nh-chronicle-covered-bridges/102">Chronicle</a>
    <a href="/local-news">More</a>
    <a href="/article/concord-school-board/103">Concord school board</a>
  </body>`;

const articlePage = (title: string, dateLine: string, paragraphs: string[]) => `
  <html>
    <head><meta property="og:title" content="${title} - WMUR Manchester"></head>
    <body>
      <h1>${title}</h1>
      <div class="byline">Updated: 5:00 PM EDT ${dateLine}</div>
      ${paragraphs.map((p) => `<p>${p}</p>`).join('\n')}
    </body>
  </html>`;

describe('discoverWmurUrls', () => {
  it('keeps article links below the Local News heading, minus weather and features', () => {
    expect(discoverWmurUrls(listing, 60)).toEqual([
      'https://www.wmur.com/article/keene-budget-vote/100',
      'https://www.wmur.com/article/concord-school-board/103',
    ]);
  });

  it('caps the candidate list', () => {
    expect(discoverWmurUrls(listing, 1)).toEqual(['https://www.wmur.com/article/keene-budget-vote/100']);
  });
});

describe('extractWmurArticle', () => {
  it('strips the station suffix and footer boilerplate', () => {
    const html = articlePage('Keene budget vote', 'Jun 1, 2025', [
      'Voters approved the budget on Saturday.',
      'Download the free WMUR app to get updates on the go.',
      'The measure passed 412 to 198.',
      "Subscribe to WMUR's YouTube channel",
      'Trailing footer text.',
    ]);
    expect(extractWmurArticle(html, 'https://www.wmur.com/article/keene-budget-vote/100', '2025-06-01')).toEqual({
      kind: 'article',
      article: {
        url: 'https://www.wmur.com/article/keene-budget-vote/100',
        title: 'Keene budget vote',
        publishedDate: '2025-06-01',
        paragraphs: ['Voters approved the budget on Saturday.', 'The measure passed 412 to 198.'],
      },
    });
  });

  it('rejects promotional titles', () => {
    const html = articlePage('Get the WMUR app', 'Jun 1, 2025', ['Body.']);
    expect(extractWmurArticle(html, 'https://www.wmur.com/article/app/1', '2025-06-01').kind).toBe('rejected');
  });

  it('falls back to the target date when the page shows none', () => {
    const html = '<html><body><h1>Road closure</h1><p>Main Street is closed.</p></body></html>';
    const outcome = extractWmurArticle(html, 'https://www.wmur.com/article/road/2', '2025-06-01');
    expect(outcome.kind === 'article' && outcome.article.publishedDate).toBe('2025-06-01');
  });

  it('reads a date split across adjacent inline elements', () => {
    const html = '<h1>Road closes</h1><div><span>Posted</span><span>May 31, 2025</span></div><p>The road closed.</p>';
    const outcome = extractWmurArticle(html, 'https://www.wmur.com/article/road/3', '2025-06-01');
    expect(outcome.kind === 'article' && outcome.article.publishedDate).toBe('2025-05-31');
    expect(finalizeOutcome(outcome, '2025-06-01')).toEqual({
      kind: 'rejected',
      reason: 'published 2025-05-31, wanted 2025-06-01',
    });
  });

  it('cleans titles with either separator', () => {
    expect(cleanWmurTitle('Story title | WMUR')).toBe('Story title');
    expect(cleanWmurTitle('Story title - WMUR Manchester')).toBe('Story title');
  });
});

describe('wmurAdapter.scrape', () => {
  it('returns only articles for the target date', async () => {
    const fetcher = createFakeFetcher({
      [WMUR_LISTING_URL]: listing,
      'https://www.wmur.com/article/keene-budget-vote/100': articlePage('Keene budget vote', 'Jun 1, 2025', ['Approved.']),
      'https://www.wmur.com/article/concord-school-board/103': articlePage('Concord school board', 'May 31, 2025', ['Met.']),
    });
    const logger = createRecordingLogger();
    const ctx = createTestContext(fetcher, { logger });

    const articles = await wmurAdapter.scrape('2025-06-01', ctx);

    expect(articles.map((article) => article.title)).toEqual(['Keene budget vote']);
    expect(ctx.delays).toEqual([0]);
    expect(logger.records.filter((record) => record.message === 'Article skipped')).toEqual([
      {
        level: 'info',
        message: 'Article skipped',
        meta: { url: 'https://www.wmur.com/article/concord-school-board/103', reason: 'published 2025-05-31, wanted 2025-06-01' },
      },
    ]);
  });

  it('propagates a listing failure', async () => {
    const ctx = createTestContext(createFakeFetcher({}));
    await expect(wmurAdapter.scrape('2025-06-01', ctx)).rejects.toThrow(`HTTP 404 Not Found for ${WMUR_LISTING_URL}`);
  });
});
