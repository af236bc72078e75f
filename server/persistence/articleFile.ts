import type { SiteSlug } from '../../shared/config';
import type { Article, ParsedArticleFile } from '../../shared/types';

const MAX_STEM_LENGTH = 150;

/**
 * Title → `<stem>.txt` with `\ / * ? : " < > |` removed, whitespace collapsed and the
 * stem capped at 150 characters. Never returns an empty stem.
 */
export const titleToFilename = (title: string | null | undefined): string => {
  let cleaned = (title ?? '')
    .replace(/[\\/*?:"<>|]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
  if (!cleaned) {
    cleaned = 'untitled';
  }
  if (cleaned.length > MAX_STEM_LENGTH) {
    cleaned = cleaned.slice(0, MAX_STEM_LENGTH).trimEnd();
  }
  return `${cleaned}.txt`;
};

/**
 * Plain-text article format read back by the rewrite stage: title, blank line, `Site:`,
 * `Published:`, `URL:`, blank line, then paragraphs separated by blank lines.
 */
export const formatArticleText = (article: Article, site: SiteSlug): string => {
  const lines = [article.title || 'Untitled', '', `Site: ${site.toUpperCase()}`];
  if (article.publishedDate) {
    lines.push(`Published: ${article.publishedDate}`);
  }
  lines.push(`URL: ${article.url}`, '');

  for (const paragraph of article.paragraphs) {
    const trimmed = paragraph.trim();
    if (trimmed) {
      lines.push(trimmed, '');
    }
  }

  return `${lines.join('\n').trimEnd()}\n`;
};

const metadataValue = (line: string): string => line.slice(line.indexOf(':') + 1).trim();

/**
 * Inverse of `formatArticleText`. The first non-blank line without a colon is the title;
 * `site:`, `published:` and `url:` lines are metadata; everything else is body.
 */
export const parseArticleText = (text: string): ParsedArticleFile => {
  const result: ParsedArticleFile = { title: null, site: null, published: null, url: null, body: '' };
  const bodyLines: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const stripped = line.trim();
    if (!stripped) continue;
    if (result.title === null && !stripped.includes(':')) {
      result.title = stripped;
      continue;
    }
    const lower = stripped.toLowerCase();
    if (lower.startsWith('site:')) {
      result.site = metadataValue(stripped);
    } else if (lower.startsWith('published:')) {
      result.published = metadataValue(stripped);
    } else if (lower.startsWith('url:')) {
      result.url = metadataValue(stripped);
    } else {
      bodyLines.push(line);
    }
  }

  result.body = bodyLines.join('\n').trim();
  return result;
};
