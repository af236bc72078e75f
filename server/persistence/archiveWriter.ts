import fs from 'node:fs/promises';
import path from 'node:path';
import type { SiteSlug } from '../../shared/config';
import type { Article, CalendarDate, SavedArticle, SiteWriteResult } from '../../shared/types';
import { ArchiveError, errorMessage } from '../errors';
import type { Logger } from '../obs/logger';
import { formatArticleText, titleToFilename } from './articleFile';
import { guardPath, manifestFilename, originalDir } from './layout';

const exists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
};

/**
 * First free name in `dir`: `name.txt`, then `name (2).txt`, `name (3).txt`, ...
 */
export const resolveAvailablePath = async (dir: string, filename: string): Promise<string> => {
  const candidate = path.join(dir, filename);
  if (!(await exists(candidate))) {
    return candidate;
  }
  const ext = path.extname(filename);
  const stem = path.basename(filename, ext);
  for (let i = 2; ; i += 1) {
    const next = path.join(dir, `${stem} (${i})${ext}`);
    if (!(await exists(next))) {
      return next;
    }
  }
};

export const buildManifest = (articles: readonly Article[]): string[] =>
  Array.from(new Set(articles.map((article) => article.url).filter(Boolean))).sort();

export interface ArchiveWriter {
  writeSiteArticles: (site: SiteSlug, date: CalendarDate, articles: readonly Article[]) => Promise<SiteWriteResult>;
}

/**
 * Persists one site's articles under `<root>/<date>/<site>/Original`. Articles are trusted
 * to be filtered already; the writer only names and serializes them.
 */
export const createArchiveWriter = (rootDir: string, logger: Logger): ArchiveWriter => {
  const root = path.resolve(rootDir);

  const writeSiteArticles = async (
    site: SiteSlug,
    date: CalendarDate,
    articles: readonly Article[],
  ): Promise<SiteWriteResult> => {
    const log = logger.child({ site });
    if (articles.length === 0) {
      log.info('No articles to save', { date });
      return { manifestPath: null, files: [], failures: [] };
    }

    const dir = originalDir(root, date, site);
    guardPath(root, dir);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new ArchiveError(`Failed to create ${dir}: ${errorMessage(error)}`, { path: dir, cause: error });
    }

    const manifestPath = path.join(dir, manifestFilename(site, date));
    await fs.writeFile(manifestPath, JSON.stringify(buildManifest(articles), null, 2), 'utf-8');
    log.info('Saved URL list', { path: manifestPath });

    const files: SavedArticle[] = [];
    const failures: SiteWriteResult['failures'] = [];
    for (const article of articles) {
      const title = article.title || 'Untitled';
      try {
        const target = await resolveAvailablePath(dir, titleToFilename(title));
        guardPath(root, target);
        // `wx` so a file that appeared since the existence check is never overwritten.
        await fs.writeFile(target, formatArticleText(article, site), { encoding: 'utf-8', flag: 'wx' });
        files.push({ site, title, url: article.url, path: target });
        log.info('Saved article', { file: path.basename(target) });
      } catch (error) {
        const failure = new ArchiveError(`Failed to save "${title}": ${errorMessage(error)}`, { path: dir, cause: error });
        log.error(failure.message);
        failures.push({ title, error: failure.message });
      }
    }

    return { manifestPath, files, failures };
  };

  return { writeSiteArticles };
};
