import fs from 'node:fs/promises';
import path from 'node:path';
import { SITE_SLUGS, type SiteSlug } from '../../shared/config';
import type { CalendarDate } from '../../shared/types';
import { errorMessage } from '../errors';
import type { Logger } from '../obs/logger';
import { parseArticleText } from '../persistence/articleFile';
import { originalDir, rewrittenPathFor } from '../persistence/layout';
import { listArchiveDates } from '../review/archiveStore';
import type { RewriteService } from '../services/rewriteService';

export interface RewriteArchiveOptions {
  rootDir: string;
  service: RewriteService;
  logger: Logger;
  sites?: readonly SiteSlug[];
  date?: CalendarDate;
  /** Rewrite even when a Rewritten counterpart already exists */
  force?: boolean;
  /** Stop after this many model calls */
  limit?: number;
  signal?: AbortSignal;
}

export interface RewriteArchiveReport {
  processed: number;
  rewritten: number;
  skippedExisting: number;
  skippedEmpty: number;
  errors: number;
  files: string[];
}

const exists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
};

const originalFiles = async (dir: string): Promise<string[]> => {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.txt'))
      .map((entry) => path.join(dir, entry.name))
      .sort();
  } catch {
    return [];
  }
};

/**
 * Walks `<root>/<date>/<site>/Original/*.txt` (newest date first) and writes a
 * `Rewritten/<stem>.txt` beside each original. Files that fail are counted and logged; the
 * walk continues.
 */
export const rewriteArchive = async (options: RewriteArchiveOptions): Promise<RewriteArchiveReport> => {
  const { rootDir, service, logger } = options;
  const report: RewriteArchiveReport = {
    processed: 0,
    rewritten: 0,
    skippedExisting: 0,
    skippedEmpty: 0,
    errors: 0,
    files: [],
  };
  const dates = options.date ? [options.date] : await listArchiveDates(rootDir);
  const sites = options.sites ?? SITE_SLUGS;
  const limit = options.limit ?? Number.POSITIVE_INFINITY;

  for (const date of dates) {
    for (const site of sites) {
      for (const file of await originalFiles(originalDir(rootDir, date, site))) {
        if (report.processed >= limit) {
          logger.info('Rewrite limit reached', { limit });
          return report;
        }
        const target = rewrittenPathFor(file);
        if (!options.force && (await exists(target))) {
          report.skippedExisting += 1;
          continue;
        }

        const parsed = parseArticleText(await fs.readFile(file, 'utf-8'));
        if (!parsed.body) {
          report.skippedEmpty += 1;
          logger.debug('Skipping empty article', { file });
          continue;
        }

        report.processed += 1;
        try {
          const text = await service.rewrite({ title: parsed.title, text: parsed.body }, options.signal);
          await fs.mkdir(path.dirname(target), { recursive: true });
          await fs.writeFile(target, `${text.trimEnd()}\n`, 'utf-8');
          report.rewritten += 1;
          report.files.push(target);
          logger.info('Rewrote article', { site, date, file: path.basename(file) });
        } catch (error) {
          report.errors += 1;
          logger.error('Rewrite failed', { site, date, file: path.basename(file), error: errorMessage(error) });
        }
      }
    }
  }

  return report;
};
