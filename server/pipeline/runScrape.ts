import type { AppConfig, SiteSlug } from '../../shared/config';
import type { CalendarDate, ScrapeRunReport, SiteRunReport } from '../../shared/types';
import { errorMessage } from '../errors';
import { createFetcher, type Fetcher } from '../http/fetcher';
import type { Logger } from '../obs/logger';
import { createArchiveWriter, type ArchiveWriter } from '../persistence/archiveWriter';
import { sweepArchive } from '../persistence/retention';
import { getAdapter } from '../scraping/registry';
import type { ScrapeContext, SiteAdapter } from '../scraping/types';
import { sleep } from '../utils/async';

export interface RunScrapeOptions {
  sites: readonly SiteSlug[];
  targetDate: CalendarDate;
  config: AppConfig;
  logger: Logger;
  fetcher?: Fetcher;
  writer?: ArchiveWriter;
  delay?: (ms: number) => Promise<void>;
  resolveAdapter?: (slug: SiteSlug) => SiteAdapter;
  /** Run the retention sweep before scraping (default true) */
  sweep?: boolean;
}

const nowIso = () => new Date().toISOString();

/**
 * Scrapes each site in turn and hands the results to the archive writer. A failing site is
 * logged and reported; it never stops the remaining sites.
 */
export const runScrape = async (options: RunScrapeOptions): Promise<ScrapeRunReport> => {
  const { config, logger, targetDate } = options;
  const startedAt = nowIso();
  const fetcher = options.fetcher ?? createFetcher(config.scraping);
  const writer = options.writer ?? createArchiveWriter(config.archive.rootDir, logger);
  const resolveAdapter = options.resolveAdapter ?? getAdapter;

  let swept: string[] = [];
  if (options.sweep !== false) {
    try {
      swept = await sweepArchive({ rootDir: config.archive.rootDir, retentionDays: config.archive.retentionDays, logger });
    } catch (error) {
      logger.error('Retention sweep failed', { error: errorMessage(error) });
    }
  }

  logger.info('Scrape run starting', { targetDate, sites: options.sites });

  const reports: SiteRunReport[] = [];
  for (const slug of options.sites) {
    const siteStartedAt = Date.now();
    const siteLogger = logger.child({ site: slug });
    const ctx: ScrapeContext = {
      config,
      logger: siteLogger,
      fetcher,
      delay: options.delay ?? ((ms) => sleep(ms)),
    };
    siteLogger.info('Starting scrape');

    try {
      const articles = await resolveAdapter(slug).scrape(targetDate, ctx);
      const written = await writer.writeSiteArticles(slug, targetDate, articles);
      reports.push({
        site: slug,
        status: 'ok',
        articleCount: articles.length,
        files: written.files.map((file) => file.path),
        elapsedMs: Date.now() - siteStartedAt,
      });
      siteLogger.info('Site complete', { articles: articles.length, saved: written.files.length });
    } catch (error) {
      const message = errorMessage(error);
      siteLogger.error('Site scrape failed', { error: message });
      reports.push({
        site: slug,
        status: 'failed',
        articleCount: 0,
        files: [],
        error: message,
        elapsedMs: Date.now() - siteStartedAt,
      });
    }
  }

  const failed = reports.filter((report) => report.status === 'failed').map((report) => report.site);
  logger.info('Scrape run complete', { targetDate, failed });

  return { targetDate, startedAt, finishedAt: nowIso(), sites: reports, swept };
};
