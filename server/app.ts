import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import fs from 'node:fs/promises';
import { z } from 'zod';
import { SITE_SLUGS, type AppConfig, type SiteSlug } from '../shared/config';
import type { ArchiveEntry } from '../shared/types';
import { getPublicConfig } from './config/config';
import { ArchiveError, RewriteError, errorMessage } from './errors';
import type { Logger } from './obs/logger';
import { parseArticleText } from './persistence/articleFile';
import type { RunScrapeOptions } from './pipeline/runScrape';
import { runScrape } from './pipeline/runScrape';
import {
  listArchiveDates,
  listMerged,
  listOriginals,
  readCurrentText,
  readEntry,
  readMergedEntry,
  toggleMergedPublish,
  togglePublish,
  writeMerged,
  writeRewritten,
} from './review/archiveStore';
import { isCalendarDate, todayIso } from './scraping/dates';
import { SITE_SELECTOR_ALL, resolveSiteSelector } from './scraping/registry';
import type { MergeInput, RewriteService } from './services/rewriteService';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  rewriteService: RewriteService;
  scrape?: (options: RunScrapeOptions) => ReturnType<typeof runScrape>;
}

const CalendarDateSchema = z.string().refine(isCalendarDate, 'Expected YYYY-MM-DD');
const SiteSchema = z.enum(SITE_SLUGS);
const FilenameSchema = z.string().regex(/^[^\\/]+\.txt$/, 'Expected an article filename');

const EntryRefSchema = z.object({
  date: CalendarDateSchema,
  site: SiteSchema,
  filename: FilenameSchema,
});

const PublishBodySchema = EntryRefSchema.extend({
  kind: z.enum(['article', 'merged']).optional().default('article'),
});

const RewriteBodySchema = EntryRefSchema.extend({
  force: z.boolean().optional().default(false),
});

const MergeBodySchema = z.object({
  date: CalendarDateSchema,
  group: z.string().trim().min(1).max(60),
  items: z.array(z.object({ site: SiteSchema, filename: FilenameSchema })).min(2),
});

const ScrapeBodySchema = z.object({
  site: z.union([SiteSchema, z.literal(SITE_SELECTOR_ALL)]).optional().default(SITE_SELECTOR_ALL),
  date: CalendarDateSchema.optional(),
});

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const statusFor = (error: unknown): number => {
  if (error instanceof z.ZodError) return 400;
  if (isNotFound(error)) return 404;
  if (error instanceof ArchiveError) return 409;
  if (error instanceof RewriteError) return 502;
  return 500;
};

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const asyncRoute =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const siteFilter = (value: unknown): SiteSlug[] => {
  if (typeof value !== 'string' || !value.trim()) {
    return [...SITE_SLUGS];
  }
  return resolveSiteSelector(value.trim()) ?? [];
};

export const createApp = (deps: AppDeps): express.Express => {
  const { config, logger, rewriteService } = deps;
  const root = config.archive.rootDir;
  const scrape = deps.scrape ?? runScrape;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.get(
    '/api/archive',
    asyncRoute(async (_req, res) => {
      res.json({ dates: await listArchiveDates(root) });
    }),
  );

  app.get(
    '/api/archive/:date',
    asyncRoute(async (req, res) => {
      const date = CalendarDateSchema.parse(req.params.date);
      const sites = siteFilter(req.query.site);
      if (!sites.length) {
        res.status(400).json({ error: `Unknown site: ${String(req.query.site)}` });
        return;
      }
      res.json({ date, entries: await listOriginals(root, date, sites), merged: await listMerged(root, date, sites) });
    }),
  );

  app.get(
    '/api/merged/:date/:site/:filename',
    asyncRoute(async (req, res) => {
      const ref = EntryRefSchema.parse(req.params);
      const entry = await readMergedEntry(root, ref.date, ref.site, ref.filename);
      res.json({ entry, text: await readCurrentText(entry) });
    }),
  );

  app.get(
    '/api/archive/:date/:site/:filename',
    asyncRoute(async (req, res) => {
      const ref = EntryRefSchema.parse(req.params);
      const entry = await readEntry(root, ref.date, ref.site, ref.filename);
      const original = await fs.readFile(entry.originalPath, 'utf-8');
      const current = entry.state === 'original' ? original : await readCurrentText(entry);
      res.json({ entry, original, current });
    }),
  );

  app.post(
    '/api/rewrite',
    asyncRoute(async (req, res) => {
      const body = RewriteBodySchema.parse(req.body);
      const entry = await readEntry(root, body.date, body.site, body.filename);
      if (entry.state !== 'original' && !body.force) {
        res.json({ entry, text: await readCurrentText(entry), cached: true });
        return;
      }
      const parsed = parseArticleText(await fs.readFile(entry.originalPath, 'utf-8'));
      const text = await rewriteService.rewrite({ title: parsed.title, text: parsed.body });
      const written = await writeRewritten(root, entry, text);
      logger.info('Rewrote article', { site: entry.site, date: entry.date, file: entry.filename });
      res.json({ entry: { ...entry, state: 'rewritten', currentPath: written }, text, cached: false });
    }),
  );

  app.post(
    '/api/merge',
    asyncRoute(async (req, res) => {
      const body = MergeBodySchema.parse(req.body);
      const entries: ArchiveEntry[] = [];
      for (const item of body.items) {
        entries.push(await readEntry(root, body.date, item.site, item.filename));
      }
      const inputs: MergeInput[] = [];
      for (const entry of entries) {
        const parsed = parseArticleText(await fs.readFile(entry.originalPath, 'utf-8'));
        inputs.push({ site: entry.site, title: parsed.title, text: parsed.body });
      }
      const text = await rewriteService.merge(inputs);
      const written = await writeMerged(root, entries, body.group, text);
      logger.info('Merged articles', { date: body.date, group: body.group, sources: entries.length });
      res.json({ path: written, text });
    }),
  );

  app.post(
    '/api/publish',
    asyncRoute(async (req, res) => {
      const ref = PublishBodySchema.parse(req.body);
      if (ref.kind === 'merged') {
        const merged = await readMergedEntry(root, ref.date, ref.site, ref.filename);
        res.json({ entry: await toggleMergedPublish(root, merged) });
        return;
      }
      const entry = await readEntry(root, ref.date, ref.site, ref.filename);
      res.json({ entry: await togglePublish(root, entry) });
    }),
  );

  app.post(
    '/api/scrape',
    asyncRoute(async (req, res) => {
      const body = ScrapeBodySchema.parse(req.body ?? {});
      const sites = resolveSiteSelector(body.site) ?? [];
      const report = await scrape({ sites, targetDate: body.date ?? todayIso(), config, logger });
      res.json(report);
    }),
  );

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(error);
    if (status >= 500) {
      logger.error('Request failed', { method: req.method, path: req.originalUrl, error: errorMessage(error) });
    }
    if (error instanceof z.ZodError) {
      res.status(status).json({ error: 'Invalid request', issues: error.issues });
      return;
    }
    res.status(status).json({ error: status === 404 ? 'Not found' : errorMessage(error) });
  });

  return app;
};
