import { z } from 'zod';

export const SITE_SLUGS = ['wmur', 'wcax', 'vtdigger', 'mykeenenow', 'keenesentinel', 'reformer'] as const;

export type SiteSlug = (typeof SITE_SLUGS)[number];

export const isSiteSlug = (value: string): value is SiteSlug =>
  (SITE_SLUGS as readonly string[]).includes(value);

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  archive: z.object({
    rootDir: z.string().min(1),
    retentionDays: z.number().int().positive(),
  }),
  scraping: z.object({
    fetchTimeoutMs: z.number().int().positive(),
    requestDelayMs: z.number().int().nonnegative(),
    maxCandidates: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  credentials: z.object({
    keenesentinelCookie: z.string().optional(),
    reformerCookie: z.string().optional(),
  }),
  llm: z.object({
    apiKey: z.string(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().positive(),
    maxInputChars: z.number().int().positive(),
  }),
  observability: z.object({
    logLevel: z.enum(LOG_LEVELS),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  archiveRoot: string;
  retentionDays: number;
  sites: readonly SiteSlug[];
  rewriteEnabled: boolean;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  archiveRoot: config.archive.rootDir,
  retentionDays: config.archive.retentionDays,
  sites: SITE_SLUGS,
  rewriteEnabled: Boolean(config.llm.apiKey),
});

/**
 * Parses a `--limit`-style value. Returns undefined for missing or non-positive input.
 */
export const parsePositiveInt = (value: string | null | undefined): number | undefined => {
  if (value == null || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return undefined;
  const rounded = Math.floor(parsed);
  return rounded > 0 ? rounded : undefined;
};
