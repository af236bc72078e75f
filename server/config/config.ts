import path from 'node:path';
import { ConfigSchema, LOG_LEVELS, type AppConfig, type LogLevel, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const optionalSecret = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const logLevelFromEnv = (value: string | undefined): LogLevel => {
  const normalized = (value || 'info').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
};

export type { AppConfig, PublicConfig };

export type EnvSource = Record<string, string | undefined>;

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: EnvSource = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const rootDir = path.resolve(env.ARCHIVE_ROOT || path.join(process.cwd(), 'Stories'));

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
    },
    archive: {
      rootDir,
      retentionDays: numberFromEnv(env.RETENTION_DAYS, 30),
    },
    scraping: {
      fetchTimeoutMs: numberFromEnv(env.SCRAPE_FETCH_TIMEOUT_MS, 15_000),
      requestDelayMs: numberFromEnv(env.SCRAPE_REQUEST_DELAY_MS, 300),
      maxCandidates: numberFromEnv(env.SCRAPE_MAX_CANDIDATES, 60),
      userAgent:
        env.SCRAPE_USER_AGENT?.trim() ||
        // Some of the local stations return 403 to non-browser agents
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15',
    },
    credentials: {
      keenesentinelCookie: optionalSecret(env.KEENESENTINEL_COOKIE),
      reformerCookie: optionalSecret(env.REFORMER_COOKIE),
    },
    llm: {
      apiKey: env.GEMINI_API_KEY?.trim() || '',
      model: env.GEMINI_MODEL?.trim() || 'gemini-2.5-flash',
      temperature: numberFromEnv(env.GEMINI_TEMPERATURE, 0.7),
      maxOutputTokens: numberFromEnv(env.GEMINI_MAX_OUTPUT_TOKENS, 2048),
      maxInputChars: numberFromEnv(env.REWRITE_MAX_INPUT_CHARS, 10_000),
    },
    observability: {
      logLevel: logLevelFromEnv(env.LOG_LEVEL),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

/**
 * Returns a copy of the config with the archive root replaced. The root is always
 * passed explicitly to the writer and sweeper, never mutated globally.
 */
export const withArchiveRoot = (config: AppConfig, rootDir: string): AppConfig => ({
  ...config,
  archive: { ...config.archive, rootDir: path.resolve(rootDir) },
});
