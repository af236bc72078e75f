import type { AppConfig, LogLevel } from '../../shared/config';

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  /** Returns a logger that stamps every line with `bindings` (e.g. `{ site: 'wmur' }`). */
  child: (bindings: LogMeta) => Logger;
}

const errorMeta = (meta: LogMeta | undefined): LogMeta | undefined => {
  if (!meta) return meta;
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
};

const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
  const base = {
    level,
    message,
    ts: new Date().toISOString(),
    ...errorMeta(meta),
  };
  const payload = JSON.stringify(base);
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

const buildLogger = (threshold: number, bindings: LogMeta): Logger => {
  const shouldLog = (level: LogLevel) => levelWeights[level] >= threshold;
  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (level !== 'error' && !shouldLog(level)) return;
    emit(level, message, { ...bindings, ...meta });
  };
  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (extra) => buildLogger(threshold, { ...bindings, ...extra }),
  };
};

export const createLogger = (config: Pick<AppConfig, 'observability'>): Logger =>
  buildLogger(levelWeights[config.observability.logLevel], {});

export const createSilentLogger = (): Logger => {
  const silent: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => silent,
  };
  return silent;
};
