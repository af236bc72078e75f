/**
 * Typed errors raised by the scraper, archive and rewrite stages.
 */
export class ScraperError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ScraperError';
    this.code = options?.code ?? 'SCRAPER_ERROR';
  }
}

/**
 * Network failure, timeout or non-2xx response for a single GET.
 */
export class FetchError extends ScraperError {
  readonly url: string;
  /** HTTP status when the server answered; undefined for network errors and timeouts */
  readonly status?: number;

  constructor(message: string, options: { url: string; status?: number; cause?: unknown; code?: string }) {
    super(message, { code: options.code ?? 'FETCH_FAILED', cause: options.cause });
    this.name = 'FetchError';
    this.url = options.url;
    this.status = options.status;
  }
}

export class ArchiveError extends ScraperError {
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: unknown }) {
    super(message, { code: 'ARCHIVE_WRITE_FAILED', cause: options.cause });
    this.name = 'ArchiveError';
    this.path = options.path;
  }
}

export class RewriteError extends ScraperError {
  readonly transient: boolean;

  constructor(message: string, options?: { transient?: boolean; cause?: unknown }) {
    super(message, { code: 'REWRITE_FAILED', cause: options?.cause });
    this.name = 'RewriteError';
    this.transient = options?.transient ?? false;
  }
}

/** Invalid command-line input. The CLI exits non-zero before any network activity. */
export class CliUsageError extends ScraperError {
  constructor(message: string) {
    super(message, { code: 'CLI_USAGE' });
    this.name = 'CliUsageError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
