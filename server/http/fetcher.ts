import type { AppConfig } from '../../shared/config';
import { FetchError, errorMessage } from '../errors';

export interface FetchOptions {
  timeoutMs?: number;
  /** Merged over the default browser-like headers */
  headers?: Record<string, string>;
  /** Query parameters appended to the URL; repeated keys are kept */
  params?: Array<[string, string]>;
}

export interface Fetcher {
  text: (url: string, options?: FetchOptions) => Promise<string>;
  json: (url: string, options?: FetchOptions) => Promise<unknown>;
}

export const DEFAULT_TIMEOUT_MS = 15_000;

const withParams = (url: string, params?: Array<[string, string]>): string => {
  if (!params || params.length === 0) return url;
  const target = new URL(url);
  for (const [key, value] of params) {
    target.searchParams.append(key, value);
  }
  return target.toString();
};

/** GET and read the body under one timer, so a server that stalls mid-body still times out. */
const fetchTextWithTimeout = async (url: string, headers: Record<string, string>, timeoutMs: number): Promise<string> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const timedOut = (error: unknown) =>
    new FetchError(`Request timed out after ${timeoutMs}ms: ${url}`, { url, cause: error, code: 'FETCH_TIMEOUT' });
  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers,
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) throw timedOut(error);
      throw new FetchError(`Request failed for ${url}: ${errorMessage(error)}`, { url, cause: error });
    }
    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} ${response.statusText} for ${url}`, {
        url,
        status: response.status,
      });
    }
    try {
      return await response.text();
    } catch (error) {
      if (controller.signal.aborted) throw timedOut(error);
      throw new FetchError(`Failed to read body of ${url}: ${errorMessage(error)}`, { url, cause: error });
    }
  } finally {
    clearTimeout(timer);
  }
};

export const createFetcher = (scraping: Pick<AppConfig['scraping'], 'userAgent' | 'fetchTimeoutMs'>): Fetcher => {
  const defaultHeaders: Record<string, string> = {
    'User-Agent': scraping.userAgent,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
  };

  const text = async (url: string, options: FetchOptions = {}): Promise<string> => {
    const target = withParams(url, options.params);
    const timeoutMs = options.timeoutMs ?? scraping.fetchTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    return fetchTextWithTimeout(target, { ...defaultHeaders, ...options.headers }, timeoutMs);
  };

  const json = async (url: string, options: FetchOptions = {}): Promise<unknown> => {
    const body = await text(url, options);
    try {
      return JSON.parse(body) as unknown;
    } catch (error) {
      throw new FetchError(`Invalid JSON from ${url}`, { url, cause: error, code: 'FETCH_INVALID_JSON' });
    }
  };

  return { text, json };
};
