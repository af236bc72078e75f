/** Resolves after `ms`; rejects early when `signal` aborts. */
export const sleep = (ms: number, signal?: AbortSignal | null): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Exponential backoff with jitter, capped at `maxMs`.
 */
export const backoffDelay = (attempt: number, baseMs = 1_000, maxMs = 30_000): number =>
  Math.min(maxMs, baseMs * 2 ** attempt) + Math.floor(Math.random() * 250);
