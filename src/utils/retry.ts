export interface RetryOptions {
  retries?: number;
  minTimeoutMs?: number;
  factor?: number;
  signal?: AbortSignal;
}

const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Retries `fn` with exponential backoff. Once `signal` has aborted no further
 * attempt is made and the last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 3, minTimeoutMs = 200, factor = 2, signal } = options;

  let attempt = 0;
  let lastError: unknown;

  while (attempt < retries) {
    signal?.throwIfAborted();
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      attempt += 1;
      if (attempt >= retries || signal?.aborted) {
        break;
      }
      const delay = minTimeoutMs * Math.pow(factor, attempt - 1);
      await sleep(delay, signal);
    }
  }

  throw lastError;
}
