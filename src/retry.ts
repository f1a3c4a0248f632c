import { log } from './log';

export interface RetryOptions {
  label: string;
  retries?: number;
  baseDelayMs?: number;
  /** Once aborted, no further attempt is made and the last error is rethrown. */
  signal?: AbortSignal;
}

/**
 * Retry a fetch-like async operation with short exponential backoff.
 * Only retries on transient errors (5xx, connection resets and refusals).
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = { label: 'fetch' }): Promise<T> {
  const maxRetries = opts.retries ?? 1;
  const baseDelay = opts.baseDelayMs ?? 250;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;
      if (attempt >= maxRetries || opts.signal?.aborted || !isTransient(err)) {
        throw err;
      }
      const delay = baseDelay * Math.pow(2, attempt);
      log.warn(
        { event: 'retry', label: opts.label, attempt: attempt + 1, maxRetries, delayMs: delay },
        `${opts.label} transient error, retrying`,
      );
      await sleep(delay);
    }
  }
  throw lastError;
}

export function isTransient(err: unknown): boolean {
  if (err instanceof Error) {
    if (err.name === 'AbortError') return false;
    const msg = err.message.toLowerCase();
    if (msg.includes('econnreset') || msg.includes('econnrefused') || msg.includes('fetch failed')) {
      return true;
    }
    if (/\b5\d{2}\b/.test(msg)) return true;
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
