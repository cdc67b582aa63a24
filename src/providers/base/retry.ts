/**
 * Retry with exponential backoff for registrar calls
 */
import { CancelledError, toRegistrarError, type RegistrarError } from '../../core/errors.js';

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts: number;
  backoffBaseMs: number;
  signal?: AbortSignal;
  onRetry?: (error: RegistrarError, attempt: number, delayMs: number) => void;
}

/**
 * Delay before the attempt that follows `attempt` (1-based): base, 2×base, 4×base…
 */
export function backoffDelay(backoffBaseMs: number, attempt: number): number {
  return backoffBaseMs * 2 ** (attempt - 1);
}

/**
 * Resolve after `ms`, or reject with CancelledError once `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the
 * attempts are used up. The last error is rethrown as a RegistrarError.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const mapped = toRegistrarError(error);
      if (!mapped.retryable || attempt >= attempts) {
        throw mapped;
      }

      const delayMs = backoffDelay(options.backoffBaseMs, attempt);
      options.onRetry?.(mapped, attempt, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
