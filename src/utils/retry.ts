/**
 * Retry Logic with Exponential Backoff
 *
 * Only errors the caller marks retryable are repeated. Each attempt calls
 * `fn` again from scratch, so URL validation and DNS pinning run anew.
 */

import { logger } from './logger.js';

const log = logger.retry;

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Initial delay before first retry in milliseconds.
   * @default 500
   */
  initialDelayMs?: number;

  /**
   * Maximum delay between retries in milliseconds.
   * @default 5000
   */
  maxDelayMs?: number;

  /**
   * delay = min(initialDelayMs * backoffMultiplier^retryCount, maxDelayMs)
   * @default 2
   */
  backoffMultiplier?: number;

  /**
   * Return true to retry, false to throw immediately.
   * @default never retries
   */
  retryOn?: (error: Error, attempt: number) => boolean;

  /**
   * Delay requested by the error itself (e.g. Retry-After), capped by maxDelayMs
   */
  delayFor?: (error: Error) => number | undefined;

  /**
   * Invoked before each retry attempt
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;

  /**
   * Aborting stops further attempts and interrupts the backoff wait
   */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  retryOn: (): boolean => false,
  delayFor: (): number | undefined => undefined,
  onRetry: (): void => {},
};

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Execute an async function with retry on failure and report the attempt
 * count.
 *
 * @example
 * ```typescript
 * const { value, attempts } = await withRetry(
 *   () => transport.execute(request),
 *   { maxAttempts: 3, retryOn: (e) => isRecipeError(e) && isRetryableKind(e.kind) }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let delay = opts.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (
        attempt >= opts.maxAttempts ||
        opts.signal?.aborted === true ||
        !opts.retryOn(lastError, attempt)
      ) {
        throw lastError;
      }

      const requested = opts.delayFor(lastError);
      const waitMs = Math.min(requested ?? delay, opts.maxDelayMs);

      opts.onRetry(attempt, lastError, waitMs);
      log.warn('Retry attempt failed', {
        attempt,
        maxAttempts: opts.maxAttempts,
        error: lastError.message,
        retryDelayMs: waitMs,
      });

      await sleep(waitMs, opts.signal);
      if (opts.signal?.aborted) {
        throw lastError;
      }

      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted === true) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
