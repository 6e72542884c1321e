/**
 * Bounded retry with exponential backoff and full jitter
 */

import { CwtailError, toCwtailError, ErrorContext } from './errors';
import { logger } from './logger';

export interface RetryConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay cap for the first retry */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 200,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

export interface RetryHooks {
  /** Aborts waiting and further attempts */
  signal?: AbortSignal;
  /** Called before each backoff sleep */
  onRetry?: (error: CwtailError, attempt: number, delayMs: number) => void;
  /** Source of randomness in [0, 1), replaceable in tests */
  random?: () => number;
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Added to any error surfaced from the operation */
  context?: ErrorContext;
}

/**
 * Sleeps for `ms`, resolving early (without error) when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
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

/**
 * Settles like `promise`, or rejects as soon as `signal` aborts so callers
 * never wait on an operation that ignores the signal
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(signal.reason instanceof Error ? signal.reason : new Error('The operation was aborted'));
    };
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay before retry number `attempt` (1-based): a uniformly random value in
 * [0, min(maxDelayMs, baseDelayMs * multiplier^(attempt-1))].
 */
export function backoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const ceiling = Math.min(
    config.maxDelayMs,
    config.baseDelayMs * Math.pow(config.backoffMultiplier, Math.max(0, attempt - 1))
  );
  return Math.floor(random() * ceiling);
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * uses up `maxAttempts`. Every failure is normalized through
 * {@link toCwtailError}, so callers only ever see the taxonomy.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  operationName: string,
  config: Partial<RetryConfig> = {},
  hooks: RetryHooks = {}
): Promise<T> {
  const retryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const classified = toCwtailError(error, hooks.context);

      if (!classified.retryable || attempt >= retryConfig.maxAttempts || hooks.signal?.aborted) {
        if (classified.retryable && attempt >= retryConfig.maxAttempts) {
          logger.debug(`${operationName} failed after ${attempt} attempt(s)`);
          classified.withContext({ attempts: attempt });
        }
        throw classified;
      }

      const delayMs = backoffDelay(attempt, retryConfig, hooks.random);
      logger.debug(
        `${operationName} failed (${classified.name}: ${classified.message}), retry ${attempt} in ${delayMs}ms`
      );
      hooks.onRetry?.(classified, attempt, delayMs);
      await wait(delayMs, hooks.signal);
    }
  }
}
