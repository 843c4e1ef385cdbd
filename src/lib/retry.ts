import { logger } from './logger.js';

/** Delay before the next attempt, given the attempt that just failed (1-based). */
export type DelayFn = (failedAttempt: number) => number;

export interface RetryOptions {
  maxAttempts: number;
  delay: DelayFn;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

export const fixedDelay = (ms: number): DelayFn => () => ms;

export const linearDelay = (stepMs: number): DelayFn => (failedAttempt) => stepMs * failedAttempt;

/** Doubles after every failed attempt, starting at `baseMs`. */
export const exponentialDelay = (baseMs: number): DelayFn => (failedAttempt) => baseMs * 2 ** (failedAttempt - 1);

export const noDelay: DelayFn = () => 0;

const defaultSleep = (ms: number) =>
  ms > 0 ? new Promise<void>(resolve => setTimeout(resolve, ms)) : Promise.resolve();

// No jitter: the delay comes straight from the policy.
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxAttempts, delay, shouldRetry = () => true, onRetry, sleep = defaultSleep } = options;

  if (maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
  }

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = Math.max(0, delay(attempt));

      logger.warn(
        { attempt, maxAttempts, delayMs, error: String(error) },
        'Retrying after error',
      );

      await onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }

  throw lastError;
}
