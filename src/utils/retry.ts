/**
 * Backoff helpers shared by the lister, the executor and the contents cleaner.
 *
 * Sleep and randomness are injected so retry loops can be driven without
 * waiting on real time.
 */

import type { RetryPolicy } from '../config/settings.js';
import type { ApiError, ApiResult } from './errors.js';

export type Sleep = (ms: number) => Promise<void>;
export type Random = () => number;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff with equal jitter for a 1-based attempt number:
 * half of the capped delay is fixed, the other half is random.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: Random = Math.random): number {
  const capped = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
  const half = capped / 2;
  return Math.round(half + random() * half);
}

/**
 * Wait before the next attempt. A Retry-After hint is honoured but kept between
 * the fixed half of the computed backoff and policy.maxDelayMs, so a hint of 0
 * still backs off and a far-future hint cannot stall the run.
 */
export function retryDelay(error: ApiError, attempt: number, policy: RetryPolicy, random: Random = Math.random): number {
  if (error.retryAfterMs === undefined) {
    return backoffDelay(attempt, policy, random);
  }
  const floor = backoffDelay(attempt, policy, () => 0);
  return Math.min(policy.maxDelayMs, Math.max(floor, error.retryAfterMs));
}

export interface RetryOptions {
  policy: RetryPolicy;
  sleep: Sleep;
  random: Random;
  onRetry?: (error: ApiError, attempt: number, delayMs: number) => void;
}

/**
 * Repeat a call while it fails with a transient error, up to policy.maxAttempts
 * calls in total. Returns the last result and how many calls were made.
 */
export async function withRetry<T>(
  call: () => Promise<ApiResult<T>>,
  options: RetryOptions
): Promise<{ result: ApiResult<T>; attempts: number }> {
  let attempts = 0;

  for (;;) {
    attempts++;
    const result = await call();

    if (result.success || !result.error.isTransient || attempts >= options.policy.maxAttempts) {
      return { result, attempts };
    }

    const delay = retryDelay(result.error, attempts, options.policy, options.random);
    options.onRetry?.(result.error, attempts, delay);
    await options.sleep(delay);
  }
}
