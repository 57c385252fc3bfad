/**
 * Backoff computation and the retry loop
 */

import { describe, expect, it, vi } from 'vitest';
import { ApiError, ok } from '../../src/utils/errors.js';
import { backoffDelay, retryDelay, withRetry } from '../../src/utils/retry.js';
import { apiFailure, createSleep, TEST_POLICY } from '../helpers/fixtures.js';

describe('backoffDelay', () => {
  it('doubles per attempt and keeps half of it fixed', () => {
    expect(backoffDelay(1, TEST_POLICY, () => 0)).toBe(50);
    expect(backoffDelay(2, TEST_POLICY, () => 0)).toBe(100);
    expect(backoffDelay(3, TEST_POLICY, () => 1)).toBe(400);
  });

  it('caps the delay at maxDelayMs', () => {
    expect(backoffDelay(10, TEST_POLICY, () => 1)).toBe(1_000);
    expect(backoffDelay(10, TEST_POLICY, () => 0)).toBe(500);
  });
});

describe('retryDelay', () => {
  it('uses the Retry-After hint within the backoff bounds', () => {
    const error = new ApiError('rateLimited', 'slow down', { retryAfterMs: 700 });

    expect(retryDelay(error, 1, TEST_POLICY, () => 0)).toBe(700);
  });

  it('caps a Retry-After hint at maxDelayMs', () => {
    const error = new ApiError('rateLimited', 'slow down', { retryAfterMs: 86_400_000 });

    expect(retryDelay(error, 1, TEST_POLICY, () => 1)).toBe(1_000);
  });

  it('backs off at least the fixed half when Retry-After is zero', () => {
    const error = new ApiError('rateLimited', 'slow down', { retryAfterMs: 0 });

    expect(retryDelay(error, 1, TEST_POLICY, () => 1)).toBe(50);
    expect(retryDelay(error, 3, TEST_POLICY, () => 1)).toBe(200);
  });

  it('falls back to backoff without a hint', () => {
    expect(retryDelay(new ApiError('serverError', 'boom'), 2, TEST_POLICY, () => 0.5)).toBe(150);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const call = vi.fn().mockResolvedValue(ok('done'));

    const { result, attempts } = await withRetry(call, { policy: TEST_POLICY, sleep: createSleep(), random: () => 0 });

    expect(result).toEqual({ success: true, value: 'done' });
    expect(attempts).toBe(1);
  });

  it('stops at maxAttempts on transient failures', async () => {
    const call = vi.fn().mockResolvedValue(apiFailure('network', 'reset'));
    const sleep = createSleep();
    const onRetry = vi.fn();

    const { result, attempts } = await withRetry(call, { policy: TEST_POLICY, sleep, random: () => 0, onRetry });

    expect(result.success).toBe(false);
    expect(attempts).toBe(3);
    expect(sleep.mock.calls).toEqual([[50], [100]]);
    expect(onRetry.mock.calls.map((c) => [c[1], c[2]])).toEqual([
      [1, 50],
      [2, 100],
    ]);
  });

  it('sleeps no longer than maxDelayMs for a far-future Retry-After', async () => {
    const call = vi
      .fn()
      .mockResolvedValueOnce(apiFailure('rateLimited', 'slow down', 86_400_000))
      .mockResolvedValueOnce(ok('done'));
    const sleep = createSleep();

    const { result, attempts } = await withRetry(call, { policy: TEST_POLICY, sleep, random: () => 0 });

    expect(result.success).toBe(true);
    expect(attempts).toBe(2);
    expect(sleep.mock.calls).toEqual([[1_000]]);
  });

  it('does not retry permanent failures', async () => {
    const call = vi.fn().mockResolvedValue(apiFailure('notFound', 'gone'));
    const sleep = createSleep();

    const { attempts } = await withRetry(call, { policy: TEST_POLICY, sleep, random: () => 0 });

    expect(attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
