/**
 * Tests for fetch-retry config utilities
 *
 * Test coverage includes:
 * - Boundary value analysis: backoff cap and jitter range
 * - Decision/Branch coverage: retryable classification
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  isRetryableError,
  mergeConfig,
  sleep,
} from '../src/config.mjs';

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe('calculateBackoffDelay', () => {
  it('should double the delay per attempt without jitter', () => {
    const config = { baseDelayMs: 100, maxDelayMs: 10000, jitterFactor: 0 };

    expect([0, 1, 2, 3].map((attempt) => calculateBackoffDelay(attempt, config))).toEqual([100, 200, 400, 800]);
  });

  it('should cap at maxDelayMs', () => {
    expect(calculateBackoffDelay(10, { baseDelayMs: 1000, maxDelayMs: 5000, jitterFactor: 0 })).toBe(5000);
  });

  it('should spread delays around the exponential value', () => {
    const config = { baseDelayMs: 1000, maxDelayMs: 30000, jitterFactor: 0.5 };

    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoffDelay(0, config)).toBe(750);

    vi.spyOn(Math, 'random').mockReturnValue(0.999);
    expect(calculateBackoffDelay(0, config)).toBe(1249);
  });
});

describe('isRetryableError', () => {
  it('should honor an explicit flag', () => {
    const retryable = Object.assign(new Error('x'), { isRetryable: true });
    const fatal = Object.assign(new Error('x'), { isRetryable: false, code: 'ECONNRESET' });

    expect(isRetryableError(retryable, {})).toBe(true);
    expect(isRetryableError(fatal, {})).toBe(false);
  });

  it('should match listed codes', () => {
    expect(isRetryableError(Object.assign(new Error('x'), { code: 'ECONNRESET' }), {})).toBe(true);
    expect(isRetryableError(Object.assign(new Error('x'), { code: 'EACCES' }), {})).toBe(false);
    expect(isRetryableError(Object.assign(new Error('x'), { code: 'EACCES' }), { retryOnErrors: ['EACCES'] })).toBe(true);
  });

  it('should follow the cause chain', () => {
    const cause = Object.assign(new Error('inner'), { code: 'EPIPE' });

    expect(isRetryableError(new Error('outer', { cause }), {})).toBe(true);
  });

  it('should not retry plain errors or non-objects', () => {
    expect(isRetryableError(new Error('network went away'), {})).toBe(false);
    expect(isRetryableError('ECONNRESET', {})).toBe(false);
    expect(isRetryableError(null, {})).toBe(false);
  });
});

describe('mergeConfig', () => {
  it('should fill defaults', () => {
    expect(mergeConfig({ maxRetries: 1 })).toEqual({ ...DEFAULT_RETRY_CONFIG, maxRetries: 1 });
    expect(mergeConfig()).toEqual(DEFAULT_RETRY_CONFIG);
  });
});

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    const pending = sleep(100).then(done);
    await vi.advanceTimersByTimeAsync(99);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;

    expect(done).toHaveBeenCalledTimes(1);
  });

  it('should reject when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(10000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow('Aborted');
  });

  it('should reject immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(10, controller.signal)).rejects.toThrow('Aborted');
  });
});
