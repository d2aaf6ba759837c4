/**
 * Tests for fetch-retry executor
 *
 * Test coverage includes:
 * - Decision/Branch coverage: retry, give up, abort
 * - Loop testing: zero, one and many retries
 * - State transition testing: attempt events
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RetryExecutor, createRetryExecutor, retry } from '../src/executor.mjs';
import type { RetryEvent } from '../src/types.mjs';

function codedError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function flaggedError(message: string, isRetryable: boolean): Error {
  return Object.assign(new Error(message), { isRetryable });
}

describe('RetryExecutor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should create executor with default config', () => {
      const executor = new RetryExecutor();

      expect(executor.getConfig()).toMatchObject({
        maxRetries: 3,
        baseDelayMs: 1000,
        maxDelayMs: 30000,
        jitterFactor: 0.5,
      });
      expect(executor.getId()).toMatch(/^retry-/);
    });

    it('should use provided ID and config', () => {
      const executor = createRetryExecutor({ id: 'custom-id', maxRetries: 5 });

      expect(executor.getId()).toBe('custom-id');
      expect(executor.getConfig().maxRetries).toBe(5);
    });
  });

  describe('execute - success path', () => {
    it('should return result on immediate success', async () => {
      const executor = new RetryExecutor();
      const fn = vi.fn().mockResolvedValue('success');

      const result = await executor.execute(fn);

      expect(result).toMatchObject({ result: 'success', retries: 0, delayTimeMs: 0 });
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe('execute - retry path', () => {
    it('should retry errors flagged retryable', async () => {
      const executor = new RetryExecutor({ maxRetries: 3, baseDelayMs: 100, jitterFactor: 0 });
      const fn = vi
        .fn()
        .mockRejectedValueOnce(flaggedError('rate limited', true))
        .mockResolvedValue('success');

      const resultPromise = executor.execute(fn);
      await vi.runAllTimersAsync();
      const result = await resultPromise;

      expect(result).toMatchObject({ result: 'success', retries: 1, delayTimeMs: 100 });
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should retry errors with a listed code and back off exponentially', async () => {
      const executor = new RetryExecutor({ maxRetries: 5, baseDelayMs: 100, jitterFactor: 0 });
      const fn = vi
        .fn()
        .mockRejectedValueOnce(codedError('reset', 'ECONNRESET'))
        .mockRejectedValueOnce(codedError('refused', 'ECONNREFUSED'))
        .mockRejectedValueOnce(codedError('socket', 'UND_ERR_SOCKET'))
        .mockResolvedValue('success');

      const resultPromise = executor.execute(fn);
      await vi.runAllTimersAsync();
      const result = await resultPromise;

      expect(result.retries).toBe(3);
      expect(result.delayTimeMs).toBe(100 + 200 + 400);
    });
  });

  describe('execute - failure path', () => {
    it('should throw after exhausting retries', async () => {
      const executor = new RetryExecutor({ maxRetries: 2, baseDelayMs: 100, jitterFactor: 0 });
      const fn = vi.fn().mockRejectedValue(flaggedError('server error', true));

      const resultPromise = executor.execute(fn);

      await Promise.all([vi.runAllTimersAsync(), expect(resultPromise).rejects.toThrow('server error')]);
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should throw immediately for non-retryable errors', async () => {
      const executor = new RetryExecutor({ maxRetries: 3 });
      const fn = vi.fn().mockRejectedValue(new Error('validation error'));

      await expect(executor.execute(fn)).rejects.toThrow('validation error');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should wrap non-Error rejections', async () => {
      const executor = new RetryExecutor({ maxRetries: 0 });

      await expect(executor.execute(() => Promise.reject('plain string'))).rejects.toThrow('plain string');
    });
  });

  describe('execute - abort handling', () => {
    it('should abort if signal is already aborted', async () => {
      const executor = new RetryExecutor();
      const controller = new AbortController();
      controller.abort();
      const fn = vi.fn().mockResolvedValue('success');

      await expect(executor.execute(fn, { signal: controller.signal })).rejects.toThrow('Retry aborted');
      expect(fn).not.toHaveBeenCalled();
    });

    it('should abort during retry wait', async () => {
      const executor = new RetryExecutor({ maxRetries: 3, baseDelayMs: 1000, jitterFactor: 0 });
      const controller = new AbortController();
      const events: RetryEvent[] = [];
      executor.on((event) => events.push(event));
      const fn = vi.fn().mockRejectedValue(flaggedError('busy', true));

      const resultPromise = executor.execute(fn, { signal: controller.signal });
      await vi.advanceTimersByTimeAsync(0);
      controller.abort();

      await expect(resultPromise).rejects.toThrow('Retry aborted');
      expect(fn).toHaveBeenCalledTimes(1);
      expect(events.at(-1)).toMatchObject({ type: 'retry:abort', reason: 'Aborted during backoff' });
    });
  });

  describe('execute - custom shouldRetry', () => {
    it('should let the predicate refuse a retryable error', async () => {
      const executor = new RetryExecutor({ maxRetries: 3, baseDelayMs: 100, jitterFactor: 0 });
      const shouldRetry = vi.fn().mockReturnValue(false);
      const fn = vi.fn().mockRejectedValue(flaggedError('busy', true));

      await expect(executor.execute(fn, { shouldRetry })).rejects.toThrow('busy');
      expect(shouldRetry).toHaveBeenCalledWith(expect.any(Error), 0);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should await an async predicate', async () => {
      const executor = new RetryExecutor({ maxRetries: 3, baseDelayMs: 100, jitterFactor: 0 });
      const shouldRetry = vi.fn().mockResolvedValue(true);
      const fn = vi.fn().mockRejectedValueOnce(new Error('custom error')).mockResolvedValue('success');

      const resultPromise = executor.execute(fn, { shouldRetry });
      await vi.runAllTimersAsync();

      expect((await resultPromise).result).toBe('success');
      expect(shouldRetry).toHaveBeenCalledTimes(1);
    });

    it('should not consult the predicate once retries are exhausted', async () => {
      const executor = new RetryExecutor({ maxRetries: 0 });
      const shouldRetry = vi.fn().mockReturnValue(true);

      await expect(executor.execute(() => Promise.reject(new Error('x')), { shouldRetry })).rejects.toThrow('x');
      expect(shouldRetry).not.toHaveBeenCalled();
    });
  });

  describe('execute - maxRetries override', () => {
    it('should use maxRetries from options', async () => {
      const executor = new RetryExecutor({ maxRetries: 1, baseDelayMs: 100, jitterFactor: 0 });
      const fn = vi.fn().mockRejectedValue(flaggedError('busy', true));

      const resultPromise = executor.execute(fn, { maxRetries: 5 });

      await Promise.all([vi.runAllTimersAsync(), expect(resultPromise).rejects.toThrow('busy')]);
      expect(fn).toHaveBeenCalledTimes(6);
    });
  });

  describe('event emission', () => {
    it('should emit the attempt sequence with metadata', async () => {
      const executor = new RetryExecutor({ maxRetries: 2, baseDelayMs: 100, jitterFactor: 0 });
      const events: RetryEvent[] = [];
      executor.on((event) => events.push(event));
      const metadata = { callId: 'call-1' };
      const fn = vi.fn().mockRejectedValueOnce(flaggedError('busy', true)).mockResolvedValue('success');

      const resultPromise = executor.execute(fn, { metadata });
      await vi.runAllTimersAsync();
      await resultPromise;

      expect(events.map((event) => event.type)).toEqual([
        'attempt:start',
        'attempt:fail',
        'retry:wait',
        'attempt:start',
        'attempt:success',
      ]);
      expect(events[1]).toMatchObject({ attempt: 0, willRetry: true });
      expect(events[2]).toMatchObject({ delayMs: 100 });
      expect(events.every((event) => event.metadata === metadata)).toBe(true);
    });

    it('should keep running when a listener throws', async () => {
      const executor = new RetryExecutor();
      executor.on(() => {
        throw new Error('Listener error');
      });

      const result = await executor.execute(() => Promise.resolve('success'));

      expect(result.result).toBe('success');
    });

    it('should stop notifying removed listeners', async () => {
      const executor = new RetryExecutor();
      const listener = vi.fn();
      const unsubscribe = executor.on(listener);
      const other = vi.fn();
      executor.on(other);
      unsubscribe();
      executor.off(other);

      await executor.execute(() => Promise.resolve('success'));

      expect(listener).not.toHaveBeenCalled();
      expect(other).not.toHaveBeenCalled();
    });
  });
});

describe('retry', () => {
  it('should run with an ad-hoc config', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(codedError('timeout', 'ETIMEDOUT'))
      .mockResolvedValue('done');

    const result = await retry(fn, { maxRetries: 1, baseDelayMs: 1, jitterFactor: 0 });

    expect(result).toMatchObject({ result: 'done', retries: 1 });
  });
});
