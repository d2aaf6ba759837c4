/**
 * Main retry executor implementation
 */

import { createLogger } from '@llm-dispatch/logger';
import type {
  RetryConfig,
  RetryOptions,
  RetryResult,
  RetryEvent,
  RetryEventListener,
  RetryExecutorConfig,
} from './types.mjs';
import { mergeConfig, calculateBackoffDelay, isRetryableError, sleep } from './config.mjs';

const log = createLogger('fetch-retry.executor');

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Retry Executor
 *
 * Provides retry logic with:
 * - Configurable max retries
 * - Exponential backoff with jitter
 * - Error filtering
 * - Abort signal support
 * - Event emission for observability
 */
export class RetryExecutor {
  private readonly config: Required<RetryConfig>;
  private readonly id: string;
  private readonly listeners: Set<RetryEventListener> = new Set();

  constructor(config: RetryExecutorConfig = {}) {
    const { id, ...retryConfig } = config;
    this.config = mergeConfig(retryConfig);
    this.id = id ?? `retry-${Date.now()}`;
  }

  /**
   * Emit an event to all listeners
   */
  private emit(event: RetryEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.warn({ err: error, executorId: this.id, type: event.type }, 'Retry listener threw');
      }
    }
  }

  /**
   * Execute a function with retry logic
   *
   * @param fn - Async function to execute
   * @param options - Retry options for this execution
   * @returns Promise resolving to the result with retry metadata
   *
   * @example
   * const executor = new RetryExecutor({ maxRetries: 3 });
   * const { result } = await executor.execute(() => dispatcher.dispatch(envelope));
   */
  async execute<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<RetryResult<T>> {
    const { maxRetries = this.config.maxRetries, signal, metadata, shouldRetry } = options;
    const startTime = Date.now();
    let delayTime = 0;
    let attempt = 0;

    for (;;) {
      if (signal?.aborted) {
        this.emit({ type: 'retry:abort', attempt, reason: 'Aborted by signal', metadata });
        throw new Error('Retry aborted', { cause: signal.reason });
      }

      this.emit({ type: 'attempt:start', attempt, metadata });
      const attemptStart = Date.now();

      let lastError: Error;
      try {
        const result = await fn();

        this.emit({
          type: 'attempt:success',
          attempt,
          durationMs: Date.now() - attemptStart,
          metadata,
        });

        return {
          result,
          retries: attempt,
          totalTimeMs: Date.now() - startTime,
          delayTimeMs: delayTime,
        };
      } catch (error) {
        lastError = toError(error);
      }

      const willRetry = await this.shouldRetryAttempt(lastError, attempt, maxRetries, shouldRetry);
      this.emit({ type: 'attempt:fail', attempt, error: lastError, willRetry, metadata });

      if (!willRetry) {
        throw lastError;
      }

      const delay = calculateBackoffDelay(attempt, this.config);
      delayTime += delay;
      this.emit({ type: 'retry:wait', attempt, delayMs: delay, metadata });
      log.debug({ executorId: this.id, attempt, delayMs: delay, ...metadata }, 'Retrying after backoff');

      try {
        await sleep(delay, signal);
      } catch (error) {
        this.emit({ type: 'retry:abort', attempt, reason: 'Aborted during backoff', metadata });
        throw new Error('Retry aborted', { cause: error });
      }
      attempt++;
    }
  }

  /**
   * Determine if we should retry after a failure
   */
  private async shouldRetryAttempt(
    error: Error,
    attempt: number,
    maxRetries: number,
    customShouldRetry?: RetryOptions['shouldRetry']
  ): Promise<boolean> {
    if (attempt >= maxRetries) {
      return false;
    }

    if (customShouldRetry) {
      return customShouldRetry(error, attempt);
    }

    return isRetryableError(error, this.config);
  }

  /**
   * Add an event listener
   *
   * @returns Function to remove the listener
   */
  on(listener: RetryEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove an event listener
   */
  off(listener: RetryEventListener): void {
    this.listeners.delete(listener);
  }

  getId(): string {
    return this.id;
  }

  getConfig(): Required<RetryConfig> {
    return { ...this.config };
  }
}

/**
 * Create a new retry executor
 */
export function createRetryExecutor(config?: RetryExecutorConfig): RetryExecutor {
  return new RetryExecutor(config);
}

/**
 * Execute a function with retry logic (convenience function)
 *
 * @example
 * const { result } = await retry(() => dispatcher.dispatch(envelope), { maxRetries: 2 });
 */
export async function retry<T>(
  fn: () => Promise<T>,
  config?: RetryConfig & RetryOptions
): Promise<RetryResult<T>> {
  const executor = new RetryExecutor(config);
  return executor.execute(fn, config);
}

export default {
  RetryExecutor,
  createRetryExecutor,
  retry,
};
