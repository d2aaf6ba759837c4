/**
 * Configuration utilities for fetch-retry
 */

import type { RetryConfig } from './types.mjs';

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.5,
  retryOnErrors: ['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED', 'EPIPE', 'UND_ERR_SOCKET'],
};

/**
 * Calculate exponential backoff delay with jitter
 *
 * delay = cap * (1 - jitter/2) + random(0, jitter * cap), where
 * cap = min(maxDelay, base * 2^attempt)
 *
 * @param attempt - The current attempt number (0-indexed)
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig): number {
  const {
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor = DEFAULT_RETRY_CONFIG.jitterFactor,
  } = config;

  const exponentialDelay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));

  const jitter = Math.random() * jitterFactor * exponentialDelay;
  const delay = exponentialDelay * (1 - jitterFactor / 2) + jitter;

  return Math.floor(Math.min(delay, maxDelayMs));
}

function readCode(error: object): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Check if an error should trigger a retry
 *
 * An explicit `isRetryable` flag wins; otherwise the error's `code`
 * (or its cause's) must be listed in retryOnErrors.
 */
export function isRetryableError(error: unknown, config: RetryConfig): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  if ('isRetryable' in error && typeof error.isRetryable === 'boolean') {
    return error.isRetryable;
  }

  const { retryOnErrors = DEFAULT_RETRY_CONFIG.retryOnErrors } = config;
  const code = readCode(error);
  if (code && retryOnErrors.includes(code)) {
    return true;
  }

  if (error instanceof Error && error.cause !== undefined) {
    return isRetryableError(error.cause, config);
  }

  return false;
}

/**
 * Merge configurations with defaults
 */
export function mergeConfig(config: RetryConfig = {}): Required<RetryConfig> {
  return {
    maxRetries: config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: config.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryOnErrors: config.retryOnErrors ?? DEFAULT_RETRY_CONFIG.retryOnErrors,
  };
}

/**
 * Sleep for a specified duration
 *
 * @returns Promise that resolves after the delay, or rejects when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted', { cause: signal.reason }));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeout);
      reject(new Error('Aborted', { cause: signal?.reason }));
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export default {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  isRetryableError,
  mergeConfig,
  sleep,
};
