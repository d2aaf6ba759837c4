/**
 * Type definitions for fetch-retry
 */

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retries. Default: 3 */
  maxRetries?: number;
  /** Base delay for exponential backoff (ms). Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay between retries (ms). Default: 30000 */
  maxDelayMs?: number;
  /** Jitter factor (0-1). Default: 0.5 */
  jitterFactor?: number;
  /** Error codes that should trigger retry */
  retryOnErrors?: string[];
}

/**
 * Options for individual retry operations
 */
export interface RetryOptions {
  /** Override max retries for this operation */
  maxRetries?: number;
  /** Signal for cancellation; also interrupts backoff sleeps */
  signal?: AbortSignal;
  /** Metadata for logging/debugging */
  metadata?: Record<string, unknown>;
  /** Custom should-retry predicate for this operation; overrides error classification */
  shouldRetry?: (error: Error, attempt: number) => boolean | Promise<boolean>;
}

/**
 * Result of a retried operation
 */
export interface RetryResult<T> {
  /** The result of the operation */
  result: T;
  /** Number of retries attempted (0 if succeeded on first try) */
  retries: number;
  /** Total time spent including retries (ms) */
  totalTimeMs: number;
  /** Time spent in backoff delays (ms) */
  delayTimeMs: number;
}

/**
 * Events emitted by the retry executor
 */
export type RetryEvent =
  | { type: 'attempt:start'; attempt: number; metadata?: Record<string, unknown> }
  | { type: 'attempt:success'; attempt: number; durationMs: number; metadata?: Record<string, unknown> }
  | { type: 'attempt:fail'; attempt: number; error: Error; willRetry: boolean; metadata?: Record<string, unknown> }
  | { type: 'retry:wait'; attempt: number; delayMs: number; metadata?: Record<string, unknown> }
  | { type: 'retry:abort'; attempt: number; reason: string; metadata?: Record<string, unknown> };

/**
 * Event listener type
 */
export type RetryEventListener = (event: RetryEvent) => void;

/**
 * Executor configuration
 */
export interface RetryExecutorConfig extends RetryConfig {
  /** Unique identifier for this executor instance */
  id?: string;
}

/**
 * Error with retry hints
 */
export interface RetryableError extends Error {
  code?: string;
  isRetryable?: boolean;
}
