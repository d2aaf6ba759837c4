/**
 * @llm-dispatch/fetch-retry
 * Caller-level retry with exponential backoff and jitter
 * Pure ESM module
 */

// Type exports
export * from './types.mjs';

// Config exports
export * from './config.mjs';
export { default as config } from './config.mjs';

// Executor exports
export * from './executor.mjs';
export { RetryExecutor as default } from './executor.mjs';
