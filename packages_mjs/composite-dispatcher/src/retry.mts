/**
 * Caller-level retry around composite dispatch
 */
import { RetryExecutor } from '@llm-dispatch/fetch-retry';
import type { RetryExecutorConfig, RetryResult } from '@llm-dispatch/fetch-retry';
import type { RequestEnvelope } from '@llm-dispatch/fetch-client';
import type { CompositeResult, DispatchOptions, TargetSelector } from './types.mjs';
import type { CompositeDispatcher } from './dispatcher.mjs';

export interface RetryDispatchOptions extends DispatchOptions {
  /** Executor to use, or the config for a new one */
  retry?: RetryExecutor | RetryExecutorConfig;
}

/**
 * Dispatch, retrying composite failures whose every provider error is
 * transient (rate-limit, server-error, timeout, network).
 *
 * Errors such as NoProviderConfiguredError are never retried.
 */
export function dispatchWithRetry(
  dispatcher: CompositeDispatcher,
  envelope: RequestEnvelope,
  targets?: readonly TargetSelector[],
  options: RetryDispatchOptions = {}
): Promise<RetryResult<CompositeResult>> {
  const { retry, ...dispatchOptions } = options;
  const executor = retry instanceof RetryExecutor ? retry : new RetryExecutor(retry);

  return executor.execute(() => dispatcher.dispatch(envelope, targets, dispatchOptions), {
    signal: options.signal,
    metadata: { policy: dispatchOptions.policy },
  });
}
