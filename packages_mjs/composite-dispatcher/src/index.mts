/**
 * @llm-dispatch/composite-dispatcher
 *
 * Fans one chat request out to several providers and merges the answers
 * under a merge policy, with an optional deadline over the whole call.
 *
 * @example
 * ```typescript
 * import { ProviderClient, createChatEnvelope } from '@llm-dispatch/fetch-client';
 * import { CompositeDispatcher } from '@llm-dispatch/composite-dispatcher';
 *
 * const dispatcher = new CompositeDispatcher({ policy: 'first-success', deadlineMs: 15_000 });
 * dispatcher.register(new ProviderClient({ providerId: 'a', apiKey: keyA, baseUrl: urlA }));
 * dispatcher.register(new ProviderClient({ providerId: 'b', apiKey: keyB, baseUrl: urlB }));
 *
 * const result = await dispatcher.dispatch(createChatEnvelope(messages, 'model-a'));
 * console.log(result.winner, result.mergedBody);
 * await dispatcher.close();
 * ```
 */

// Types
export type {
  MergePolicy,
  CompositeCallState,
  BodyMerger,
  TargetSelector,
  CompositeDispatcherConfig,
  DispatchOptions,
  CompositeResult,
  CompositeEndEvent,
} from './types.mjs';

// Errors
export {
  NoProviderConfiguredError,
  UnknownProviderError,
  DuplicateProviderError,
  PartialFailureError,
  AllProvidersFailedError,
  TRANSIENT_KINDS,
} from './errors.mjs';

// Core
export { CompositeDispatcher, MERGE_POLICIES, DEFAULT_MERGE_POLICY } from './dispatcher.mjs';
export { CompositeCall, type CompositeCallOptions } from './call.mjs';
export { defaultMerger, mergeChatCompletions } from './merge.mjs';
export { dispatchWithRetry, type RetryDispatchOptions } from './retry.mjs';

// Diagnostics
export { CHANNELS, emitCompositeEnd, onCompositeEnd } from './diagnostics.mjs';
