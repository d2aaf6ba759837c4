/**
 * Errors for @llm-dispatch/composite-dispatcher
 */
import type { ErrorKind, ProviderResult } from '@llm-dispatch/fetch-client';

const TRANSIENT_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'rate-limit',
  'server-error',
  'timeout',
  'network',
]);

function failedIds(results: readonly ProviderResult[]): string[] {
  return results.filter((result) => result.status === 'error').map((result) => result.providerId);
}

/**
 * dispatch was called with no targets
 */
export class NoProviderConfiguredError extends Error {
  readonly code = 'NO_PROVIDER_CONFIGURED';

  constructor() {
    super('No provider configured for composite call');
    this.name = 'NoProviderConfiguredError';
  }
}

/**
 * A target id that was never registered
 */
export class UnknownProviderError extends Error {
  readonly code = 'UNKNOWN_PROVIDER';
  readonly providerId: string;

  constructor(providerId: string) {
    super(`Unknown provider: ${providerId}`);
    this.name = 'UnknownProviderError';
    this.providerId = providerId;
  }
}

/**
 * A second target registered under an id already in use
 */
export class DuplicateProviderError extends Error {
  readonly code = 'DUPLICATE_PROVIDER';
  readonly providerId: string;

  constructor(providerId: string, message = `Provider already registered: ${providerId}`) {
    super(message);
    this.name = 'DuplicateProviderError';
    this.providerId = providerId;
  }
}

/**
 * Failure of a composite call that carries its per-provider results.
 *
 * `isRetryable` is true when every failure is transient, which is what
 * RetryExecutor consults.
 */
abstract class CompositeFailureError extends Error {
  abstract readonly code: string;
  readonly callId: string;
  readonly failedProviderIds: string[];
  readonly results: ProviderResult[];

  constructor(message: string, callId: string, results: ProviderResult[]) {
    super(message);
    this.callId = callId;
    this.results = results;
    this.failedProviderIds = failedIds(results);
  }

  get isRetryable(): boolean {
    return this.results.every(
      (result) => result.status === 'ok' || TRANSIENT_KINDS.has(result.body.kind)
    );
  }
}

/**
 * all-required: at least one target failed
 */
export class PartialFailureError extends CompositeFailureError {
  readonly code = 'PARTIAL_FAILURE';

  constructor(callId: string, results: ProviderResult[]) {
    super(`Required providers failed: ${failedIds(results).join(', ')}`, callId, results);
    this.name = 'PartialFailureError';
  }
}

/**
 * first-success or best-effort: no target succeeded
 */
export class AllProvidersFailedError extends CompositeFailureError {
  readonly code = 'ALL_PROVIDERS_FAILED';

  constructor(callId: string, results: ProviderResult[]) {
    super(`All providers failed: ${failedIds(results).join(', ')}`, callId, results);
    this.name = 'AllProvidersFailedError';
  }
}

export { TRANSIENT_KINDS };
