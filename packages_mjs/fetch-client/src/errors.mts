/**
 * Errors for @llm-dispatch/fetch-client
 */
import type { ErrorDetail } from './types.mjs';

/**
 * A streaming call failed. `send` reports the same failures as data instead.
 */
export class ProviderCallError extends Error {
  readonly code = 'PROVIDER_CALL_FAILED';
  readonly providerId: string;
  readonly detail: ErrorDetail;

  constructor(providerId: string, detail: ErrorDetail, options?: { cause?: unknown }) {
    super(`${providerId}: ${detail.kind}: ${detail.message}`, options);
    this.name = 'ProviderCallError';
    this.providerId = providerId;
    this.detail = detail;
  }
}
