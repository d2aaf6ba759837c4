/**
 * Provider adapter contract
 */
import type { ErrorDetail, JsonObject, JsonValue, ProviderKind, RequestEnvelope } from '../types.mjs';

/**
 * Normalizes one upstream API shape.
 * Adapters are plain tagged objects; select one with `getProvider(kind)`.
 */
export interface Provider {
  readonly kind: ProviderKind;
  /** JSON body for the completion POST */
  buildBody(envelope: RequestEnvelope): JsonObject;
  /** Map a non-2xx response to an ErrorDetail */
  classifyError(status: number, body: JsonValue | undefined, text: string): ErrorDetail;
  /** Assistant text carried by one streamed chunk, or null */
  extractDelta(chunk: JsonValue): string | null;
}
