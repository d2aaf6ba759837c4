/**
 * @llm-dispatch/fetch-client
 *
 * Completion client for one OpenAI-compatible provider, with proxy
 * resolution, a bounded transport pool and a hard per-call deadline.
 *
 * @example
 * ```typescript
 * import { ProviderClient, createChatEnvelope } from '@llm-dispatch/fetch-client';
 *
 * const client = new ProviderClient({
 *   providerId: 'primary',
 *   apiKey: process.env.PRIMARY_API_KEY ?? '',
 *   baseUrl: 'https://api.example.com/v1',
 *   proxyUrl: 'http://proxy.internal:3128',
 * });
 *
 * const result = await client.send(createChatEnvelope([{ role: 'user', content: 'Hi' }], 'model-a'));
 * if (result.status === 'error') {
 *   console.error(result.body.kind, result.body.message);
 * }
 *
 * for await (const delta of client.stream(envelope)) {
 *   process.stdout.write(delta.content);
 * }
 *
 * await client.close();
 * ```
 */

// Types
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  ProviderKind,
  ChatMessage,
  RequestEnvelope,
  ErrorKind,
  ErrorDetail,
  ProviderSuccess,
  ProviderFailure,
  ProviderResult,
  ClientPoolOptions,
  ClientConfig,
  ResolvedClientConfig,
  ProviderClientOptions,
  SendOptions,
  ProviderTarget,
  SSEEvent,
  ChatDelta,
  ProviderCallEvent,
} from './types.mjs';

// Config
export {
  DEFAULT_TIMEOUT_MS,
  DEFAULT_COMPLETION_PATH,
  PROVIDER_KINDS,
  validateClientConfig,
  resolveClientConfig,
} from './config.mjs';

// Errors
export { ProviderCallError } from './errors.mjs';

// Envelopes
export { createEnvelope, createChatEnvelope } from './envelope.mjs';

// JSON helpers
export { tryParseJson, isJsonObject, stringField } from './json.mjs';

// Providers
export {
  getProvider,
  openAiProvider,
  geminiProvider,
  kindFromStatus,
  type Provider,
} from './providers/index.mjs';

// Core
export { ProviderClient } from './core/provider-client.mjs';
export { TransportPool, type TransportPoolOptions } from './core/transport-pool.mjs';
export { buildCompletionUrl, buildHeaders, formatBearer } from './core/request-builder.mjs';

// Streaming
export { parseSSEStream, parseSSEEvent, parseSSEData } from './streaming/sse-reader.mjs';
export { assembleChatCompletion } from './streaming/assemble.mjs';

// Diagnostics
export { CHANNELS, emitProviderCall, onProviderCall } from './diagnostics.mjs';
