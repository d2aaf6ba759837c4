/**
 * Type definitions for @llm-dispatch/fetch-client
 */
import type { ConnectionPoolConfig } from '@llm-dispatch/connection-pool';
import type { ProxyEnvironment, ProxyResolver, ResolvedProxy } from '@llm-dispatch/fetch-proxy-config';
import type { TransportOptions } from '@llm-dispatch/fetch-proxy-dispatcher';

/**
 * JSON values as they travel over the wire
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Upstream API shape a client talks to
 */
export type ProviderKind = 'openai' | 'gemini';

/**
 * One chat message
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  name?: string;
}

/**
 * One logical call's payload. Deep-frozen; never mutated after creation.
 */
export interface RequestEnvelope {
  readonly payload: Readonly<JsonObject>;
  readonly streaming: boolean;
}

/**
 * Failure classification
 *
 * - authentication: 401/403 or an auth-shaped error body
 * - rate-limit: 429 or a quota-shaped error body
 * - malformed-request: 400/404/413/422 or an invalid-argument body
 * - server-error: 5xx
 * - timeout: the client's hard deadline expired, or no pool slot freed up in time
 * - cancelled: the caller (or a composite call) aborted the request
 * - network: the transport failed before a response arrived
 * - unknown: anything else, including an unreadable success body and a
 *   closed or full pool
 */
export type ErrorKind =
  | 'authentication'
  | 'rate-limit'
  | 'malformed-request'
  | 'server-error'
  | 'unknown'
  | 'timeout'
  | 'cancelled'
  | 'network';

/**
 * Normalized failure description
 */
export interface ErrorDetail {
  kind: ErrorKind;
  message: string;
  httpStatus?: number;
  /** Provider or transport error code, e.g. "rate_limit_exceeded" or "ECONNREFUSED" */
  code?: string;
  /** Parsed error body or its leading text */
  raw?: JsonValue;
}

interface ProviderResultBase {
  providerId: string;
  latencyMs: number;
  proxy: ResolvedProxy;
}

export interface ProviderSuccess extends ProviderResultBase {
  status: 'ok';
  body: JsonValue;
  httpStatus: number;
}

export interface ProviderFailure extends ProviderResultBase {
  status: 'error';
  body: ErrorDetail;
  httpStatus?: number;
}

/**
 * Outcome of one provider call
 */
export type ProviderResult = ProviderSuccess | ProviderFailure;

/**
 * Connection limits and socket behaviour of one client
 */
export interface ClientPoolOptions
  extends TransportOptions,
    Pick<ConnectionPoolConfig, 'maxQueueSize' | 'queueTimeoutMs'> {}

/**
 * Client configuration
 */
export interface ClientConfig {
  providerId: string;
  apiKey: string;
  baseUrl: string;
  /** Hard deadline per call in ms. Default: 60000 */
  timeoutMs?: number;
  /** Explicit proxy; disables the environment lookup */
  proxyUrl?: string;
  /** Default: 'openai' */
  provider?: ProviderKind;
  /** Resolved against baseUrl. Default: 'chat/completions' */
  completionPath?: string;
  headers?: Record<string, string>;
  pool?: ClientPoolOptions;
}

/**
 * Validated, frozen client configuration
 */
export interface ResolvedClientConfig {
  readonly providerId: string;
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly proxyUrl?: string;
  readonly provider: ProviderKind;
  readonly completionPath: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly pool: Readonly<ClientPoolOptions>;
}

/**
 * Construction collaborators
 */
export interface ProviderClientOptions {
  /** Resolver to use. Default: a new ProxyResolver over `environment` */
  resolver?: ProxyResolver;
  /** Proxy environment snapshot. Default: captured from process.env */
  environment?: ProxyEnvironment;
}

/**
 * Per-call options
 */
export interface SendOptions {
  /** Cooperative cancellation; an abort yields a 'cancelled' result */
  signal?: AbortSignal;
}

/**
 * Anything the composite dispatcher can fan out to
 */
export interface ProviderTarget {
  readonly providerId: string;
  /** Reported on results the dispatcher records on the target's behalf */
  readonly proxy?: ResolvedProxy;
  send(envelope: RequestEnvelope, options?: SendOptions): Promise<ProviderResult>;
  close?(): Promise<void>;
}

/**
 * SSE event structure
 */
export interface SSEEvent {
  id?: string;
  event?: string;
  data: string;
  retry?: number;
}

/**
 * One streamed piece of assistant output
 */
export interface ChatDelta {
  role: 'assistant';
  content: string;
}

/**
 * Diagnostics event emitted once per provider call
 */
export interface ProviderCallEvent {
  providerId: string;
  proxyUsed: string | null;
  proxySource: ResolvedProxy['source'];
  latencyMs: number;
  statusKind: 'ok' | ErrorKind;
  httpStatus?: number;
  timestamp: number;
}
