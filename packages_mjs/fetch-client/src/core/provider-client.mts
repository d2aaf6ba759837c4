/**
 * Client for one upstream provider
 */
import { request } from 'undici';
import type { Dispatcher } from 'undici';
import {
  ConnectionAcquireError,
  type AcquiredConnection,
  type ConnectionPoolStats,
} from '@llm-dispatch/connection-pool';
import { ProxyResolver, type ResolvedProxy } from '@llm-dispatch/fetch-proxy-config';
import { createLogger, maskHeaders, maskProxyUrl } from '@llm-dispatch/logger';
import type {
  ChatDelta,
  ClientConfig,
  ErrorDetail,
  JsonValue,
  ProviderCallEvent,
  ProviderClientOptions,
  ProviderResult,
  ProviderTarget,
  RequestEnvelope,
  ResolvedClientConfig,
  SendOptions,
} from '../types.mjs';
import { resolveClientConfig } from '../config.mjs';
import { ProviderCallError } from '../errors.mjs';
import { tryParseJson } from '../json.mjs';
import { emitProviderCall } from '../diagnostics.mjs';
import { getProvider, type Provider } from '../providers/index.mjs';
import { parseSSEStream, parseSSEData } from '../streaming/sse-reader.mjs';
import { assembleChatCompletion } from '../streaming/assemble.mjs';
import { buildCompletionRequest } from './request-builder.mjs';
import { CallDeadline } from './deadline.mjs';
import { TransportPool } from './transport-pool.mjs';

const log = createLogger('fetch-client.provider-client');

type Outcome =
  | { status: 'ok'; body: JsonValue; httpStatus: number }
  | { status: 'error'; detail: ErrorDetail };

function isEventStream(response: Dispatcher.ResponseData): boolean {
  const contentType = response.headers['content-type'];
  const value = Array.isArray(contentType) ? contentType.join(',') : contentType ?? '';
  return value.toLowerCase().includes('text/event-stream');
}

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Sends completion requests to one provider.
 *
 * Owns its ResolvedProxy and TransportPool. `send` never rejects: every
 * failure, including the hard deadline, comes back as an error result.
 *
 * @example
 * const client = new ProviderClient({
 *   providerId: 'openai',
 *   apiKey: process.env.OPENAI_API_KEY ?? '',
 *   baseUrl: 'https://api.openai.com/v1',
 *   timeoutMs: 30_000,
 * });
 * const result = await client.send(createChatEnvelope(messages, 'gpt-4o-mini'));
 */
export class ProviderClient implements ProviderTarget {
  readonly config: ResolvedClientConfig;
  readonly proxy: ResolvedProxy;
  readonly provider: Provider;
  readonly transport: TransportPool;
  private closed = false;

  constructor(config: ClientConfig, options: ProviderClientOptions = {}) {
    this.config = resolveClientConfig(config);
    const resolver = options.resolver ?? new ProxyResolver({ environment: options.environment });
    this.proxy = resolver.resolve(this.config.proxyUrl, this.config.baseUrl);
    this.provider = getProvider(this.config.provider);
    this.transport = new TransportPool(this.proxy, {
      ...this.config.pool,
      id: `${this.config.providerId}-pool`,
    });
  }

  get providerId(): string {
    return this.config.providerId;
  }

  /**
   * Send one completion request
   */
  async send(envelope: RequestEnvelope, options: SendOptions = {}): Promise<ProviderResult> {
    const startedAt = Date.now();

    if (this.closed) {
      return this.finish(startedAt, {
        status: 'error',
        detail: { kind: 'unknown', message: 'Client has been closed' },
      });
    }

    const call = new CallDeadline(this.config.timeoutMs, options.signal);
    let outcome: Outcome;
    try {
      outcome = await this.execute(envelope, call);
    } catch (error) {
      outcome = {
        status: 'error',
        detail: { kind: 'unknown', message: error instanceof Error ? error.message : String(error) },
      };
    } finally {
      call.dispose();
    }
    return this.finish(startedAt, outcome);
  }

  /**
   * Stream assistant text deltas
   *
   * @throws ProviderCallError on any failure, carrying the same ErrorDetail `send` would return
   */
  async *stream(
    envelope: RequestEnvelope,
    options: SendOptions = {}
  ): AsyncGenerator<ChatDelta, void, unknown> {
    if (this.closed) {
      throw new ProviderCallError(this.providerId, {
        kind: 'unknown',
        message: 'Client has been closed',
      });
    }

    const call = new CallDeadline(this.config.timeoutMs, options.signal);
    let acquired: AcquiredConnection | undefined;
    let completed = false;

    try {
      acquired = await this.transport.acquire({ signal: call.signal });

      const { url, options: requestOptions } = buildCompletionRequest(
        this.config,
        this.provider,
        { payload: envelope.payload, streaming: true },
        this.transport.dispatcher,
        call.signal
      );
      log.debug({ url, headers: maskHeaders(requestOptions.headers) }, 'Stream request');

      const response = await request(url, requestOptions);
      if (!isSuccess(response.statusCode)) {
        const text = await response.body.text();
        completed = true;
        throw new ProviderCallError(
          this.providerId,
          this.provider.classifyError(response.statusCode, tryParseJson(text), text)
        );
      }

      for await (const event of parseSSEStream(response.body)) {
        const data = parseSSEData(event);
        if (data === null) continue;
        const content = this.provider.extractDelta(data);
        if (content) {
          yield { role: 'assistant', content };
        }
      }
      call.signal.throwIfAborted();
      completed = true;
    } catch (error) {
      if (error instanceof ProviderCallError) {
        throw error;
      }
      throw new ProviderCallError(this.providerId, this.describeFailure(call, error), {
        cause: error,
      });
    } finally {
      if (!completed) {
        // Consumer stopped early or the call failed; drop the socket
        call.cancel('Stream closed before completion');
        acquired?.fail();
      } else {
        acquired?.release();
      }
      call.dispose();
    }
  }

  getPoolStats(): ConnectionPoolStats {
    return this.transport.getStats();
  }

  /**
   * Close the client once in-flight requests finish. Idempotent.
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.transport.close();
  }

  private async execute(envelope: RequestEnvelope, call: CallDeadline): Promise<Outcome> {
    let acquired: AcquiredConnection;
    try {
      acquired = await this.transport.acquire({ signal: call.signal });
    } catch (error) {
      return { status: 'error', detail: this.describeFailure(call, error) };
    }

    let statusCode: number;
    let text: string;
    let streamed: JsonValue | undefined;
    try {
      call.signal.throwIfAborted();
      const { url, options } = buildCompletionRequest(
        this.config,
        this.provider,
        envelope,
        this.transport.dispatcher,
        call.signal
      );
      log.debug({ url, headers: maskHeaders(options.headers) }, 'Completion request');

      const response = await request(url, options);
      statusCode = response.statusCode;

      if (envelope.streaming && isSuccess(statusCode) && isEventStream(response)) {
        const chunks: JsonValue[] = [];
        for await (const event of parseSSEStream(response.body)) {
          const data = parseSSEData(event);
          if (data !== null) {
            chunks.push(data);
          }
        }
        streamed = assembleChatCompletion(chunks, (chunk) => this.provider.extractDelta(chunk));
        text = '';
      } else {
        text = await response.body.text();
      }
      call.signal.throwIfAborted();
    } catch (error) {
      acquired.fail(error instanceof Error ? error : undefined);
      return { status: 'error', detail: this.describeFailure(call, error) };
    }
    acquired.release();

    if (!isSuccess(statusCode)) {
      return {
        status: 'error',
        detail: this.provider.classifyError(statusCode, tryParseJson(text), text),
      };
    }

    const body = streamed ?? tryParseJson(text);
    if (body === undefined) {
      return {
        status: 'error',
        detail: {
          kind: 'unknown',
          message: 'Provider returned a response that is not valid JSON',
          httpStatus: statusCode,
          raw: text.slice(0, 500),
        },
      };
    }

    return { status: 'ok', body, httpStatus: statusCode };
  }

  /**
   * Classify a thrown error: deadline and cancellation win over the
   * transport error they caused
   */
  private describeFailure(call: CallDeadline, error: unknown): ErrorDetail {
    if (call.outcome === 'timeout') {
      return { kind: 'timeout', message: call.message };
    }
    if (call.outcome === 'cancelled') {
      return { kind: 'cancelled', message: call.message };
    }
    if (error instanceof ConnectionAcquireError) {
      // No request left the process; only a queue timeout is worth retrying
      return {
        kind: error.code === 'QUEUE_TIMEOUT' ? 'timeout' : 'unknown',
        message: error.message,
        code: error.code,
      };
    }
    const code = errorCode(error);
    return {
      kind: 'network',
      message: error instanceof Error ? error.message : String(error),
      ...(code !== undefined && { code }),
    };
  }

  private finish(startedAt: number, outcome: Outcome): ProviderResult {
    const latencyMs = Date.now() - startedAt;
    const result: ProviderResult =
      outcome.status === 'ok'
        ? {
            status: 'ok',
            providerId: this.providerId,
            body: outcome.body,
            latencyMs,
            httpStatus: outcome.httpStatus,
            proxy: this.proxy,
          }
        : {
            status: 'error',
            providerId: this.providerId,
            body: outcome.detail,
            latencyMs,
            ...(outcome.detail.httpStatus !== undefined && { httpStatus: outcome.detail.httpStatus }),
            proxy: this.proxy,
          };

    const statusKind = result.status === 'ok' ? 'ok' : result.body.kind;
    const event: ProviderCallEvent = {
      providerId: this.providerId,
      proxyUsed: this.proxy.url ? maskProxyUrl(this.proxy.url) : null,
      proxySource: this.proxy.source,
      latencyMs,
      statusKind,
      httpStatus: result.httpStatus,
      timestamp: Date.now(),
    };
    emitProviderCall(event);

    if (result.status === 'ok') {
      log.info(event, `Provider call ${this.providerId}: ok`);
    } else {
      log.warn({ ...event, errorMessage: result.body.message }, `Provider call ${this.providerId}: ${statusKind}`);
    }

    return result;
  }
}
