/**
 * Request builder utilities for @llm-dispatch/fetch-client
 */
import type { Dispatcher } from 'undici';
import type { RequestEnvelope, ResolvedClientConfig } from '../types.mjs';
import type { Provider } from '../providers/types.mjs';

/**
 * Build the completion endpoint URL.
 * baseUrl is treated as a directory; an empty path posts to baseUrl itself.
 *
 * @example
 * buildCompletionUrl('https://api.example.com/v1', 'chat/completions')
 * // 'https://api.example.com/v1/chat/completions'
 */
export function buildCompletionUrl(baseUrl: string, completionPath: string): string {
  if (!completionPath) {
    return new URL(baseUrl).toString();
  }
  const base = new URL(baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
  const path = completionPath.replace(/^\/+/, '');
  return new URL(path, base).toString();
}

/**
 * Format a bearer authorization value. A value that already carries the
 * scheme is kept as-is.
 */
export function formatBearer(apiKey: string): string {
  return /^bearer /i.test(apiKey) ? apiKey : `Bearer ${apiKey}`;
}

/**
 * Build request headers
 */
export function buildHeaders(
  config: ResolvedClientConfig,
  streaming: boolean
): Record<string, string> {
  const headers: Record<string, string> = {
    'content-type': 'application/json',
    accept: streaming ? 'text/event-stream' : 'application/json',
  };

  for (const [key, value] of Object.entries(config.headers)) {
    headers[key.toLowerCase()] = value;
  }

  if (config.apiKey) {
    headers['authorization'] = formatBearer(config.apiKey);
  }

  return headers;
}

/**
 * Undici request options for one completion call
 */
export interface CompletionRequest {
  url: string;
  options: {
    method: Dispatcher.HttpMethod;
    headers: Record<string, string>;
    body: string;
    dispatcher: Dispatcher;
    signal: AbortSignal;
  };
}

/**
 * Build the completion POST
 */
export function buildCompletionRequest(
  config: ResolvedClientConfig,
  provider: Provider,
  envelope: RequestEnvelope,
  dispatcher: Dispatcher,
  signal: AbortSignal
): CompletionRequest {
  return {
    url: buildCompletionUrl(config.baseUrl, config.completionPath),
    options: {
      method: 'POST',
      headers: buildHeaders(config, envelope.streaming),
      body: JSON.stringify(provider.buildBody(envelope)),
      dispatcher,
      signal,
    },
  };
}
