/**
 * Configuration utilities for @llm-dispatch/fetch-client
 */
import type { ClientConfig, ProviderKind, ResolvedClientConfig } from './types.mjs';

/**
 * Default hard deadline per call in milliseconds
 */
export const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Default completion path, resolved against baseUrl
 */
export const DEFAULT_COMPLETION_PATH = 'chat/completions';

/**
 * Supported provider kinds
 */
export const PROVIDER_KINDS: readonly ProviderKind[] = ['openai', 'gemini'];

function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}

/**
 * Validate client configuration
 */
export function validateClientConfig(config: ClientConfig): void {
  if (!config.providerId) {
    throw new Error('providerId is required');
  }

  if (!config.baseUrl) {
    throw new Error('baseUrl is required');
  }

  let url: URL;
  try {
    url = new URL(config.baseUrl);
  } catch {
    throw new Error(`Invalid baseUrl: ${config.baseUrl}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid baseUrl: ${config.baseUrl}`);
  }

  if (typeof config.apiKey !== 'string') {
    throw new Error('apiKey must be a string');
  }

  if (
    config.timeoutMs !== undefined &&
    (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0)
  ) {
    throw new Error('timeoutMs must be a positive number');
  }

  if (config.provider !== undefined && !isProviderKind(config.provider)) {
    throw new Error(
      `Invalid provider: ${String(config.provider)}. Must be one of: ${PROVIDER_KINDS.join(', ')}`
    );
  }
}

/**
 * Validate and freeze client configuration
 */
export function resolveClientConfig(config: ClientConfig): ResolvedClientConfig {
  validateClientConfig(config);

  return Object.freeze<ResolvedClientConfig>({
    providerId: config.providerId,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    proxyUrl: config.proxyUrl,
    provider: config.provider ?? 'openai',
    completionPath: config.completionPath ?? DEFAULT_COMPLETION_PATH,
    headers: Object.freeze({ ...config.headers }),
    pool: Object.freeze({ ...config.pool }),
  });
}
