/**
 * Configuration for fetch-proxy-dispatcher
 * Transport defaults and TLS environment detection
 */

import process from 'node:process';

/**
 * Transport options for the agents built by this package
 */
export interface TransportOptions {
  /** Maximum sockets to the origin. Default: 100 */
  maxConnections?: number;
  /** Keep idle sockets open for reuse. Default: true */
  keepAlive?: boolean;
  /** Idle socket keep-alive timeout in ms. Default: 30000 */
  keepAliveTimeoutMs?: number;
  /** Socket connect timeout in ms. Default: 10000 */
  connectTimeoutMs?: number;
  /** Disable TLS certificate validation. Default: from environment */
  disableTls?: boolean;
}

/**
 * Default transport options
 */
export const DEFAULT_TRANSPORT_OPTIONS: Required<Omit<TransportOptions, 'disableTls'>> = {
  maxConnections: 100,
  keepAlive: true,
  keepAliveTimeoutMs: 30_000,
  connectTimeoutMs: 10_000,
};

/**
 * Check whether TLS verification is disabled through the environment
 * (NODE_TLS_REJECT_UNAUTHORIZED=0 or SSL_CERT_VERIFY=0)
 */
export function isSslVerifyDisabledByEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return env['NODE_TLS_REJECT_UNAUTHORIZED'] === '0' || env['SSL_CERT_VERIFY'] === '0';
}

/**
 * Merge transport options with defaults.
 * disableTls falls back to the environment flag read at call time.
 */
export function resolveTransportOptions(
  options: TransportOptions = {},
  env: NodeJS.ProcessEnv = process.env
): Required<TransportOptions> {
  return {
    maxConnections: options.maxConnections ?? DEFAULT_TRANSPORT_OPTIONS.maxConnections,
    keepAlive: options.keepAlive ?? DEFAULT_TRANSPORT_OPTIONS.keepAlive,
    keepAliveTimeoutMs: options.keepAliveTimeoutMs ?? DEFAULT_TRANSPORT_OPTIONS.keepAliveTimeoutMs,
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_TRANSPORT_OPTIONS.connectTimeoutMs,
    disableTls: options.disableTls ?? isSslVerifyDisabledByEnv(env),
  };
}
