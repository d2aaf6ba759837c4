/**
 * Type definitions for fetch-proxy-config
 */

/**
 * Where the applied proxy came from
 */
export type ProxySource = 'explicit' | 'environment' | 'none';

/**
 * Snapshot of the proxy-related environment variables.
 * Captured once per client; never re-read per request.
 */
export interface ProxyEnvironment {
  readonly httpProxy?: string;
  readonly httpsProxy?: string;
  readonly noProxy?: string;
}

/**
 * The proxy applied to a client's outbound connections
 */
export interface ResolvedProxy {
  /** Proxy URL, or null for a direct connection */
  readonly url: string | null;
  readonly source: ProxySource;
  /** Whether ambient environment proxy settings may apply. False for explicit proxies. */
  readonly trustEnv: boolean;
}

/**
 * Options for ProxyResolver
 */
export interface ProxyResolverOptions {
  /** Environment snapshot. Default: captured from process.env at construction */
  environment?: ProxyEnvironment;
}
