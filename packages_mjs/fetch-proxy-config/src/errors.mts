/**
 * Errors for fetch-proxy-config
 */
import { maskProxyUrl } from '@llm-dispatch/logger';

/**
 * An explicit proxy value that is not a usable http(s) proxy URL
 */
export class InvalidProxyConfigError extends Error {
  readonly code = 'INVALID_PROXY_CONFIG';
  readonly proxyUrl: string;

  constructor(proxyUrl: string, reason = 'expected an http:// or https:// scheme') {
    super(`Invalid proxy URL "${maskProxyUrl(proxyUrl)}": ${reason}`);
    this.name = 'InvalidProxyConfigError';
    this.proxyUrl = proxyUrl;
  }
}
