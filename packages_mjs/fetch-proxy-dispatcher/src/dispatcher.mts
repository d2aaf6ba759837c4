/**
 * Dispatcher selection from a resolved proxy
 */

import type { Dispatcher } from 'undici';
import type { ResolvedProxy } from '@llm-dispatch/fetch-proxy-config';
import { createLogger, maskProxyUrl } from '@llm-dispatch/logger';
import { createDirectAgent, createProxyAgent } from './agents.mjs';
import type { TransportOptions } from './config.mjs';

const log = createLogger('fetch-proxy-dispatcher.dispatcher');

/**
 * Get the dispatcher for a resolved proxy
 *
 * - url set (explicit or environment) → ProxyAgent for that url only
 * - no url → direct Agent
 *
 * The returned dispatcher never consults the environment again, so an explicit
 * proxy cannot be combined with an ambient one.
 *
 * @example
 * const proxy = resolver.resolve(config.proxyUrl, config.baseUrl);
 * const dispatcher = createProxyDispatcher(proxy, { maxConnections: 50 });
 */
export function createProxyDispatcher(
  proxy: ResolvedProxy,
  options: TransportOptions = {}
): Dispatcher {
  if (proxy.url) {
    log.debug(
      { proxyUrl: maskProxyUrl(proxy.url), source: proxy.source },
      'createProxyDispatcher: using ProxyAgent'
    );
    return createProxyAgent(proxy.url, options);
  }

  log.debug({ source: proxy.source }, 'createProxyDispatcher: no proxy, using direct Agent');
  return createDirectAgent(options);
}
