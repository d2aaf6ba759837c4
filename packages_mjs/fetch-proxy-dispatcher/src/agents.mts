/**
 * Agent builders for fetch-proxy-dispatcher
 * Every agent is bounded by maxConnections and follows the keep-alive policy
 */

import { Agent, ProxyAgent } from 'undici';
import { createLogger, maskProxyUrl } from '@llm-dispatch/logger';
import { resolveTransportOptions, type TransportOptions } from './config.mjs';

const log = createLogger('fetch-proxy-dispatcher.agents');

/**
 * TLS options for development (disabled certificate validation)
 */
const devTlsOptions = {
  rejectUnauthorized: false,
};

/**
 * Socket options shared by direct and proxied agents
 */
function buildAgentOptions(options: Required<TransportOptions>): Agent.Options {
  if (!options.keepAlive) {
    // pipelining 0 disables keep-alive in undici
    return { connections: options.maxConnections, pipelining: 0 };
  }
  return {
    connections: options.maxConnections,
    keepAliveTimeout: options.keepAliveTimeoutMs,
    keepAliveMaxTimeout: options.keepAliveTimeoutMs * 2,
  };
}

/**
 * Create an agent for direct (unproxied) connections
 */
export function createDirectAgent(options: TransportOptions = {}): Agent {
  const resolved = resolveTransportOptions(options);
  const agentOptions: Agent.Options = {
    ...buildAgentOptions(resolved),
    connect: {
      timeout: resolved.connectTimeoutMs,
      ...(resolved.disableTls && devTlsOptions),
    },
  };

  log.debug(
    {
      connections: resolved.maxConnections,
      keepAlive: resolved.keepAlive,
      keepAliveTimeoutMs: resolved.keepAliveTimeoutMs,
      disableTls: resolved.disableTls,
    },
    'createDirectAgent: creating Agent'
  );
  return new Agent(agentOptions);
}

/**
 * Create a proxy agent. The proxy wraps connection establishment (CONNECT tunnel),
 * not the request payload.
 *
 * @param proxyUrl - The proxy server URL
 * @param options - Transport options
 */
export function createProxyAgent(proxyUrl: string, options: TransportOptions = {}): ProxyAgent {
  const resolved = resolveTransportOptions(options);
  const tls = {
    timeout: resolved.connectTimeoutMs,
    ...(resolved.disableTls && devTlsOptions),
  };

  const agentOptions: ProxyAgent.Options = {
    ...buildAgentOptions(resolved),
    uri: proxyUrl,
    requestTls: tls,
    proxyTls: tls,
  };

  log.debug(
    {
      proxyUrl: maskProxyUrl(proxyUrl),
      connections: resolved.maxConnections,
      keepAlive: resolved.keepAlive,
      disableTls: resolved.disableTls,
    },
    'createProxyAgent: creating ProxyAgent'
  );
  return new ProxyAgent(agentOptions);
}
