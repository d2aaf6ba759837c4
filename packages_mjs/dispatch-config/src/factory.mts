/**
 * Build clients and a dispatcher from validated configuration
 */
import { CompositeDispatcher } from '@llm-dispatch/composite-dispatcher';
import { ProviderClient, type ClientConfig } from '@llm-dispatch/fetch-client';
import type { ProxyEnvironment } from '@llm-dispatch/fetch-proxy-config';
import type { DispatchConfig, ProviderSettings } from './schema.mjs';

export interface CreateDispatcherOptions {
  /** Proxy environment for every client. Default: captured from process.env */
  environment?: ProxyEnvironment;
}

export function toClientConfig(settings: ProviderSettings, maxConnections: number): ClientConfig {
  return {
    providerId: settings.providerId,
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    provider: settings.provider,
    ...(settings.timeoutMs !== undefined && { timeoutMs: settings.timeoutMs }),
    ...(settings.proxyUrl !== undefined && { proxyUrl: settings.proxyUrl }),
    ...(settings.completionPath !== undefined && { completionPath: settings.completionPath }),
    pool: { maxConnections },
  };
}

/**
 * One ProviderClient per configured provider, registered in configuration order
 *
 * Settings parsed by DispatchConfigSchema already carry a usable proxy. A
 * config assembled by hand can still hold one the resolver rejects.
 *
 * @throws InvalidProxyConfigError when a provider's proxy is rejected; clients
 *   built before it are closed first
 */
export async function createDispatcherFromConfig(
  config: DispatchConfig,
  options: CreateDispatcherOptions = {}
): Promise<CompositeDispatcher> {
  const clients: ProviderClient[] = [];
  try {
    for (const settings of config.providers) {
      clients.push(
        new ProviderClient(toClientConfig(settings, config.maxConnections), {
          environment: options.environment,
        })
      );
    }
  } catch (error) {
    await Promise.all(clients.map((client) => client.close()));
    throw error;
  }

  return new CompositeDispatcher({
    policy: config.policy,
    deadlineMs: config.deadlineMs,
    targets: clients,
  });
}
