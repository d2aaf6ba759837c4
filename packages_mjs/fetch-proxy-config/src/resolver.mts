import { createLogger, maskProxyUrl } from '@llm-dispatch/logger';
import type { ProxyEnvironment, ProxyResolverOptions, ResolvedProxy } from './types.mjs';
import { captureProxyEnvironment } from './environment.mjs';
import { shouldBypassProxy } from './no-proxy.mjs';
import { InvalidProxyConfigError } from './errors.mjs';

const log = createLogger('fetch-proxy-config.resolver');

const SCHEME_PROBLEM = 'expected an http:// or https:// scheme';
const URL_PROBLEM = 'expected a URL with a host';

const NO_PROXY: ResolvedProxy = Object.freeze<ResolvedProxy>({ url: null, source: 'none', trustEnv: true });

/**
 * Check for a recognized proxy scheme prefix
 */
export function isRecognizedProxyUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

/**
 * Why a proxy value cannot be used, or undefined when it can
 */
export function proxyUrlProblem(value: string): string | undefined {
  if (!isRecognizedProxyUrl(value)) {
    return SCHEME_PROBLEM;
  }
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return URL_PROBLEM;
  }
  return parsed.hostname ? undefined : URL_PROBLEM;
}

function environmentProxyFor(
  environment: ProxyEnvironment,
  targetUrl?: string | URL
): string | undefined {
  if (targetUrl === undefined) {
    return environment.httpsProxy ?? environment.httpProxy;
  }
  const protocol = new URL(targetUrl).protocol;
  if (protocol === 'http:') {
    return environment.httpProxy;
  }
  return environment.httpsProxy ?? environment.httpProxy;
}

/**
 * Resolve the proxy for a client.
 *
 * Precedence:
 * 1. explicitProxy, used verbatim (an http:// or https:// URL with a host;
 *    anything else throws). A blank value counts as absent.
 * 2. HTTPS_PROXY then HTTP_PROXY for https targets, HTTP_PROXY for http targets,
 *    unless NO_PROXY matches the target host
 * 3. no proxy
 *
 * An explicit proxy disables the environment lookup entirely.
 *
 * @param explicitProxy - Proxy configured on the client, if any
 * @param environment - Environment snapshot
 * @param targetUrl - Endpoint the client talks to
 * @throws InvalidProxyConfigError for an explicit proxy with an unrecognized
 *   scheme or that does not parse as a URL
 */
export function resolveProxy(
  explicitProxy: string | null | undefined,
  environment: ProxyEnvironment,
  targetUrl?: string | URL
): ResolvedProxy {
  if (explicitProxy?.trim()) {
    const problem = proxyUrlProblem(explicitProxy);
    if (problem !== undefined) {
      throw new InvalidProxyConfigError(explicitProxy, problem);
    }
    return Object.freeze<ResolvedProxy>({ url: explicitProxy, source: 'explicit', trustEnv: false });
  }

  const envProxy = environmentProxyFor(environment, targetUrl);
  if (!envProxy) {
    return NO_PROXY;
  }

  const envProblem = proxyUrlProblem(envProxy);
  if (envProblem !== undefined) {
    log.warn({ proxyUrl: maskProxyUrl(envProxy), reason: envProblem }, 'Ignoring environment proxy');
    return NO_PROXY;
  }

  if (targetUrl !== undefined && shouldBypassProxy(targetUrl, environment.noProxy)) {
    log.debug({ target: String(targetUrl) }, 'Target matches NO_PROXY, connecting directly');
    return NO_PROXY;
  }

  return Object.freeze<ResolvedProxy>({ url: envProxy, source: 'environment', trustEnv: true });
}

/**
 * Resolves proxies against an environment snapshot taken once at construction.
 *
 * @example
 * const resolver = new ProxyResolver();
 * const proxy = resolver.resolve(config.proxyUrl, 'https://api.example.com/v1');
 */
export class ProxyResolver {
  readonly environment: ProxyEnvironment;

  constructor(options: ProxyResolverOptions = {}) {
    this.environment = options.environment ?? captureProxyEnvironment();
    log.debug(
      {
        httpProxy: maskProxyUrl(this.environment.httpProxy),
        httpsProxy: maskProxyUrl(this.environment.httpsProxy),
        noProxy: this.environment.noProxy ?? 'none',
      },
      'ProxyResolver initialized'
    );
  }

  resolve(explicitProxy?: string | null, targetUrl?: string | URL): ResolvedProxy {
    const resolved = resolveProxy(explicitProxy, this.environment, targetUrl);
    log.debug(
      { url: maskProxyUrl(resolved.url), source: resolved.source, trustEnv: resolved.trustEnv },
      'Resolved proxy'
    );
    return resolved;
  }
}
