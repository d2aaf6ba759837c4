/**
 * @llm-dispatch/fetch-proxy-config
 * Proxy resolution with explicit-over-environment precedence
 */
export type {
  ProxySource,
  ProxyEnvironment,
  ResolvedProxy,
  ProxyResolverOptions,
} from './types.mjs';
export { captureProxyEnvironment, EMPTY_PROXY_ENVIRONMENT } from './environment.mjs';
export { shouldBypassProxy } from './no-proxy.mjs';
export { InvalidProxyConfigError } from './errors.mjs';
export { resolveProxy, isRecognizedProxyUrl, proxyUrlProblem, ProxyResolver } from './resolver.mjs';
