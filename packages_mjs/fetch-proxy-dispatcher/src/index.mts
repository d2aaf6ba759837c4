/**
 * @llm-dispatch/fetch-proxy-dispatcher
 * undici dispatchers for a resolved proxy
 * Pure ESM module
 */

// Config exports
export {
  DEFAULT_TRANSPORT_OPTIONS,
  isSslVerifyDisabledByEnv,
  resolveTransportOptions,
  type TransportOptions,
} from './config.mjs';

// Agent exports
export { createDirectAgent, createProxyAgent } from './agents.mjs';

// Dispatcher API
export { createProxyDispatcher } from './dispatcher.mjs';
