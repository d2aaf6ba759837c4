/**
 * Proxy environment snapshot
 */
import process from 'node:process';
import type { ProxyEnvironment } from './types.mjs';

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name.toUpperCase()] || env[name.toLowerCase()];
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Capture HTTP_PROXY, HTTPS_PROXY and NO_PROXY (upper case wins over lower case)
 *
 * @param env - Environment to read. Default: process.env
 * @returns Frozen snapshot
 */
export function captureProxyEnvironment(env: NodeJS.ProcessEnv = process.env): ProxyEnvironment {
  return Object.freeze({
    httpProxy: readVar(env, 'HTTP_PROXY'),
    httpsProxy: readVar(env, 'HTTPS_PROXY'),
    noProxy: readVar(env, 'NO_PROXY'),
  });
}

/**
 * An environment with no proxy settings
 */
export const EMPTY_PROXY_ENVIRONMENT: ProxyEnvironment = Object.freeze({});
