/**
 * Tests for dispatcher selection and transport option resolution
 */

import { describe, it, expect, afterEach } from 'vitest';
import { Agent, ProxyAgent, type Dispatcher } from 'undici';
import type { ResolvedProxy } from '@llm-dispatch/fetch-proxy-config';
import { createProxyDispatcher } from '../src/dispatcher.mjs';
import { createDirectAgent, createProxyAgent } from '../src/agents.mjs';
import {
  DEFAULT_TRANSPORT_OPTIONS,
  isSslVerifyDisabledByEnv,
  resolveTransportOptions,
} from '../src/config.mjs';

describe('createProxyDispatcher', () => {
  const created: Dispatcher[] = [];

  afterEach(async () => {
    await Promise.all(created.map((d) => d.close()));
    created.length = 0;
  });

  it('returns a ProxyAgent for an explicit proxy', () => {
    const proxy: ResolvedProxy = { url: 'http://proxy.local:8080', source: 'explicit', trustEnv: false };
    const dispatcher = createProxyDispatcher(proxy);
    created.push(dispatcher);
    expect(dispatcher).toBeInstanceOf(ProxyAgent);
  });

  it('returns a ProxyAgent for an environment proxy', () => {
    const proxy: ResolvedProxy = { url: 'http://env:3128', source: 'environment', trustEnv: true };
    const dispatcher = createProxyDispatcher(proxy, { maxConnections: 5 });
    created.push(dispatcher);
    expect(dispatcher).toBeInstanceOf(ProxyAgent);
  });

  it('returns a direct Agent without a proxy', () => {
    const proxy: ResolvedProxy = { url: null, source: 'none', trustEnv: true };
    const dispatcher = createProxyDispatcher(proxy);
    created.push(dispatcher);
    expect(dispatcher).toBeInstanceOf(Agent);
  });

  it('builds agents with keep-alive disabled', () => {
    const direct = createDirectAgent({ keepAlive: false, maxConnections: 2 });
    const proxied = createProxyAgent('http://proxy.local:8080', { keepAlive: false, disableTls: true });
    created.push(direct, proxied);
    expect(direct).toBeInstanceOf(Agent);
    expect(proxied).toBeInstanceOf(ProxyAgent);
  });
});

describe('resolveTransportOptions', () => {
  it('applies defaults', () => {
    expect(resolveTransportOptions({}, {})).toEqual({
      ...DEFAULT_TRANSPORT_OPTIONS,
      disableTls: false,
    });
  });

  it('keeps explicit values', () => {
    expect(
      resolveTransportOptions(
        { maxConnections: 8, keepAlive: false, keepAliveTimeoutMs: 1000, connectTimeoutMs: 500, disableTls: false },
        { SSL_CERT_VERIFY: '0' }
      )
    ).toEqual({
      maxConnections: 8,
      keepAlive: false,
      keepAliveTimeoutMs: 1000,
      connectTimeoutMs: 500,
      disableTls: false,
    });
  });

  it('falls back to the TLS environment flag', () => {
    expect(resolveTransportOptions({}, { NODE_TLS_REJECT_UNAUTHORIZED: '0' }).disableTls).toBe(true);
  });
});

describe('isSslVerifyDisabledByEnv', () => {
  it('detects either variable', () => {
    expect(isSslVerifyDisabledByEnv({ SSL_CERT_VERIFY: '0' })).toBe(true);
    expect(isSslVerifyDisabledByEnv({ NODE_TLS_REJECT_UNAUTHORIZED: '0' })).toBe(true);
    expect(isSslVerifyDisabledByEnv({ SSL_CERT_VERIFY: '1' })).toBe(false);
    expect(isSslVerifyDisabledByEnv({})).toBe(false);
  });
});
