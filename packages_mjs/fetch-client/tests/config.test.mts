/**
 * Tests for config.mts
 * Logic testing: validation branches and defaults
 */
import { describe, it, expect } from 'vitest';
import { resolveClientConfig, validateClientConfig, DEFAULT_TIMEOUT_MS } from '../src/config.mjs';
import type { ClientConfig } from '../src/types.mjs';

const base: ClientConfig = {
  providerId: 'primary',
  apiKey: 'test-secret',
  baseUrl: 'https://api.example.com/v1',
};

describe('validateClientConfig', () => {
  it('should accept a minimal config', () => {
    expect(() => validateClientConfig(base)).not.toThrow();
  });

  it('should require providerId', () => {
    expect(() => validateClientConfig({ ...base, providerId: '' })).toThrow('providerId is required');
  });

  it('should require baseUrl', () => {
    expect(() => validateClientConfig({ ...base, baseUrl: '' })).toThrow('baseUrl is required');
  });

  it.each(['not a url', 'ftp://files.example.com'])('should reject baseUrl %s', (baseUrl) => {
    expect(() => validateClientConfig({ ...base, baseUrl })).toThrow(`Invalid baseUrl: ${baseUrl}`);
  });

  it.each([0, -5, Number.NaN])('should reject timeoutMs %s', (timeoutMs) => {
    expect(() => validateClientConfig({ ...base, timeoutMs })).toThrow('timeoutMs must be a positive number');
  });

  it('should reject an unknown provider', () => {
    const config = JSON.parse(JSON.stringify({ ...base, provider: 'other' }));

    expect(() => validateClientConfig(config)).toThrow('Invalid provider: other. Must be one of: openai, gemini');
  });
});

describe('resolveClientConfig', () => {
  it('should apply defaults and freeze', () => {
    const resolved = resolveClientConfig(base);

    expect(resolved).toEqual({
      providerId: 'primary',
      apiKey: 'test-secret',
      baseUrl: 'https://api.example.com/v1',
      timeoutMs: DEFAULT_TIMEOUT_MS,
      proxyUrl: undefined,
      provider: 'openai',
      completionPath: 'chat/completions',
      headers: {},
      pool: {},
    });
    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.headers)).toBe(true);
  });

  it('should not share the caller headers object', () => {
    const headers = { 'x-team': 'search' };
    const resolved = resolveClientConfig({ ...base, headers });
    headers['x-team'] = 'changed';

    expect(resolved.headers['x-team']).toBe('search');
  });
});
