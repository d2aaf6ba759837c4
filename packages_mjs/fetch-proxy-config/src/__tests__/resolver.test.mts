import { describe, it, expect } from 'vitest';
import { resolveProxy, ProxyResolver, isRecognizedProxyUrl, proxyUrlProblem } from '../resolver.mjs';
import { captureProxyEnvironment, EMPTY_PROXY_ENVIRONMENT } from '../environment.mjs';
import { InvalidProxyConfigError } from '../errors.mjs';

describe('resolveProxy', () => {
    const target = 'https://api.example.com/v1/chat/completions';

    it('uses an explicit http proxy verbatim', () => {
        const result = resolveProxy('http://proxy.local:8080', EMPTY_PROXY_ENVIRONMENT, target);
        expect(result).toEqual({ url: 'http://proxy.local:8080', source: 'explicit', trustEnv: false });
    });

    it('uses an explicit https proxy verbatim', () => {
        const result = resolveProxy('https://secure-proxy.local', EMPTY_PROXY_ENVIRONMENT, target);
        expect(result.url).toBe('https://secure-proxy.local');
        expect(result.source).toBe('explicit');
    });

    it.each([
        'socks5://proxy.local:1080',
        'proxy.local:8080',
        'ftp://proxy.local',
        'HTTP://proxy.local',
        'http:/proxy.local',
    ])('rejects explicit proxy %s', (value) => {
        expect(() => resolveProxy(value, EMPTY_PROXY_ENVIRONMENT, target)).toThrow(InvalidProxyConfigError);
    });

    it.each(['http://', 'http://bad host:3128', 'https://[::1'])(
        'rejects explicit proxy %s that does not parse as a URL',
        (value) => {
            expect(() => resolveProxy(value, EMPTY_PROXY_ENVIRONMENT, target)).toThrow(
                'expected a URL with a host'
            );
            expect(() => resolveProxy(value, EMPTY_PROXY_ENVIRONMENT, target)).toThrow(InvalidProxyConfigError);
        }
    );

    it('keeps the explicit value as given instead of trimming it', () => {
        expect(() => resolveProxy(' http://proxy.local:8080', EMPTY_PROXY_ENVIRONMENT, target)).toThrow(
            InvalidProxyConfigError
        );
    });

    it('masks credentials in the invalid proxy message', () => {
        try {
            resolveProxy('socks5://user:pw@proxy.local', EMPTY_PROXY_ENVIRONMENT);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidProxyConfigError);
            expect((error as InvalidProxyConfigError).message).toBe(
                'Invalid proxy URL "socks5://***@proxy.local": expected an http:// or https:// scheme'
            );
            expect((error as InvalidProxyConfigError).code).toBe('INVALID_PROXY_CONFIG');
        }
    });

    it('never applies the environment proxy when an explicit one is set', () => {
        const environment = captureProxyEnvironment({
            HTTP_PROXY: 'http://env-http:3128',
            HTTPS_PROXY: 'http://env-https:3128',
        });
        const result = resolveProxy('http://explicit:8080', environment, target);
        expect(result.url).toBe('http://explicit:8080');
        expect(result.trustEnv).toBe(false);
    });

    it('ignores NO_PROXY for explicit proxies', () => {
        const environment = captureProxyEnvironment({ NO_PROXY: 'api.example.com' });
        const result = resolveProxy('http://explicit:8080', environment, target);
        expect(result.url).toBe('http://explicit:8080');
    });

    it('treats an empty explicit value as absent', () => {
        const environment = captureProxyEnvironment({ HTTPS_PROXY: 'http://env-https:3128' });
        const result = resolveProxy('  ', environment, target);
        expect(result).toEqual({ url: 'http://env-https:3128', source: 'environment', trustEnv: true });
    });

    it('prefers HTTPS_PROXY for https targets', () => {
        const environment = captureProxyEnvironment({
            HTTP_PROXY: 'http://env-http:3128',
            HTTPS_PROXY: 'http://env-https:3128',
        });
        expect(resolveProxy(undefined, environment, target).url).toBe('http://env-https:3128');
    });

    it('falls back to HTTP_PROXY for https targets', () => {
        const environment = captureProxyEnvironment({ HTTP_PROXY: 'http://env-http:3128' });
        expect(resolveProxy(undefined, environment, target).url).toBe('http://env-http:3128');
    });

    it('uses only HTTP_PROXY for http targets', () => {
        const environment = captureProxyEnvironment({ HTTPS_PROXY: 'http://env-https:3128' });
        expect(resolveProxy(undefined, environment, 'http://localhost:11434/v1').source).toBe('none');
    });

    it('connects directly when NO_PROXY matches the target', () => {
        const environment = captureProxyEnvironment({
            HTTPS_PROXY: 'http://env-https:3128',
            NO_PROXY: 'localhost,.example.com',
        });
        expect(resolveProxy(undefined, environment, target)).toEqual({
            url: null,
            source: 'none',
            trustEnv: true,
        });
    });

    it('ignores environment proxies with an unrecognized scheme', () => {
        const environment = captureProxyEnvironment({ HTTPS_PROXY: 'socks5://env:1080' });
        expect(resolveProxy(undefined, environment, target).source).toBe('none');
    });

    it('ignores environment proxies that do not parse as a URL', () => {
        const environment = captureProxyEnvironment({ HTTPS_PROXY: 'http://bad host:3128' });
        expect(resolveProxy(undefined, environment, target).source).toBe('none');
    });

    it('returns none when nothing is configured', () => {
        expect(resolveProxy(null, EMPTY_PROXY_ENVIRONMENT, target)).toEqual({
            url: null,
            source: 'none',
            trustEnv: true,
        });
    });

    it('freezes the result', () => {
        const result = resolveProxy('http://proxy.local:8080', EMPTY_PROXY_ENVIRONMENT);
        expect(Object.isFrozen(result)).toBe(true);
    });
});

describe('captureProxyEnvironment', () => {
    it('prefers upper case variables', () => {
        const environment = captureProxyEnvironment({
            HTTP_PROXY: 'http://upper:1',
            http_proxy: 'http://lower:1',
            no_proxy: 'internal',
        });
        expect(environment).toEqual({
            httpProxy: 'http://upper:1',
            httpsProxy: undefined,
            noProxy: 'internal',
        });
    });
});

describe('ProxyResolver', () => {
    it('reads the environment once at construction', () => {
        const env: NodeJS.ProcessEnv = { HTTPS_PROXY: 'http://first:3128' };
        const resolver = new ProxyResolver({ environment: captureProxyEnvironment(env) });
        env['HTTPS_PROXY'] = 'http://second:3128';

        expect(resolver.resolve(undefined, 'https://api.example.com').url).toBe('http://first:3128');
    });

    it('prioritizes the explicit proxy', () => {
        const resolver = new ProxyResolver({
            environment: captureProxyEnvironment({ HTTPS_PROXY: 'http://env:3128' }),
        });
        expect(resolver.resolve('http://override:8080').url).toBe('http://override:8080');
    });
});

describe('proxyUrlProblem', () => {
    it('explains why a value is unusable', () => {
        expect(proxyUrlProblem('http://proxy.local:3128')).toBeUndefined();
        expect(proxyUrlProblem('socks5://proxy.local')).toBe('expected an http:// or https:// scheme');
        expect(proxyUrlProblem('http://')).toBe('expected a URL with a host');
    });
});

describe('isRecognizedProxyUrl', () => {
    it('accepts http and https prefixes only', () => {
        expect(isRecognizedProxyUrl('http://a')).toBe(true);
        expect(isRecognizedProxyUrl('https://a')).toBe(true);
        expect(isRecognizedProxyUrl('socks://a')).toBe(false);
    });
});
