/**
 * Tests for cache key derivation
 */

import { canonicalStringify, deriveCacheKey, hashUrl } from '../src/cache-key.js';
import { parseArticleRequest, type RequestConfig } from '../src/request-config.js';
import { baseRequestConfig } from './fixtures.js';

const URL_A = 'https://example.com/a';

describe('canonicalStringify', () => {
  it('should sort keys at every depth and keep array order', () => {
    expect(canonicalStringify({ b: 1, a: { d: [3, { z: 1, y: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[3,{"y":2,"z":1}]},"b":1}'
    );
  });

  it('should drop undefined fields', () => {
    expect(canonicalStringify({ a: undefined, b: 2 })).toBe('{"b":2}');
  });
});

describe('deriveCacheKey', () => {
  it('should produce a 32 character hex digest', () => {
    expect(deriveCacheKey(URL_A, baseRequestConfig())).toMatch(/^[0-9a-f]{32}$/);
  });

  it('should ignore field insertion order', () => {
    const forward = baseRequestConfig({ locale: 'fr-FR', viewportWidth: 800, viewportHeight: 600 });
    const backward: RequestConfig = {
      extraHttpHeaders: '',
      httpCredentials: '',
      timezone: '',
      locale: 'fr-FR',
      userAgent: '',
      ignoreHttpsErrors: true,
      scrollDown: 0,
      device: 'Desktop Chrome',
      screenHeight: null,
      screenWidth: null,
      viewportHeight: 600,
      viewportWidth: 800,
      resource: [],
      sleep: 0,
      waitUntil: 'domcontentloaded',
      timeout: 60000,
      incognito: true,
      userScriptsTimeout: 0,
      userScripts: [],
      screenshot: false,
      fullContent: false,
    };

    expect(deriveCacheKey(URL_A, backward)).toBe(deriveCacheKey(URL_A, forward));
  });

  it('should be the same across separately built requests', () => {
    const first = parseArticleRequest({ url: URL_A, timeout: '1000', sleep: '5' }, baseRequestConfig(), false);
    const second = parseArticleRequest({ sleep: '5', timeout: '1000', url: URL_A }, baseRequestConfig(), false);

    expect(deriveCacheKey(URL_A, first.config)).toBe(deriveCacheKey(URL_A, second.config));
  });

  it('should not depend on the cache flag', () => {
    const cached = parseArticleRequest({ url: URL_A, cache: 'true' }, baseRequestConfig(), false);
    const uncached = parseArticleRequest({ url: URL_A, cache: 'false' }, baseRequestConfig(), false);

    expect(deriveCacheKey(URL_A, cached.config)).toBe(deriveCacheKey(URL_A, uncached.config));
  });

  it('should change when any single field changes', () => {
    const variations: Partial<RequestConfig>[] = [
      { fullContent: true },
      { screenshot: true },
      { userScripts: ['remove-ads.js'] },
      { userScriptsTimeout: 100 },
      { incognito: false },
      { timeout: 30000 },
      { waitUntil: 'load' },
      { sleep: 250 },
      { resource: ['document'] },
      { viewportWidth: 1024 },
      { viewportHeight: 768 },
      { screenWidth: 1920 },
      { screenHeight: 1080 },
      { device: 'iPhone 13' },
      { scrollDown: 400 },
      { ignoreHttpsErrors: false },
      { userAgent: 'test-agent' },
      { locale: 'en-GB' },
      { timezone: 'Europe/Berlin' },
      { httpCredentials: 'user:test-secret' },
      { extraHttpHeaders: 'X-Test:1' },
    ];

    const baseKey = deriveCacheKey(URL_A, baseRequestConfig());
    const keys = variations.map((variation) => deriveCacheKey(URL_A, baseRequestConfig(variation)));

    expect(keys).not.toContain(baseKey);
    expect(new Set(keys).size).toBe(variations.length);
  });

  it('should change with the URL', () => {
    expect(deriveCacheKey('https://example.com/b', baseRequestConfig())).not.toBe(
      deriveCacheKey(URL_A, baseRequestConfig())
    );
  });
});

describe('hashUrl', () => {
  it('should be the md5 of the URL', () => {
    expect(hashUrl(URL_A)).toBe('cd69b81ea00cc2798797293cbc92d643');
  });
});
