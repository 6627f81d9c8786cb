/**
 * Tests for configuration management
 */

import path from 'node:path';
import { loadConfig } from '../src/config.js';

describe('Config', () => {
  it('should load default configuration', () => {
    const config = loadConfig({});

    expect(config.server.port).toBe(3000);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.cache.ttlSeconds).toBe(3600);
    expect(config.cache.enabledByDefault).toBe(false);
    expect(config.renderer.kind).toBe('browser');
    expect(config.renderer.wsEndpoint).toBeUndefined();
    expect(config.rateLimit.requestsPerMinute).toBe(30);
    expect(config.logLevel).toBe('info');
    expect(config.paths.cacheDir).toBe(path.resolve('cache'));
    expect(config.paths.userScriptsDir).toBe(path.resolve('user_scripts'));
  });

  it('should load request defaults', () => {
    const { requestDefaults } = loadConfig({});

    expect(requestDefaults.timeout).toBe(60000);
    expect(requestDefaults.waitUntil).toBe('domcontentloaded');
    expect(requestDefaults.device).toBe('Desktop Chrome');
    expect(requestDefaults.incognito).toBe(true);
    expect(requestDefaults.ignoreHttpsErrors).toBe(true);
    expect(requestDefaults.fullContent).toBe(false);
    expect(requestDefaults.viewportWidth).toBeNull();
    expect(requestDefaults.userScripts).toEqual([]);
  });

  it('should parse environment variables correctly', () => {
    const config = loadConfig({
      API_PORT: '8080',
      API_HOST: '127.0.0.1',
      DEFAULT_CACHE: 'true',
      DEFAULT_CACHE_TTL: '60',
      DEFAULT_TIMEOUT: '15000',
      DEFAULT_VIEWPORT_WIDTH: '1280',
      RENDERER: 'HTTP',
      BROWSER_WS_ENDPOINT: ' ws://browser:3000 ',
      LOG_LEVEL: 'debug',
    });

    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe('127.0.0.1');
    expect(config.cache.enabledByDefault).toBe(true);
    expect(config.cache.ttlSeconds).toBe(60);
    expect(config.requestDefaults.timeout).toBe(15000);
    expect(config.requestDefaults.viewportWidth).toBe(1280);
    expect(config.renderer.kind).toBe('http');
    expect(config.renderer.wsEndpoint).toBe('ws://browser:3000');
    expect(config.logLevel).toBe('debug');
  });

  it('should handle invalid environment variables gracefully', () => {
    const config = loadConfig({
      API_PORT: 'invalid',
      DEFAULT_TIMEOUT: 'not-a-number',
      RENDERER: 'carrier-pigeon',
      LOG_LEVEL: 'loud',
    });

    // Should fall back to defaults
    expect(config.server.port).toBe(3000);
    expect(config.requestDefaults.timeout).toBe(60000);
    expect(config.renderer.kind).toBe('browser');
    expect(config.logLevel).toBe('info');
  });

  it('should reject values outside their valid range', () => {
    expect(() => loadConfig({ API_PORT: '70000' })).toThrow();
    expect(() => loadConfig({ DEFAULT_CACHE_TTL: '-5' })).toThrow();
  });

  it('should parse arrays correctly', () => {
    const config = loadConfig({
      DEFAULT_USER_SCRIPTS: 'remove-ads.js,  expand.js  ,',
      DEFAULT_RESOURCE: 'document, script',
    });

    expect(config.requestDefaults.userScripts).toEqual(['remove-ads.js', 'expand.js']);
    expect(config.requestDefaults.resource).toEqual(['document', 'script']);
  });

  it('should handle boolean values correctly', () => {
    expect(loadConfig({ DEFAULT_CACHE: 'true' }).cache.enabledByDefault).toBe(true);
    expect(loadConfig({ DEFAULT_CACHE: '1' }).cache.enabledByDefault).toBe(true);
    expect(loadConfig({ DEFAULT_CACHE: 'false' }).cache.enabledByDefault).toBe(false);
    expect(loadConfig({ DEFAULT_CACHE: '0' }).cache.enabledByDefault).toBe(false);
    expect(loadConfig({ DEFAULT_INCOGNITO: 'false' }).requestDefaults.incognito).toBe(false);
  });

  it('should return a frozen configuration', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.requestDefaults)).toBe(true);
    expect(Object.isFrozen(config.requestDefaults.userScripts)).toBe(true);
  });
});
