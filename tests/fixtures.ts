/**
 * Shared test data
 */

import type { CacheStore, CacheWriteResult } from '../src/cache.js';
import { CacheWriteError } from '../src/errors.js';
import type { Renderer, RenderRequest, RenderResult } from '../src/renderer.js';
import type { RequestConfig } from '../src/request-config.js';
import type { ArticleResult } from '../src/types.js';

export const ARTICLE_HTML =
  '<html lang="en"><head><title>T</title><meta name="description" content="D"></head>' +
  '<body><article><p>Body</p></article></body></html>';

export function baseRequestConfig(overrides: Partial<RequestConfig> = {}): RequestConfig {
  return {
    fullContent: false,
    screenshot: false,
    userScripts: [],
    userScriptsTimeout: 0,
    incognito: true,
    timeout: 60000,
    waitUntil: 'domcontentloaded',
    sleep: 0,
    resource: [],
    viewportWidth: null,
    viewportHeight: null,
    screenWidth: null,
    screenHeight: null,
    device: 'Desktop Chrome',
    scrollDown: 0,
    ignoreHttpsErrors: true,
    userAgent: '',
    locale: '',
    timezone: '',
    httpCredentials: '',
    extraHttpHeaders: '',
    ...overrides,
  };
}

export function sampleArticle(overrides: Partial<ArticleResult> = {}): ArticleResult {
  return {
    id: 'cd69b81ea00cc2798797293cbc92d643',
    url: 'https://example.com/a',
    domain: 'example.com',
    title: 'T',
    byline: null,
    excerpt: 'D',
    siteName: null,
    content: '<article><p>Body</p></article>',
    textContent: 'Body',
    length: 4,
    lang: 'en',
    dir: null,
    publishedTime: null,
    fullContent: null,
    date: '2026-01-02T03:04:05.678Z',
    query: { url: 'https://example.com/a' },
    meta: null,
    resultUri: 'api://article/cd69b81ea00cc2798797293cbc92d643',
    screenshotUri: null,
    ...overrides,
  };
}

export function createMockLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/**
 * Renderer stand-in that serves fixed HTML and records every call.
 */
export class FakeRenderer implements Renderer {
  readonly name = 'fake';
  readonly calls: RenderRequest[] = [];
  private handler: (request: RenderRequest) => Promise<RenderResult>;

  constructor(html: string = ARTICLE_HTML, finalUrl?: string) {
    this.handler = async (request) => ({
      finalUrl: finalUrl ?? request.url,
      html,
      screenshotUri: null,
    });
  }

  respondWith(handler: (request: RenderRequest) => Promise<RenderResult>): this {
    this.handler = handler;
    return this;
  }

  async render(request: RenderRequest): Promise<RenderResult> {
    this.calls.push(request);
    return this.handler(request);
  }
}

/**
 * In-memory cache that records every write.
 */
export class MemoryCache implements CacheStore {
  readonly entries = new Map<string, ArticleResult>();
  readonly puts: string[] = [];
  failWrites = false;

  async get(key: string): Promise<ArticleResult | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, value: ArticleResult): Promise<CacheWriteResult> {
    this.puts.push(key);
    if (this.failWrites) {
      return { ok: false, error: new CacheWriteError('disk full', key) };
    }
    this.entries.set(key, value);
    return { ok: true, path: `${key}.json` };
  }
}
