/**
 * Article pipeline: cache lookup, render, extract, assemble, persist.
 */

import { assembleArticleResult } from './assemble.js';
import type { CacheStore } from './cache.js';
import { deriveCacheKey } from './cache-key.js';
import { FetchError, MissingParameterError } from './errors.js';
import { extractArticle } from './extract.js';
import { describeError, type Logger } from './logger.js';
import type { HostRateLimiter } from './rate-limit.js';
import type { RenderResult, Renderer } from './renderer.js';
import type { RequestConfig } from './request-config.js';
import type { ArticleResult, ExtractedArticle, QueryParams } from './types.js';

export interface ArticleRequest {
  url: string | undefined;
  config: RequestConfig;
  useCache: boolean;
  query: QueryParams;
}

export interface ArticleServiceDeps {
  renderer: Renderer;
  cache: CacheStore;
  rateLimiter: HostRateLimiter;
  logger: Logger;
  clock?: () => Date;
}

const EMPTY_EXTRACTION: ExtractedArticle = {
  title: null,
  byline: null,
  excerpt: null,
  siteName: null,
  content: null,
  textContent: null,
  length: null,
  lang: null,
  dir: null,
  publishedTime: null,
  meta: null,
};

const SUPPORTED_PROTOCOLS = ['http:', 'https:'];

function assertFetchableUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new FetchError(`Invalid URL format: ${url}`, 'INVALID_URL', url, { cause: error });
  }
  if (!SUPPORTED_PROTOCOLS.includes(parsed.protocol)) {
    throw new FetchError(`Only HTTP and HTTPS URLs are supported: ${url}`, 'INVALID_URL', url);
  }
}

function errorName(error: unknown): string | undefined {
  return typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string'
    ? error.name
    : undefined;
}

function toFetchError(error: unknown, url: string, signal: AbortSignal | undefined): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (signal?.aborted || errorName(error) === 'AbortError') {
    return new FetchError('Request was cancelled', 'ABORTED', url, { cause: error });
  }
  if (errorName(error) === 'TimeoutError') {
    return new FetchError(describeError(error), 'TIMEOUT', url, { cause: error });
  }
  return new FetchError(describeError(error), 'RENDER_FAILED', url, { cause: error });
}

export class ArticleService {
  private readonly renderer: Renderer;
  private readonly cache: CacheStore;
  private readonly rateLimiter: HostRateLimiter;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(deps: ArticleServiceDeps) {
    this.renderer = deps.renderer;
    this.cache = deps.cache;
    this.rateLimiter = deps.rateLimiter;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Resolve an article request. With `useCache`, a fresh cached result is
   * returned without rendering; otherwise the page is rendered and the new
   * result is written to the cache on a best-effort basis.
   *
   * Concurrent misses for the same key each render and each write; the last
   * write wins. A cancelled request writes nothing.
   */
  async getArticle(request: ArticleRequest, signal?: AbortSignal): Promise<ArticleResult> {
    const { url, config } = request;
    if (!url) {
      throw new MissingParameterError('url');
    }

    const cacheKey = deriveCacheKey(url, config);

    if (request.useCache) {
      const cached = await this.cache.get(cacheKey);
      if (cached) {
        this.logger.info('Returning cached result', { url, cacheKey });
        return cached;
      }
    }

    assertFetchableUrl(url);
    await this.rateLimiter.consume(url);

    this.logger.info('Fetching URL', { url, renderer: this.renderer.name });
    let rendered: RenderResult;
    try {
      rendered = await this.renderer.render({
        url,
        config,
        screenshotName: cacheKey,
        ...(signal ? { signal } : {}),
      });
    } catch (error) {
      throw toFetchError(error, url, signal);
    }

    if (signal?.aborted) {
      throw new FetchError('Request was cancelled', 'ABORTED', url);
    }

    const result = assembleArticleResult({
      requestedUrl: url,
      finalUrl: rendered.finalUrl,
      html: rendered.html,
      extracted: this.extract(rendered.html, url),
      config,
      query: request.query,
      screenshotUri: rendered.screenshotUri,
      now: this.clock(),
    });

    await this.cache.put(cacheKey, result);
    return result;
  }

  private extract(html: string, url: string): ExtractedArticle {
    try {
      return extractArticle(html);
    } catch (error) {
      this.logger.warn('Extraction failed, returning empty fields', { url, error: describeError(error) });
      return EMPTY_EXTRACTION;
    }
  }
}
