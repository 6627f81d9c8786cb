/**
 * Plain HTTP renderer for the article render API
 *
 * Fetches the page without a browser: no scripts run, no screenshots. Useful
 * for static sites or where no Chromium is available (RENDERER=http).
 */

import fetch, { FetchError as NodeFetchError } from 'node-fetch';
import { FetchError } from './errors.js';
import type { Logger } from './logger.js';
import { parseExtraHeaders, parseHttpCredentials } from './request-config.js';
import type { RenderRequest, RenderResult, Renderer } from './renderer.js';

export const DEFAULT_HTTP_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36';

// node-fetch rejects with its own AbortError when the signal fires.
function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

export interface FetchRendererOptions {
  logger: Logger;
}

export class FetchRenderer implements Renderer {
  readonly name = 'http';
  private readonly logger: Logger;

  constructor(options: FetchRendererOptions) {
    this.logger = options.logger;
  }

  async render({ url, config, signal }: RenderRequest): Promise<RenderResult> {
    signal?.throwIfAborted();

    const headers: Record<string, string> = {
      'User-Agent': config.userAgent || DEFAULT_HTTP_USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': config.locale || 'en-US,en;q=0.5',
      ...parseExtraHeaders(config.extraHttpHeaders),
    };

    const credentials = parseHttpCredentials(config.httpCredentials);
    if (credentials) {
      const token = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
      headers['Authorization'] = `Basic ${token}`;
    }

    if (config.screenshot) {
      this.logger.warn('Screenshots need the browser renderer; skipping', { url });
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        redirect: 'follow',
        timeout: config.timeout > 0 ? config.timeout : 0,
        ...(signal ? { signal } : {}),
      });

      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, 'HTTP_ERROR', url);
      }

      const html = await response.text();
      const finalUrl = response.url || url;
      this.logger.info('Fetched page', { url, finalUrl, bytes: html.length });

      return { finalUrl, html, screenshotUri: null };
    } catch (error) {
      if (error instanceof NodeFetchError && error.type === 'request-timeout') {
        throw new FetchError(`Request timeout after ${config.timeout}ms`, 'TIMEOUT', url, { cause: error });
      }
      if (isAbortError(error)) {
        throw new FetchError('Request was cancelled', 'ABORTED', url, { cause: error });
      }
      throw error;
    }
  }
}
