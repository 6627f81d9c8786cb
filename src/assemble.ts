/**
 * Result assembly
 * Combines extracted fields, request echo and render output into the
 * fixed-shape ArticleResult returned to clients and stored in the cache.
 */

import { hashUrl } from './cache-key.js';
import type { RequestConfig } from './request-config.js';
import type { ArticleResult, ExtractedArticle, QueryParams } from './types.js';

export const RESULT_URI_PREFIX = 'api://article/';

export interface AssembleInput {
  /** URL as the client asked for it. */
  requestedUrl: string;
  /** URL the renderer ended up on after redirects. */
  finalUrl: string;
  html: string;
  extracted: ExtractedArticle;
  config: RequestConfig;
  query: QueryParams;
  screenshotUri: string | null;
  now?: Date;
}

const AUTHORITY_PATTERN = /^[a-z][a-z\d+.-]*:\/\/([^/?#]*)/i;

/**
 * Authority of a URL as written: userinfo and port are kept, an explicit
 * default port included. Null when the URL does not parse or has no authority.
 */
export function domainOf(url: string): string | null {
  try {
    new URL(url);
  } catch {
    return null;
  }
  const authority = AUTHORITY_PATTERN.exec(url)?.[1];
  return authority ? authority : null;
}

/**
 * Echo of the request: the requested URL plus every other parameter as sent.
 */
export function buildQueryEcho(requestedUrl: string, query: QueryParams): QueryParams {
  const echo: QueryParams = { url: requestedUrl };
  for (const [key, value] of Object.entries(query)) {
    if (key !== 'url') {
      echo[key] = value;
    }
  }
  return echo;
}

export function assembleArticleResult(input: AssembleInput): ArticleResult {
  const id = hashUrl(input.finalUrl);
  const { extracted } = input;

  return {
    id,
    url: input.finalUrl,
    domain: domainOf(input.finalUrl),
    title: extracted.title,
    byline: extracted.byline,
    excerpt: extracted.excerpt,
    siteName: extracted.siteName,
    content: extracted.content,
    textContent: extracted.textContent,
    length: extracted.length,
    lang: extracted.lang,
    dir: extracted.dir,
    publishedTime: extracted.publishedTime,
    fullContent: input.config.fullContent ? input.html : null,
    date: (input.now ?? new Date()).toISOString(),
    query: buildQueryEcho(input.requestedUrl, input.query),
    meta: extracted.meta,
    resultUri: `${RESULT_URI_PREFIX}${id}`,
    screenshotUri: input.screenshotUri,
  };
}
