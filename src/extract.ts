/**
 * Article extraction from rendered HTML
 *
 * Each field is read through an ordered chain of rules; the first non-empty
 * value wins and a field no rule matches is null.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { ExtractedArticle } from './types.js';

/**
 * One step of a fallback chain. Rules are tried in order and the first one
 * returning a non-empty string wins.
 */
export interface ExtractionRule {
  name: string;
  extract: ($: CheerioAPI) => string | undefined;
}

const CONTENT_CLASS_NAMES = ['article', 'post', 'entry', 'content', 'main-content'];
const TEXT_EXCLUDED_TAGS = ['script', 'style', 'nav', 'header', 'footer'];

function metaContent(selector: string): ($: CheerioAPI) => string | undefined {
  return ($) => $(selector).first().attr('content');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Run a fallback chain against a document.
 */
export function firstMatch($: CheerioAPI, rules: readonly ExtractionRule[]): string | null {
  for (const rule of rules) {
    const value = rule.extract($)?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

export const titleRules: readonly ExtractionRule[] = [
  { name: 'title-element', extract: ($) => $('title').first().text() },
  { name: 'og:title', extract: metaContent('meta[property="og:title"]') },
];

export const excerptRules: readonly ExtractionRule[] = [
  { name: 'description', extract: metaContent('meta[name="description"]') },
  { name: 'og:description', extract: metaContent('meta[property="og:description"]') },
];

export const bylineRules: readonly ExtractionRule[] = [
  { name: 'author', extract: metaContent('meta[name="author"]') },
  { name: 'article:author', extract: metaContent('meta[property="article:author"]') },
];

export const siteNameRules: readonly ExtractionRule[] = [
  { name: 'og:site_name', extract: metaContent('meta[property="og:site_name"]') },
];

export const langRules: readonly ExtractionRule[] = [
  { name: 'html-lang', extract: ($) => $('html').first().attr('lang') },
];

export const dirRules: readonly ExtractionRule[] = [
  { name: 'html-dir', extract: ($) => $('html').first().attr('dir') },
];

export const publishedTimeRules: readonly ExtractionRule[] = [
  { name: 'article:published_time', extract: metaContent('meta[property="article:published_time"]') },
  { name: 'publication_date', extract: metaContent('meta[name="publication_date"]') },
  { name: 'time-element', extract: ($) => $('time').first().attr('datetime') },
];

function outerHtml<T extends AnyNode>($: CheerioAPI, selection: Cheerio<T>): string | undefined {
  return selection.length > 0 ? $.html(selection.first()) : undefined;
}

function classNameRule(className: string): ExtractionRule {
  const pattern = new RegExp(escapeRegExp(className), 'i');
  return {
    name: `class:${className}`,
    extract: ($) =>
      outerHtml(
        $,
        $('div[class], section[class]').filter((_, element) => pattern.test($(element).attr('class') ?? ''))
      ),
  };
}

export const contentRules: readonly ExtractionRule[] = [
  { name: 'article-element', extract: ($) => outerHtml($, $('article')) },
  { name: 'main-element', extract: ($) => outerHtml($, $('main')) },
  ...CONTENT_CLASS_NAMES.map(classNameRule),
];

function collectText<T extends AnyNode>($: CheerioAPI, selection: Cheerio<T>, lines: string[]): void {
  selection.contents().each((_, node) => {
    if (node.nodeType === 3 && 'data' in node) {
      const text = node.data.trim();
      if (text) {
        lines.push(text);
      }
    } else if (node.nodeType === 1) {
      collectText($, $(node), lines);
    }
  });
}

/**
 * Visible text of a page, one line per text run.
 *
 * Works on its own parse of the HTML so the elements it strips stay in the
 * document the other fields are read from.
 */
export function extractTextContent(html: string): string | null {
  const $ = cheerio.load(html);
  $(TEXT_EXCLUDED_TAGS.join(', ')).remove();

  const lines: string[] = [];
  const body = $('body');
  if (body.length > 0) {
    collectText($, body, lines);
  } else {
    collectText($, $.root(), lines);
  }

  const text = lines
    .join('\n')
    .replace(/\n\s*\n/g, '\n\n')
    .trim();
  return text ? text : null;
}

/**
 * Open Graph and Twitter card tags, keyed `og_<name>` and `twitter_<name>`.
 */
export function extractSocialMeta($: CheerioAPI): Record<string, string> | null {
  const meta: Record<string, string> = {};

  $('meta[property^="og:"]').each((_, element) => {
    const name = ($(element).attr('property') ?? '').slice('og:'.length);
    const content = $(element).attr('content');
    if (name && content) {
      meta[`og_${name}`] = content;
    }
  });

  $('meta[name^="twitter:"]').each((_, element) => {
    const name = ($(element).attr('name') ?? '').slice('twitter:'.length);
    const content = $(element).attr('content');
    if (name && content) {
      meta[`twitter_${name}`] = content;
    }
  });

  return Object.keys(meta).length > 0 ? meta : null;
}

/**
 * Extract article fields from a rendered HTML snapshot.
 */
export function extractArticle(html: string): ExtractedArticle {
  const $ = cheerio.load(html);
  const textContent = extractTextContent(html);

  return {
    title: firstMatch($, titleRules),
    byline: firstMatch($, bylineRules),
    excerpt: firstMatch($, excerptRules),
    siteName: firstMatch($, siteNameRules),
    content: firstMatch($, contentRules),
    textContent,
    length: textContent === null ? null : Array.from(textContent).length,
    lang: firstMatch($, langRules),
    dir: firstMatch($, dirRules),
    publishedTime: firstMatch($, publishedTimeRules),
    meta: extractSocialMeta($),
  };
}
