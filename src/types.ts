/**
 * Shared result types for the article pipeline
 */

import { z } from 'zod';

const nullableString = z.string().nullable();

/**
 * Complete response envelope. Absent values are always `null`, never omitted,
 * so a consumer can tell "not present in the page" from "not requested".
 */
export const ArticleResultSchema = z.object({
  id: z.string().min(1),
  url: z.string().min(1),
  domain: nullableString,
  title: nullableString,
  byline: nullableString,
  excerpt: nullableString,
  siteName: nullableString,
  content: nullableString,
  textContent: nullableString,
  length: z.number().int().nonnegative().nullable(),
  lang: nullableString,
  dir: nullableString,
  publishedTime: nullableString,
  fullContent: nullableString,
  date: z.string().min(1),
  query: z.record(z.string()),
  meta: z.record(z.string()).nullable(),
  resultUri: z.string().min(1),
  screenshotUri: nullableString,
});

export type ArticleResult = z.infer<typeof ArticleResultSchema>;

/**
 * The part of an ArticleResult that comes out of the HTML alone.
 */
export type ExtractedArticle = Pick<
  ArticleResult,
  | 'title'
  | 'byline'
  | 'excerpt'
  | 'siteName'
  | 'content'
  | 'textContent'
  | 'length'
  | 'lang'
  | 'dir'
  | 'publishedTime'
  | 'meta'
>;

/**
 * Flat view of the inbound query string, one value per parameter.
 */
export type QueryParams = Record<string, string>;
