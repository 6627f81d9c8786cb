/**
 * Per-request render configuration
 *
 * Turns the string-encoded query parameters of `/api/article` into a typed,
 * frozen RequestConfig. Anything that changes the rendered page belongs here;
 * the `cache` flag does not, so it is returned next to the config instead of
 * inside it and never reaches cache key derivation.
 */

import { z } from 'zod';
import type { QueryParams } from './types.js';

export const RequestConfigSchema = z.object({
  fullContent: z.boolean(),
  screenshot: z.boolean(),
  userScripts: z.array(z.string().min(1)),
  userScriptsTimeout: z.number().int(),
  incognito: z.boolean(),
  timeout: z.number().int(),
  waitUntil: z.string(),
  sleep: z.number().int(),
  resource: z.array(z.string().min(1)),
  viewportWidth: z.number().int().nullable(),
  viewportHeight: z.number().int().nullable(),
  screenWidth: z.number().int().nullable(),
  screenHeight: z.number().int().nullable(),
  device: z.string(),
  scrollDown: z.number().int(),
  ignoreHttpsErrors: z.boolean(),
  userAgent: z.string(),
  locale: z.string(),
  timezone: z.string(),
  httpCredentials: z.string(),
  extraHttpHeaders: z.string(),
});

export type RequestConfig = Readonly<z.infer<typeof RequestConfigSchema>>;

export interface ParsedArticleRequest {
  url: string | undefined;
  useCache: boolean;
  config: RequestConfig;
  query: QueryParams;
}

const TRUE_VALUES = ['true', '1', 'yes'];
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * A present boolean is true only for true/1/yes; an absent one takes the default.
 */
export function parseBoolParam(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return TRUE_VALUES.includes(value.trim().toLowerCase());
}

export function parseIntParam<T extends number | null>(value: string | undefined, fallback: T): number | T {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return fallback;
  }
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : fallback;
}

export function parseListParam(value: string | undefined, fallback: readonly string[]): string[] {
  if (value === undefined || value.trim() === '') {
    return [...fallback];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseStringParam(value: string | undefined, fallback: string): string {
  return value === undefined ? fallback : value;
}

/**
 * Flatten an express-style query object: repeated parameters keep their first
 * value, nested objects are dropped.
 */
export function normalizeQuery(raw: Record<string, unknown>): QueryParams {
  const query: QueryParams = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      query[key] = value;
    } else if (Array.isArray(value)) {
      const first: unknown = value[0];
      if (typeof first === 'string') {
        query[key] = first;
      }
    }
  }
  return query;
}

/**
 * Build the effective RequestConfig from query parameters over the
 * server-wide defaults.
 */
export function parseArticleRequest(
  query: QueryParams,
  defaults: RequestConfig,
  defaultUseCache: boolean
): ParsedArticleRequest {
  const param = (name: string): string | undefined => query[name];

  const config: RequestConfig = Object.freeze({
    fullContent: parseBoolParam(param('full-content'), defaults.fullContent),
    screenshot: parseBoolParam(param('screenshot'), defaults.screenshot),
    userScripts: parseListParam(param('user-scripts'), defaults.userScripts),
    userScriptsTimeout: parseIntParam(param('user-scripts-timeout'), defaults.userScriptsTimeout),
    incognito: parseBoolParam(param('incognito'), defaults.incognito),
    timeout: parseIntParam(param('timeout'), defaults.timeout),
    waitUntil: parseStringParam(param('wait-until'), defaults.waitUntil),
    sleep: parseIntParam(param('sleep'), defaults.sleep),
    resource: parseListParam(param('resource'), defaults.resource),
    viewportWidth: parseIntParam(param('viewport-width'), defaults.viewportWidth),
    viewportHeight: parseIntParam(param('viewport-height'), defaults.viewportHeight),
    screenWidth: parseIntParam(param('screen-width'), defaults.screenWidth),
    screenHeight: parseIntParam(param('screen-height'), defaults.screenHeight),
    device: parseStringParam(param('device'), defaults.device),
    scrollDown: parseIntParam(param('scroll-down'), defaults.scrollDown),
    ignoreHttpsErrors: parseBoolParam(param('ignore-https-errors'), defaults.ignoreHttpsErrors),
    userAgent: parseStringParam(param('user-agent'), defaults.userAgent),
    locale: parseStringParam(param('locale'), defaults.locale),
    timezone: parseStringParam(param('timezone'), defaults.timezone),
    httpCredentials: parseStringParam(param('http-credentials'), defaults.httpCredentials),
    extraHttpHeaders: parseStringParam(param('extra-http-headers'), defaults.extraHttpHeaders),
  });

  const url = param('url');

  return {
    url: url === undefined || url.trim() === '' ? undefined : url,
    useCache: parseBoolParam(param('cache') ?? param('use-cache'), defaultUseCache),
    config,
    query,
  };
}

/**
 * `user:password`; the password may itself contain colons.
 */
export function parseHttpCredentials(value: string): { username: string; password: string } | undefined {
  const separator = value.indexOf(':');
  if (separator <= 0) {
    return undefined;
  }
  return {
    username: value.slice(0, separator),
    password: value.slice(separator + 1),
  };
}

/**
 * `key1:value1;key2:value2`
 */
export function parseExtraHeaders(value: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const pair of value.split(';')) {
    const separator = pair.indexOf(':');
    if (separator <= 0) {
      continue;
    }
    const name = pair.slice(0, separator).trim();
    const headerValue = pair.slice(separator + 1).trim();
    if (name) {
      headers[name] = headerValue;
    }
  }
  return headers;
}
