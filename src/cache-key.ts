/**
 * Cache key derivation
 * A key is the MD5 of the URL and the canonical JSON of its RequestConfig.
 */

import { createHash } from 'node:crypto';
import type { RequestConfig } from './request-config.js';

const KEY_SEPARATOR = ':';

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item === undefined ? null : item));
  }
  if (typeof value === 'object') {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      const child: unknown = Reflect.get(value, key);
      if (child !== undefined) {
        sorted[key] = toJsonValue(child);
      }
    }
    return sorted;
  }
  return null;
}

/**
 * JSON with object keys sorted at every depth, so two field-equal objects
 * serialize identically whatever order their fields were assigned in.
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(toJsonValue(value));
}

/**
 * Stable cache key for a URL rendered under a given configuration.
 */
export function deriveCacheKey(url: string, config: RequestConfig): string {
  const material = `${url}${KEY_SEPARATOR}${canonicalStringify(config)}`;
  return createHash('md5').update(material, 'utf8').digest('hex');
}

/**
 * Content address of a URL, used as the article id.
 */
export function hashUrl(url: string): string {
  return createHash('md5').update(url, 'utf8').digest('hex');
}
