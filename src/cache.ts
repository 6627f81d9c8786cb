/**
 * File-backed result cache for the article render API
 * One JSON file per key: { "timestamp": <epoch seconds>, "data": <ArticleResult> }
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { CacheReadError, CacheWriteError } from './errors.js';
import { describeError, type Logger } from './logger.js';
import { ArticleResultSchema, type ArticleResult } from './types.js';

export const CACHE_FILE_EXTENSION = '.json';

export interface CacheEntry {
  timestamp: number;
  data: ArticleResult;
}

export type CacheWriteResult = { ok: true; path: string } | { ok: false; error: CacheWriteError };

export interface CacheStore {
  get(key: string): Promise<ArticleResult | undefined>;
  put(key: string, value: ArticleResult): Promise<CacheWriteResult>;
}

export interface FileCacheStoreOptions {
  dir: string;
  ttlSeconds: number;
  logger: Logger;
  /** Current time in epoch seconds. */
  now?: () => number;
}

// The timestamp/data wrapper is the schema marker: files written before it
// existed hold a bare result and are read as misses.
const EntryMarkerSchema = z.object({
  timestamp: z.number().finite(),
  data: z.object({}).passthrough(),
});

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

type ParsedEntry =
  | { kind: 'entry'; entry: CacheEntry }
  | { kind: 'legacy' }
  | { kind: 'corrupt'; error: CacheReadError };

function parseEntry(key: string, raw: string): ParsedEntry {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { kind: 'corrupt', error: new CacheReadError(`Invalid JSON: ${describeError(error)}`, key, { cause: error }) };
  }

  const marker = EntryMarkerSchema.safeParse(json);
  if (!marker.success) {
    return { kind: 'legacy' };
  }

  const data = ArticleResultSchema.safeParse(marker.data.data);
  if (!data.success) {
    const issue = data.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
    return { kind: 'corrupt', error: new CacheReadError(`Unexpected cached result (${where})`, key) };
  }

  return { kind: 'entry', entry: { timestamp: marker.data.timestamp, data: data.data } };
}

// fs errors may belong to another realm; match on shape.
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class FileCacheStore implements CacheStore {
  private readonly dir: string;
  private readonly ttlSeconds: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: FileCacheStoreOptions) {
    this.dir = options.dir;
    this.ttlSeconds = options.ttlSeconds;
    this.logger = options.logger;
    this.now = options.now ?? (() => Date.now() / 1000);
  }

  /**
   * Path of the file backing a key, or undefined for a key that is not filename-safe.
   */
  pathFor(key: string): string | undefined {
    return KEY_PATTERN.test(key) ? path.join(this.dir, `${key}${CACHE_FILE_EXTENSION}`) : undefined;
  }

  /**
   * Cached result for a key, or undefined when there is none, it has expired,
   * or the file cannot be used. Never throws.
   *
   * Expired and unreadable files are left where they are.
   */
  async get(key: string, ttlSeconds: number = this.ttlSeconds): Promise<ArticleResult | undefined> {
    const file = this.pathFor(key);
    if (!file) {
      this.logger.warn('Refusing cache lookup for unsafe key', { key });
      return undefined;
    }

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug('Cache miss', { key });
      } else {
        this.logger.warn('Failed to read cache', { key, error: describeError(error) });
      }
      return undefined;
    }

    const parsed = parseEntry(key, raw);
    if (parsed.kind === 'corrupt') {
      this.logger.warn('Failed to read cache', { key, error: parsed.error.message });
      return undefined;
    }
    if (parsed.kind === 'legacy') {
      this.logger.info('Cache entry has old format without timestamp, treating as expired', { key });
      return undefined;
    }

    const age = this.now() - parsed.entry.timestamp;
    if (age > ttlSeconds) {
      this.logger.info('Cache expired', { key, ageSeconds: Number(age.toFixed(1)), ttlSeconds });
      return undefined;
    }

    return parsed.entry.data;
  }

  /**
   * Write (or overwrite) the entry for a key. Failures are logged and
   * returned, never thrown.
   */
  async put(key: string, value: ArticleResult): Promise<CacheWriteResult> {
    const file = this.pathFor(key);
    if (!file) {
      const error = new CacheWriteError('Unsafe cache key', key);
      this.logger.warn('Failed to save cache', { key, error: error.message });
      return { ok: false, error };
    }

    const entry: CacheEntry = { timestamp: this.now(), data: value };
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(file, JSON.stringify(entry), 'utf-8');
      return { ok: true, path: file };
    } catch (cause) {
      const error = new CacheWriteError(`Failed to save cache: ${describeError(cause)}`, key, { cause });
      this.logger.warn('Failed to save cache', { key, error: describeError(cause) });
      return { ok: false, error };
    }
  }
}
