/**
 * Configuration management for the article render API
 * Handles environment variables and default settings
 */

import path from 'node:path';
import { z } from 'zod';
import { RequestConfigSchema, type RequestConfig } from './request-config.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export const RENDERER_KINDS = ['browser', 'http'] as const;

export const ConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().positive().max(65535),
  }),
  paths: z.object({
    cacheDir: z.string().min(1),
    screenshotsDir: z.string().min(1),
    userScriptsDir: z.string().min(1),
  }),
  cache: z.object({
    enabledByDefault: z.boolean(),
    ttlSeconds: z.number().int().nonnegative(),
  }),
  renderer: z.object({
    kind: z.enum(RENDERER_KINDS),
    wsEndpoint: z.string().optional(),
    executablePath: z.string().optional(),
  }),
  rateLimit: z.object({
    requestsPerMinute: z.number().int().nonnegative(),
  }),
  requestDefaults: RequestConfigSchema,
  logLevel: z.enum(LOG_LEVELS),
});

export type AppConfig = Readonly<z.infer<typeof ConfigSchema>>;
export type LogLevel = (typeof LOG_LEVELS)[number];

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') return defaultValue;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseOptionalNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

function parseArray(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseOptionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseEnum<T extends string>(value: string | undefined, allowed: readonly T[], defaultValue: T): T {
  const normalized = value?.trim().toLowerCase();
  return allowed.find((candidate) => candidate === normalized) ?? defaultValue;
}

function loadRequestDefaults(env: Env): RequestConfig {
  return {
    fullContent: parseBoolean(env['DEFAULT_FULL_CONTENT'], false),
    screenshot: parseBoolean(env['DEFAULT_SCREENSHOT'], false),
    userScripts: parseArray(env['DEFAULT_USER_SCRIPTS']),
    userScriptsTimeout: parseNumber(env['DEFAULT_USER_SCRIPTS_TIMEOUT'], 0),
    incognito: parseBoolean(env['DEFAULT_INCOGNITO'], true),
    timeout: parseNumber(env['DEFAULT_TIMEOUT'], 60000),
    waitUntil: env['DEFAULT_WAIT_UNTIL'] || 'domcontentloaded',
    sleep: parseNumber(env['DEFAULT_SLEEP'], 0),
    resource: parseArray(env['DEFAULT_RESOURCE']),
    viewportWidth: parseOptionalNumber(env['DEFAULT_VIEWPORT_WIDTH']),
    viewportHeight: parseOptionalNumber(env['DEFAULT_VIEWPORT_HEIGHT']),
    screenWidth: parseOptionalNumber(env['DEFAULT_SCREEN_WIDTH']),
    screenHeight: parseOptionalNumber(env['DEFAULT_SCREEN_HEIGHT']),
    device: env['DEFAULT_DEVICE'] || 'Desktop Chrome',
    scrollDown: parseNumber(env['DEFAULT_SCROLL_DOWN'], 0),
    ignoreHttpsErrors: parseBoolean(env['DEFAULT_IGNORE_HTTPS_ERRORS'], true),
    userAgent: env['DEFAULT_USER_AGENT'] ?? '',
    locale: env['DEFAULT_LOCALE'] ?? '',
    timezone: env['DEFAULT_TIMEZONE'] ?? '',
    httpCredentials: env['DEFAULT_HTTP_CREDENTIALS'] ?? '',
    extraHttpHeaders: env['DEFAULT_EXTRA_HTTP_HEADERS'] ?? '',
  };
}

/**
 * Load configuration from environment variables with defaults.
 * The returned object is frozen; build it once at startup and pass it down.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const wsEndpoint = parseOptionalString(env['BROWSER_WS_ENDPOINT']);
  const executablePath = parseOptionalString(env['CHROMIUM_EXECUTABLE_PATH']);

  const parsed = ConfigSchema.parse({
    server: {
      host: env['API_HOST'] || '0.0.0.0',
      port: parseNumber(env['API_PORT'], 3000),
    },
    paths: {
      cacheDir: path.resolve(env['CACHE_DIR'] || 'cache'),
      screenshotsDir: path.resolve(env['SCREENSHOTS_DIR'] || 'screenshots'),
      userScriptsDir: path.resolve(env['USER_SCRIPTS_DIR'] || 'user_scripts'),
    },
    cache: {
      enabledByDefault: parseBoolean(env['DEFAULT_CACHE'], false),
      ttlSeconds: parseNumber(env['DEFAULT_CACHE_TTL'], 3600),
    },
    renderer: {
      kind: parseEnum(env['RENDERER'], RENDERER_KINDS, 'browser'),
      ...(wsEndpoint ? { wsEndpoint } : {}),
      ...(executablePath ? { executablePath } : {}),
    },
    rateLimit: {
      requestsPerMinute: parseNumber(env['RATE_LIMIT_PER_MINUTE'], 30),
    },
    requestDefaults: loadRequestDefaults(env),
    logLevel: parseEnum(env['LOG_LEVEL'], LOG_LEVELS, 'info'),
  });

  return deepFreeze(parsed);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
