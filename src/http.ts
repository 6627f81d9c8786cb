#!/usr/bin/env node
/**
 * HTTP launcher for the article render API
 */

import { createApp, SERVICE_NAME } from './app.js';
import { ArticleService } from './article-service.js';
import { BrowserRenderer } from './browser-renderer.js';
import { FileCacheStore } from './cache.js';
import { loadConfig, type AppConfig } from './config.js';
import { FetchRenderer } from './fetch.js';
import { createLogger, describeError, type Logger } from './logger.js';
import { createHostRateLimiter } from './rate-limit.js';
import type { Renderer } from './renderer.js';

export function createRenderer(config: AppConfig, logger: Logger): Renderer {
  if (config.renderer.kind === 'http') {
    return new FetchRenderer({ logger });
  }
  return new BrowserRenderer({
    wsEndpoint: config.renderer.wsEndpoint,
    executablePath: config.renderer.executablePath,
    screenshotsDir: config.paths.screenshotsDir,
    userScriptsDir: config.paths.userScriptsDir,
    logger,
  });
}

export function createArticleService(config: AppConfig, logger: Logger): ArticleService {
  return new ArticleService({
    renderer: createRenderer(config, logger),
    cache: new FileCacheStore({
      dir: config.paths.cacheDir,
      ttlSeconds: config.cache.ttlSeconds,
      logger,
    }),
    rateLimiter: createHostRateLimiter(config.rateLimit.requestsPerMinute),
    logger,
  });
}

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config, { service: SERVICE_NAME });
  const app = createApp({ config, service: createArticleService(config, logger), logger });

  const { host, port } = config.server;
  const server = app.listen(port, host, () => {
    logger.info(`${SERVICE_NAME} listening on http://${host}:${port}`, {
      renderer: config.renderer.kind,
      cacheDir: config.paths.cacheDir,
      cacheTtlSeconds: config.cache.ttlSeconds,
      cacheByDefault: config.cache.enabledByDefault,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    server.close((error) => {
      if (error) {
        logger.error('Error while closing server', { error: describeError(error) });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  try {
    main();
  } catch (error) {
    console.error(`Failed to start ${SERVICE_NAME}:`, error);
    process.exit(1);
  }
}
