/**
 * Express application for the article render API
 */

import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import type { ArticleService } from './article-service.js';
import type { AppConfig } from './config.js';
import { ApiError, FetchError, RateLimitError, type ErrorBody } from './errors.js';
import { describeError, type Logger } from './logger.js';
import { normalizeQuery, parseArticleRequest } from './request-config.js';

export const SERVICE_NAME = 'article-render-api';
export const SERVICE_VERSION = '1.0.0';

export interface AppDeps {
  config: AppConfig;
  service: ArticleService;
  logger: Logger;
}

const ARTICLE_PARAMETERS: Record<string, string> = {
  url: 'Page URL to fetch (required)',
  cache: 'Return a cached result when one is fresh (bool)',
  'full-content': 'Include the full HTML in fullContent (bool)',
  screenshot: 'Take a screenshot of the page (bool)',
  'user-scripts': 'Comma-separated user scripts to run after load',
  'user-scripts-timeout': 'Wait after user scripts, in milliseconds',
  incognito: 'Launch the browser in incognito mode (bool)',
  timeout: 'Navigation timeout in milliseconds',
  'wait-until': 'Navigation event to wait for: load, domcontentloaded, networkidle, commit',
  sleep: 'Wait after page load, in milliseconds',
  resource: 'Comma-separated resource types to allow (document, script, image, ...)',
  'viewport-width': 'Viewport width in pixels',
  'viewport-height': 'Viewport height in pixels',
  'screen-width': 'Screen width in pixels',
  'screen-height': 'Screen height in pixels',
  device: 'Device to emulate',
  'scroll-down': 'Scroll down by this many pixels before capture',
  'ignore-https-errors': 'Ignore HTTPS errors (bool)',
  'user-agent': 'User agent override',
  locale: 'Browser locale',
  timezone: 'Browser timezone',
  'http-credentials': 'HTTP auth credentials (username:password)',
  'extra-http-headers': 'Extra HTTP headers (key1:value1;key2:value2)',
};

function errorBody(type: 'not_found' | 'internal_error', msg: string): ErrorBody {
  return { detail: [{ type, msg }] };
}

export function createApp({ config, service, logger }: AppDeps): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  if (config.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        '/api/article': {
          method: 'GET',
          description: 'Render a URL and return article metadata and content',
          parameters: ARTICLE_PARAMETERS,
          example: '/api/article?url=https://example.com/post&cache=true',
        },
        '/health': {
          method: 'GET',
          description: 'Health check endpoint',
        },
      },
    });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', service: SERVICE_NAME });
  });

  app.get('/api/article', async (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableEnded) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      const request = parseArticleRequest(
        normalizeQuery(req.query),
        config.requestDefaults,
        config.cache.enabledByDefault
      );
      const result = await service.getArticle(request, controller.signal);
      res.status(200).json(result);
    } catch (error) {
      if (controller.signal.aborted) {
        logger.info('Client disconnected before the article was ready', { path: req.originalUrl });
        return;
      }
      next(error);
    } finally {
      res.off('close', onClose);
    }
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json(errorBody('not_found', `Endpoint ${req.method} ${req.path} not found`));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ApiError) {
      if (err instanceof FetchError) {
        logger.error('Error fetching URL', { path: req.originalUrl, code: err.code, error: err.message });
      } else {
        logger.info('Rejected request', { path: req.originalUrl, error: err.message });
      }
      if (err instanceof RateLimitError) {
        res.setHeader('Retry-After', String(err.retryAfterSeconds));
      }
      res.status(err.statusCode).json(err.toBody());
      return;
    }

    logger.error('Unhandled error', { path: req.originalUrl, error: describeError(err) });
    res.status(500).json(errorBody('internal_error', describeError(err)));
  });

  return app;
}
