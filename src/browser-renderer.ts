/**
 * Headless Chromium renderer built on playwright-core
 *
 * playwright-core ships no browser. Either point BROWSER_WS_ENDPOINT at a
 * running Chrome DevTools endpoint or CHROMIUM_EXECUTABLE_PATH at a local
 * Chromium binary.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { chromium, devices, type Browser, type BrowserContextOptions, type Page } from 'playwright-core';
import { describeError, type Logger } from './logger.js';
import { parseExtraHeaders, parseHttpCredentials, type RequestConfig } from './request-config.js';
import { createAbortError, pause, toWaitUntil, type RenderRequest, type RenderResult, type Renderer } from './renderer.js';

// Lets lazy-loaded content settle after scrolling.
const SCROLL_SETTLE_MS = 500;

export interface BrowserRendererOptions {
  wsEndpoint?: string | undefined;
  executablePath?: string | undefined;
  screenshotsDir: string;
  userScriptsDir: string;
  logger: Logger;
}

/**
 * Resolve a user script name inside the scripts directory. Names that would
 * leave the directory resolve to undefined.
 */
export function resolveUserScript(userScriptsDir: string, name: string): string | undefined {
  const root = path.resolve(userScriptsDir);
  const target = path.resolve(root, name);
  const relative = path.relative(root, target);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return undefined;
  }
  return target;
}

export function buildContextOptions(config: RequestConfig, logger: Logger): BrowserContextOptions {
  const descriptor = config.device ? devices[config.device] : undefined;
  if (config.device && !descriptor) {
    logger.warn('Unknown device, using browser defaults', { device: config.device });
  }

  const options: BrowserContextOptions = {
    ...(descriptor
      ? {
          viewport: descriptor.viewport,
          userAgent: descriptor.userAgent,
          deviceScaleFactor: descriptor.deviceScaleFactor,
          isMobile: descriptor.isMobile,
          hasTouch: descriptor.hasTouch,
        }
      : {}),
    ignoreHTTPSErrors: config.ignoreHttpsErrors,
  };

  if (config.viewportWidth && config.viewportHeight) {
    options.viewport = { width: config.viewportWidth, height: config.viewportHeight };
  }
  if (config.screenWidth && config.screenHeight) {
    options.screen = { width: config.screenWidth, height: config.screenHeight };
  }
  if (config.userAgent) {
    options.userAgent = config.userAgent;
  }
  if (config.locale) {
    options.locale = config.locale;
  }
  if (config.timezone) {
    options.timezoneId = config.timezone;
  }

  const credentials = parseHttpCredentials(config.httpCredentials);
  if (credentials) {
    options.httpCredentials = credentials;
  }

  const headers = parseExtraHeaders(config.extraHttpHeaders);
  if (Object.keys(headers).length > 0) {
    options.extraHTTPHeaders = headers;
  }

  return options;
}

export class BrowserRenderer implements Renderer {
  readonly name = 'browser';
  private readonly options: BrowserRendererOptions;

  constructor(options: BrowserRendererOptions) {
    this.options = options;
  }

  async render({ url, config, screenshotName, signal }: RenderRequest): Promise<RenderResult> {
    signal?.throwIfAborted();
    const { logger } = this.options;
    const browser = await this.openBrowser(config);
    if (signal?.aborted) {
      await this.closeBrowser(browser);
      throw createAbortError();
    }

    // Closing on abort makes any pending page call reject.
    const closeOnAbort = (): void => {
      void this.closeBrowser(browser);
    };
    signal?.addEventListener('abort', closeOnAbort, { once: true });

    try {
      const context = await browser.newContext(buildContextOptions(config, logger));
      const page = await context.newPage();

      if (config.resource.length > 0) {
        const allowed = new Set(config.resource);
        await page.route('**/*', (route) =>
          allowed.has(route.request().resourceType()) ? route.continue() : route.abort()
        );
      }

      if (config.timeout > 0) {
        page.setDefaultNavigationTimeout(config.timeout);
      }
      await page.goto(url, { waitUntil: toWaitUntil(config.waitUntil) });

      if (config.userScripts.length > 0) {
        await this.runUserScripts(page, config.userScripts);
        await pause(config.userScriptsTimeout, signal);
      }

      await pause(config.sleep, signal);

      if (config.scrollDown > 0) {
        await page.evaluate(`window.scrollBy(0, ${config.scrollDown});`);
        await pause(SCROLL_SETTLE_MS, signal);
      }

      const finalUrl = page.url();
      const html = await page.content();
      const screenshotUri = config.screenshot ? await this.takeScreenshot(page, screenshotName) : null;

      logger.info('Rendered page', { url, finalUrl, bytes: html.length });
      return { finalUrl, html, screenshotUri };
    } finally {
      signal?.removeEventListener('abort', closeOnAbort);
      await this.closeBrowser(browser);
    }
  }

  private async openBrowser(config: RequestConfig): Promise<Browser> {
    const { wsEndpoint, executablePath, logger } = this.options;
    if (wsEndpoint) {
      if (!config.incognito) {
        logger.debug('incognito=false has no effect on a remote browser');
      }
      return chromium.connectOverCDP(wsEndpoint);
    }
    return chromium.launch({
      headless: true,
      ...(executablePath ? { executablePath } : {}),
      args: config.incognito ? ['--incognito'] : [],
    });
  }

  private async closeBrowser(browser: Browser): Promise<void> {
    try {
      await browser.close();
    } catch (error) {
      this.options.logger.warn('Failed to close browser', { error: describeError(error) });
    }
  }

  private async runUserScripts(page: Page, names: readonly string[]): Promise<void> {
    const { userScriptsDir, logger } = this.options;
    for (const name of names) {
      const scriptPath = resolveUserScript(userScriptsDir, name);
      if (!scriptPath) {
        logger.warn('Rejected user script outside the scripts directory', { script: name });
        continue;
      }

      let source: string;
      try {
        source = await fs.readFile(scriptPath, 'utf-8');
      } catch (error) {
        logger.warn('User script not found', { script: name, error: describeError(error) });
        continue;
      }

      try {
        await page.evaluate(source);
        logger.info('Executed user script', { script: name });
      } catch (error) {
        logger.warn('Failed to execute user script', { script: name, error: describeError(error) });
      }
    }
  }

  private async takeScreenshot(page: Page, name: string): Promise<string | null> {
    const { screenshotsDir, logger } = this.options;
    const filename = `${name}.png`;
    try {
      await fs.mkdir(screenshotsDir, { recursive: true });
      await page.screenshot({ path: path.join(screenshotsDir, filename), fullPage: true });
      logger.info('Screenshot saved', { filename });
      return `file://screenshots/${filename}`;
    } catch (error) {
      logger.warn('Failed to save screenshot', { error: describeError(error) });
      return null;
    }
  }
}
