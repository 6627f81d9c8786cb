/**
 * Structured logging for the article render API
 * One JSON object per line, filtered by LOG_LEVEL. Debug and info go to stdout,
 * warn and error to stderr. Bindings given at creation appear on every line.
 */

import { LOG_LEVELS, type AppConfig, type LogLevel } from './config.js';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    level: LogLevel,
    private readonly bindings: LogMeta
  ) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: LogMeta | undefined): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) {
      return;
    }

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      ...this.bindings,
      message,
      ...meta,
    });

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

/**
 * Logger for the configured level. `bindings` (service name, for instance)
 * are merged into every line.
 */
export function createLogger(config: Pick<AppConfig, 'logLevel'>, bindings: LogMeta = {}): Logger {
  return new ConsoleLogger(config.logLevel, bindings);
}

/**
 * Logger that drops everything, for tests and library callers that log elsewhere.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Message of anything thrown. Matches on shape so errors raised in another
 * realm (fs, for one) still yield their message.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
