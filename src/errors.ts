/**
 * Error taxonomy for the article pipeline
 *
 * Only MissingParameterError, RateLimitError and FetchError ever reach a
 * client. Cache errors are recovered where they happen and only logged.
 */

export type ErrorDetailType = 'missing_parameter' | 'fetch_error' | 'rate_limited' | 'not_found' | 'internal_error';

export interface ErrorDetail {
  type: ErrorDetailType;
  msg: string;
}

export interface ErrorBody {
  detail: ErrorDetail[];
}

export abstract class ApiError extends Error {
  abstract readonly statusCode: number;
  abstract readonly detailType: ErrorDetailType;

  toBody(): ErrorBody {
    return { detail: [{ type: this.detailType, msg: this.message }] };
  }
}

export class MissingParameterError extends ApiError {
  readonly statusCode = 400;
  readonly detailType = 'missing_parameter';

  constructor(public readonly parameter: string) {
    super(`Missing required parameter: ${parameter}`);
    this.name = 'MissingParameterError';
  }
}

export type FetchErrorCode = 'INVALID_URL' | 'TIMEOUT' | 'ABORTED' | 'HTTP_ERROR' | 'RENDER_FAILED';

export class FetchError extends ApiError {
  readonly statusCode = 500;
  readonly detailType = 'fetch_error';

  constructor(
    message: string,
    public readonly code: FetchErrorCode,
    public readonly url?: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to fetch URL: ${message}`, options);
    this.name = 'FetchError';
  }
}

export class RateLimitError extends ApiError {
  readonly statusCode = 429;
  readonly detailType = 'rate_limited';

  constructor(
    public readonly host: string,
    public readonly retryAfterSeconds: number
  ) {
    super(`Rate limit exceeded for ${host}. Try again in ${retryAfterSeconds} seconds`);
    this.name = 'RateLimitError';
  }
}

export class CacheReadError extends Error {
  constructor(
    message: string,
    public readonly key: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CacheReadError';
  }
}

export class CacheWriteError extends Error {
  constructor(
    message: string,
    public readonly key: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CacheWriteError';
  }
}
