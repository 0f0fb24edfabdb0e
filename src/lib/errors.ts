/**
 * Pricewise — Errors
 *
 * Only two failures reject a whole request: no source can handle the input,
 * and the client is over its rate limit. Everything else degrades in place.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class UnsupportedSourceError extends AppError {
  readonly url: string;

  constructor(url: string) {
    super(`URL not supported: ${url}`, 400, 'unsupported_source');
    this.url = url;
  }
}

export class ScrapeFailedError extends AppError {
  constructor(url: string, reason?: string) {
    super(`Failed to scrape URL: ${url}${reason ? ` - ${reason}` : ''}`, 502, 'scrape_failed');
  }
}

export class SearchFailedError extends AppError {
  constructor(query: string, reason?: string) {
    super(`Search failed for "${query}"${reason ? ` - ${reason}` : ''}`, 502, 'search_failed');
  }
}

export class RateLimitExceededError extends AppError {
  /** Seconds until the client's oldest request leaves the window. */
  readonly retryAfter: number;

  constructor(retryAfter: number) {
    super('Too many requests. Please try again later.', 429, 'rate_limited');
    this.retryAfter = retryAfter;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'not_found');
  }
}

export class ValidationError extends AppError {
  readonly details: Array<{ path: string; message: string }>;

  constructor(message: string, details: Array<{ path: string; message: string }> = []) {
    super(message, 400, 'validation_error');
    this.details = details;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, 'config_error');
  }
}

export class StoreError extends AppError {
  constructor(message: string) {
    super(message, 500, 'store_error');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
