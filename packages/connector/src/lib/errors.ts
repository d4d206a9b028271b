/**
 * Shared error classes
 *
 * Clients throw ApiError for any non-retryable HTTP failure.
 */

export class ApiError extends Error {
  readonly service: string;
  readonly status: number;
  readonly body: string;
  readonly url: string;

  constructor(service: string, status: number, body: string, url: string) {
    super(`${service} APIError: status code -> ${status}, body -> ${body}`);
    this.name = "ApiError";
    this.service = service;
    this.status = status;
    this.body = body;
    this.url = url;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }

  get isUnauthorized(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/**
 * Rate limit still in effect after the retry budget was spent.
 */
export class RateLimitError extends Error {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message?: string) {
    super(message ?? `Rate limit exceeded. Retry after ${retryAfterSeconds} seconds.`);
    this.name = "RateLimitError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message?: string) {
    super(message ?? `${key} environment variable is required`);
    this.name = "ConfigError";
    this.key = key;
  }
}

export class NotFoundError extends Error {
  readonly entity: string;
  readonly lookup: string;

  constructor(entity: string, lookup: string) {
    super(`${entity} not found: ${lookup}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.lookup = lookup;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFound(error: unknown): boolean {
  return (
    (error instanceof ApiError && error.isNotFound) || error instanceof NotFoundError
  );
}
