/**
 * Shared HTTP layer for the API clients
 *
 * Rate limit handling:
 * - 429: Wait for Retry-After (or X-RateLimit-Reset) then retry
 * - 5xx: Retry once
 * - Default: 1 second wait
 */

import type { z } from "zod";
import { ApiError, RateLimitError } from "./errors.js";
import { setupLogger, type Logger } from "./logger.js";

const DEFAULT_RETRY_DELAY_SEC = 1;
const DEFAULT_MAX_RATE_LIMIT_RETRIES = 5;

export type QueryValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly (string | number)[];

export type Query = Record<string, QueryValue>;

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  /** Name used in ApiError messages and log lines */
  service?: string;
  maxRateLimitRetries?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export interface RequestOptions {
  query?: Query;
  /** Serialized as application/json */
  json?: unknown;
  /** Sent as-is (form bodies, multipart) */
  body?: string | FormData | URLSearchParams | Blob;
  headers?: Record<string, string>;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const defaultLogger = setupLogger("http");

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

export function bearer(token: string): string {
  return `Bearer ${token}`;
}

/**
 * Build a query string. Array values repeat the key, null/undefined are skipped.
 */
export function buildQuery(query: Query = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) {
        params.append(key, String(item));
      }
    } else {
      params.append(key, String(value));
    }
  }
  const text = params.toString();
  return text ? `?${text}` : "";
}

/**
 * Read a JSON body. An empty body yields undefined.
 */
export async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.trim() === "") {
    return undefined;
  }
  return JSON.parse(text);
}

/**
 * Seconds to wait before retrying a 429 response
 */
export function rateLimitDelay(response: Response, now: number = Date.now()): number {
  const retryAfter = response.headers.get("Retry-After");
  if (retryAfter) {
    const seconds = parseInt(retryAfter, 10);
    if (!isNaN(seconds)) {
      return seconds;
    }
  }

  const resetTime = response.headers.get("X-RateLimit-Reset");
  if (resetTime) {
    const resetTs = parseInt(resetTime, 10);
    if (!isNaN(resetTs)) {
      const waitSeconds = resetTs - Math.floor(now / 1000);
      if (waitSeconds > 0) {
        return waitSeconds;
      }
    }
  }

  return DEFAULT_RETRY_DELAY_SEC;
}

/**
 * HTTP request with retry for rate limits and a single retry for server errors
 */
export async function requestWithRetry(
  method: string,
  url: string,
  init: RequestInit = {},
  options: RetryOptions = {}
): Promise<Response> {
  const service = options.service ?? "http";
  const maxRetries = options.maxRateLimitRetries ?? DEFAULT_MAX_RATE_LIMIT_RETRIES;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? defaultLogger;

  let rateLimitRetries = 0;
  let serverErrorRetried = false;

  while (true) {
    const response = await fetch(url, { ...init, method });

    // Success
    if (response.status < 400) {
      return response;
    }

    // Rate limit (429)
    if (response.status === 429) {
      const waitSeconds = rateLimitDelay(response);
      if (rateLimitRetries >= maxRetries) {
        throw new RateLimitError(
          waitSeconds,
          `${service} rate limit still in effect after ${maxRetries} retries`
        );
      }
      rateLimitRetries++;
      logger.warn(`Rate limited (429). Waiting ${waitSeconds}s...`, { attempt: rateLimitRetries });
      await sleep(waitSeconds * 1000);
      continue;
    }

    // Server error (5xx) - retry once
    if (response.status >= 500 && response.status < 600) {
      if (!serverErrorRetried) {
        serverErrorRetried = true;
        logger.warn(`Server error (${response.status}). Retrying once...`);
        await sleep(DEFAULT_RETRY_DELAY_SEC * 1000);
        continue;
      }
      logger.error(`Server error (${response.status}) after retry.`);
    }

    // Other errors
    const text = await response.text();
    throw new ApiError(service, response.status, text, url);
  }
}

/**
 * Base class for the service clients.
 *
 * Subclasses supply auth headers; paths are resolved against baseUrl unless
 * they are absolute URLs (pagination links are often absolute).
 */
export abstract class ApiClient {
  readonly service: string;
  protected readonly baseUrl: string;
  protected readonly logger: Logger;
  protected readonly retry: RetryOptions;

  constructor(service: string, baseUrl: string, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    this.service = service;
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    this.logger = setupLogger(`${service}-api`);
    this.retry = { ...retry, service, logger: this.logger };
  }

  protected abstract getAuthHeaders(): Promise<Record<string, string>>;

  url(path: string, query?: Query): string {
    const base = /^https?:\/\//.test(path) ? path : `${this.baseUrl}${path.replace(/^\//, "")}`;
    return `${base}${buildQuery(query)}`;
  }

  protected async request(method: string, path: string, options: RequestOptions = {}): Promise<Response> {
    const url = this.url(path, options.query);
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...(await this.getAuthHeaders()),
      ...options.headers,
    };

    let body: RequestInit["body"];
    if (options.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.json);
    } else if (options.body !== undefined) {
      body = options.body;
    }

    this.logger.debug(`${method} ${path}`);
    return requestWithRetry(method, url, { headers, body }, this.retry);
  }

  /**
   * Send a request and validate the JSON response.
   */
  protected async requestJson<S extends z.ZodTypeAny>(
    schema: S,
    method: string,
    path: string,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const response = await this.request(method, path, options);
    const data = await readJson(response);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new Error(
        `${this.service} returned an unexpected response for ${method} ${path}: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }

  protected async getJson<S extends z.ZodTypeAny>(
    schema: S,
    path: string,
    query?: Query
  ): Promise<z.output<S>> {
    return this.requestJson(schema, "GET", path, { query });
  }

  /**
   * Send a request whose response body is ignored.
   */
  protected async send(method: string, path: string, options: RequestOptions = {}): Promise<void> {
    const response = await this.request(method, path, options);
    await response.text();
  }
}
