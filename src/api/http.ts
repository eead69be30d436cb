import { getLogger } from '../lib/logger.js';
import type { JsonValue } from '../lib/payload.js';
import { AdaptiveRateLimiter, type RateLimiter } from '../lib/rate-limiter.js';

// ─── Error Classes ───────────────────────────────────────────────────────────

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfterSeconds: number | null,
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

// ─── Client ──────────────────────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RequestOptions {
  query?: Record<string, string | number>;
  body?: JsonValue;
}

export interface JsonHttpClientOptions {
  name: string;
  baseUrl: string;
  headers: Record<string, string>;
  limiter: RateLimiter;
  timeoutMs: number;
  /** Cooldown used when a 429 carries no usable Retry-After header. */
  defaultRetryAfterSeconds: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const MAX_BODY_IN_ERROR = 500;

/**
 * JSON-over-HTTP client shared by the source and target APIs.
 *
 * Every attempt waits for a rate limiter permit. A 429 is retried exactly
 * once after the server's Retry-After (or the configured default); a second
 * 429 surfaces as RateLimitError. Adaptive limiters get success, rate-limit
 * and error feedback from every response.
 */
export class JsonHttpClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: JsonHttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  get limiter(): RateLimiter {
    return this.options.limiter;
  }

  buildUrl(path: string, query?: Record<string, string | number>): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const logger = getLogger();
    const url = this.buildUrl(path, options.query);
    const adaptive = this.options.limiter instanceof AdaptiveRateLimiter ? this.options.limiter : null;

    for (let attempt = 0; attempt < 2; attempt++) {
      await this.options.limiter.acquire();

      const startTime = Date.now();
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: {
            Accept: 'application/json',
            ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
            ...this.options.headers,
          },
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: AbortSignal.timeout(this.options.timeoutMs),
        });
      } catch (err) {
        adaptive?.onError();
        logger.warn(
          { api: this.options.name, method, url: url.substring(0, 160), err: errorMessage(err) },
          'HTTP request failed',
        );
        throw err;
      }

      if (response.status === 429) {
        const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
        adaptive?.onRateLimited(retryAfter ?? undefined);

        if (attempt === 0) {
          const waitSeconds = retryAfter ?? this.options.defaultRetryAfterSeconds;
          logger.warn(
            { api: this.options.name, url: url.substring(0, 160), waitSeconds },
            `${this.options.name} 429: waiting before single retry`,
          );
          await response.body?.cancel();
          await this.sleep(waitSeconds * 1000);
          continue;
        }

        throw new RateLimitError(
          `${this.options.name} returned 429 after retry`,
          retryAfter,
        );
      }

      const text = await response.text();

      if (!response.ok) {
        adaptive?.onError();
        throw new ApiError(
          `${this.options.name} API error: ${response.status} ${response.statusText}`,
          response.status,
          text.substring(0, MAX_BODY_IN_ERROR),
        );
      }

      adaptive?.onSuccess();

      logger.debug(
        {
          api: this.options.name,
          method,
          url: url.substring(0, 160),
          status: response.status,
          bytes: text.length,
          timeMs: Date.now() - startTime,
        },
        'HTTP request completed',
      );

      if (text.trim() === '') return null;
      try {
        const data: unknown = JSON.parse(text);
        return data;
      } catch {
        throw new ApiError(
          `${this.options.name} returned a non-JSON body`,
          response.status,
          text.substring(0, MAX_BODY_IN_ERROR),
        );
      }
    }

    // Loop always returns or throws within two attempts
    throw new RateLimitError(`${this.options.name} returned 429 after retry`, null);
  }
}

/**
 * Retry-After as seconds: either delta-seconds or an HTTP date.
 * Returns null when absent or unparsable.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (header === null) return null;
  const trimmed = header.trim();
  if (trimmed === '') return null;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    const seconds = Number(trimmed);
    return seconds > 0 ? seconds : null;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  const seconds = (date - now) / 1000;
  return seconds > 0 ? seconds : null;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
