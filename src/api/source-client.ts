import { z } from 'zod';
import type { Env } from '../config/env.js';
import { getLogger } from '../lib/logger.js';
import type { RateLimiter } from '../lib/rate-limiter.js';
import type { EntityKind } from '../transform/staging-record.js';
import { JsonHttpClient } from './http.js';

export interface PageRequest {
  page: number;
  limit: number;
}

export interface SourcePage {
  results: unknown[];
  /** Link to the following page; null once the source reports no more. */
  next: string | null;
  count: number | null;
}

/** Read-only access to the source commerce API, one page at a time. */
export interface SourceClient {
  fetchPage(kind: EntityKind, request: PageRequest): Promise<SourcePage>;
}

export class SourceEnvelopeError extends Error {
  constructor(
    message: string,
    public readonly kind: EntityKind,
    public readonly page: number,
  ) {
    super(message);
    this.name = 'SourceEnvelopeError';
  }
}

const pageEnvelopeSchema = z.object({
  results: z.array(z.unknown()),
  next: z.string().nullable().optional(),
  count: z.number().int().nonnegative().nullable().optional(),
});

const ENDPOINTS: Record<EntityKind, string> = {
  customer: '/customers/',
  order: '/orders/',
  subscription: '/subscriptions/',
};

export class HttpSourceClient implements SourceClient {
  constructor(private readonly http: JsonHttpClient) {}

  async fetchPage(kind: EntityKind, request: PageRequest): Promise<SourcePage> {
    const body = await this.http.request('GET', ENDPOINTS[kind], {
      query: { page: request.page, limit: request.limit },
    });

    const parsed = pageEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceEnvelopeError(
        `Unexpected ${kind} page envelope: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
        kind,
        request.page,
      );
    }

    const next = parsed.data.next ?? null;
    getLogger().debug(
      { kind, page: request.page, records: parsed.data.results.length, hasNext: next !== null },
      'Source page fetched',
    );

    return {
      results: parsed.data.results,
      next: next === '' ? null : next,
      count: parsed.data.count ?? null,
    };
  }
}

export function createSourceClient(env: Env, limiter: RateLimiter, fetchImpl?: typeof fetch): HttpSourceClient {
  const credentials = Buffer.from(`${env.SOURCE_API_KEY}:${env.SOURCE_API_SECRET}`).toString('base64');
  return new HttpSourceClient(
    new JsonHttpClient({
      name: 'source',
      baseUrl: env.SOURCE_API_BASE_URL,
      headers: { Authorization: `Basic ${credentials}` },
      limiter,
      timeoutMs: env.HTTP_TIMEOUT_MS,
      defaultRetryAfterSeconds: env.SOURCE_RETRY_AFTER_DEFAULT_SECONDS,
      fetchImpl,
    }),
  );
}
