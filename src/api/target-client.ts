import { z } from 'zod';
import type { Env } from '../config/env.js';
import { getLogger } from '../lib/logger.js';
import type { JsonValue, Payload } from '../lib/payload.js';
import type { RateLimiter } from '../lib/rate-limiter.js';
import { JsonHttpClient } from './http.js';

export interface TargetVariant {
  id: number;
  sku: string | null;
  title: string | null;
  price: string | null;
}

export interface TargetProduct {
  id: number;
  title: string;
  variants: TargetVariant[];
}

export interface MetafieldInput {
  namespace: string;
  key: string;
  value: JsonValue;
  type: 'json' | 'single_line_text_field';
}

export interface CreatedResource {
  id: number;
}

/** Write access to the target commerce API. */
export interface TargetClient {
  createCustomer(customer: Payload): Promise<CreatedResource>;
  createOrder(order: Payload): Promise<CreatedResource>;
  /** Merges with the customer's existing tags; returns the resulting tag list. */
  addCustomerTags(customerId: number, tags: string[]): Promise<string[]>;
  createCustomerMetafield(customerId: number, metafield: MetafieldInput): Promise<CreatedResource>;
  listAllProducts(): Promise<TargetProduct[]>;
}

export class TargetResponseError extends Error {
  constructor(message: string, public readonly operation: string) {
    super(message);
    this.name = 'TargetResponseError';
  }
}

const idSchema = z.number().int().positive();

const customerEnvelope = z.object({
  customer: z.object({ id: idSchema, tags: z.string().nullable().optional() }),
});
const orderEnvelope = z.object({ order: z.object({ id: idSchema }) });
const metafieldEnvelope = z.object({ metafield: z.object({ id: idSchema }) });
const productsEnvelope = z.object({
  products: z.array(
    z.object({
      id: idSchema,
      title: z.string().nullable().optional(),
      variants: z
        .array(
          z.object({
            id: idSchema,
            sku: z.string().nullable().optional(),
            title: z.string().nullable().optional(),
            price: z.union([z.string(), z.number()]).nullable().optional(),
          }),
        )
        .default([]),
    }),
  ),
});

const PRODUCT_PAGE_LIMIT = 250;

export class HttpTargetClient implements TargetClient {
  constructor(private readonly http: JsonHttpClient) {}

  async createCustomer(customer: Payload): Promise<CreatedResource> {
    const body = await this.http.request('POST', '/customers.json', { body: { customer } });
    const { customer: created } = parseEnvelope(customerEnvelope, body, 'createCustomer');
    getLogger().info({ targetCustomerId: created.id }, 'Target customer created');
    return { id: created.id };
  }

  async createOrder(order: Payload): Promise<CreatedResource> {
    const body = await this.http.request('POST', '/orders.json', { body: { order } });
    const { order: created } = parseEnvelope(orderEnvelope, body, 'createOrder');
    return { id: created.id };
  }

  async addCustomerTags(customerId: number, tags: string[]): Promise<string[]> {
    const current = parseEnvelope(
      customerEnvelope,
      await this.http.request('GET', `/customers/${customerId}.json`),
      'getCustomer',
    );

    const merged = mergeTags(current.customer.tags ?? '', tags);
    await this.http.request('PUT', `/customers/${customerId}.json`, {
      body: { customer: { id: customerId, tags: merged.join(', ') } },
    });
    return merged;
  }

  async createCustomerMetafield(customerId: number, metafield: MetafieldInput): Promise<CreatedResource> {
    const value = metafield.type === 'json' ? JSON.stringify(metafield.value) : metafield.value;
    const body = await this.http.request('POST', `/customers/${customerId}/metafields.json`, {
      body: { metafield: { namespace: metafield.namespace, key: metafield.key, type: metafield.type, value } },
    });
    const { metafield: created } = parseEnvelope(metafieldEnvelope, body, 'createCustomerMetafield');
    return { id: created.id };
  }

  async listAllProducts(): Promise<TargetProduct[]> {
    const products: TargetProduct[] = [];
    let sinceId = 0;

    for (;;) {
      const body = await this.http.request('GET', '/products.json', {
        query: { limit: PRODUCT_PAGE_LIMIT, since_id: sinceId },
      });
      const page = parseEnvelope(productsEnvelope, body, 'listProducts').products;
      if (page.length === 0) break;

      for (const product of page) {
        products.push({
          id: product.id,
          title: product.title ?? '',
          variants: product.variants.map((variant) => ({
            id: variant.id,
            sku: variant.sku ?? null,
            title: variant.title ?? null,
            price: variant.price === null || variant.price === undefined ? null : String(variant.price),
          })),
        });
      }

      if (page.length < PRODUCT_PAGE_LIMIT) break;
      sinceId = page[page.length - 1].id;
    }

    getLogger().info({ products: products.length }, 'Fetched target product catalog');
    return products;
  }
}

/** Union of existing comma-separated tags and new ones, trimmed and sorted. */
export function mergeTags(existing: string, added: string[]): string[] {
  const all = new Set<string>();
  for (const tag of [...existing.split(','), ...added]) {
    const trimmed = tag.trim();
    if (trimmed) all.add(trimmed);
  }
  return [...all].sort();
}

function parseEnvelope<S extends z.ZodTypeAny>(schema: S, body: unknown, operation: string): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new TargetResponseError(
      `Unexpected ${operation} response: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
      operation,
    );
  }
  return parsed.data;
}

export function createTargetClient(env: Env, limiter: RateLimiter, fetchImpl?: typeof fetch): HttpTargetClient {
  return new HttpTargetClient(
    new JsonHttpClient({
      name: 'target',
      baseUrl: env.TARGET_API_BASE_URL,
      headers: { 'X-Access-Token': env.TARGET_API_TOKEN },
      limiter,
      timeoutMs: env.HTTP_TIMEOUT_MS,
      defaultRetryAfterSeconds: env.TARGET_RETRY_AFTER_DEFAULT_SECONDS,
      fetchImpl,
    }),
  );
}
