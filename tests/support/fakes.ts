import type { PageRequest, SourceClient, SourcePage } from '../../src/api/source-client.js';
import type { CreatedResource, MetafieldInput, TargetClient, TargetProduct } from '../../src/api/target-client.js';
import type { IdRange, StagingStore } from '../../src/db/staging-store.js';
import { dedupeByNaturalId } from '../../src/db/staging-store.js';
import type { MigrationOutcome, OutcomeCounts, OutcomeKind, OutcomeRecorder } from '../../src/db/migration-outcomes.js';
import { lookupInChunks } from '../../src/lib/chunked-lookup.js';
import { RateLimiter } from '../../src/lib/rate-limiter.js';
import type { Payload } from '../../src/lib/payload.js';
import { isMigrationEligible } from '../../src/migration/eligibility.js';
import type { EntityKind, StagingRecord } from '../../src/transform/staging-record.js';

export const record = (naturalId: number, payload: Payload = {}, ownerId: number | null = null): StagingRecord => ({
  naturalId,
  ownerId,
  payload: { id: naturalId, ...payload },
  fetchedAt: new Date('2024-01-01T00:00:00Z')
});

/** Staging store backed by maps; lookups go through small chunks like the real one. */
export class MemoryStagingStore implements StagingStore {
  readonly tables: Record<EntityKind, Map<number, StagingRecord>> = {
    customer: new Map(),
    order: new Map(),
    subscription: new Map()
  };
  readonly upsertCalls: Array<{ kind: EntityKind; count: number }> = [];
  failUpsert: Error | null = null;

  constructor(private readonly lookupChunkSize = 7) {}

  seed(kind: EntityKind, records: StagingRecord[]): this {
    for (const staged of records) {
      this.tables[kind].set(staged.naturalId, staged);
    }
    return this;
  }

  async upsertBatch(kind: EntityKind, records: StagingRecord[]): Promise<number> {
    if (this.failUpsert) throw this.failUpsert;
    const unique = dedupeByNaturalId(records);
    this.upsertCalls.push({ kind, count: unique.length });
    this.seed(kind, unique);
    return unique.length;
  }

  async getByNaturalId(kind: EntityKind, naturalId: number): Promise<StagingRecord | null> {
    return this.tables[kind].get(naturalId) ?? null;
  }

  async getMany(kind: EntityKind, naturalIds: number[]): Promise<StagingRecord[]> {
    const present = await this.containsAny(kind, naturalIds);
    return present.flatMap((id) => {
      const staged = this.tables[kind].get(id);
      return staged ? [staged] : [];
    });
  }

  async getByOwner(kind: EntityKind, ownerId: number): Promise<StagingRecord[]> {
    return [...this.tables[kind].values()]
      .filter((staged) => staged.ownerId === ownerId)
      .sort((a, b) => a.naturalId - b.naturalId);
  }

  async containsAny(kind: EntityKind, naturalIds: Iterable<number>): Promise<number[]> {
    const table = this.tables[kind];
    return lookupInChunks(naturalIds, this.lookupChunkSize, async (chunk) => chunk.filter((id) => table.has(id)));
  }

  async count(kind: EntityKind): Promise<number> {
    return this.tables[kind].size;
  }

  async countDistinctOwners(kind: EntityKind): Promise<number> {
    const owners = new Set<number>();
    for (const staged of this.tables[kind].values()) {
      if (staged.ownerId !== null) owners.add(staged.ownerId);
    }
    return owners.size;
  }

  async listNaturalIds(kind: EntityKind, range: IdRange = {}): Promise<number[]> {
    return [...this.tables[kind].keys()]
      .filter((id) => (range.from === undefined || id >= range.from) && (range.to === undefined || id <= range.to))
      .sort((a, b) => a - b);
  }

  async listEligibleCustomerIds(limit?: number): Promise<number[]> {
    const ids: number[] = [];
    for (const id of await this.listNaturalIds('customer')) {
      const customer = this.tables.customer.get(id);
      if (!customer) continue;
      const orders = await this.getByOwner('order', id);
      if (isMigrationEligible(customer.payload, orders.length)) ids.push(id);
    }
    return limit === undefined ? ids : ids.slice(0, limit);
  }

  async wipe(kind: EntityKind): Promise<number> {
    const deleted = this.tables[kind].size;
    this.tables[kind].clear();
    return deleted;
  }
}

/** Source API stub serving pages from a function of the request. */
export class StubSourceClient implements SourceClient {
  readonly requests: Array<{ kind: EntityKind } & PageRequest> = [];

  constructor(private readonly serve: (kind: EntityKind, request: PageRequest) => SourcePage | Error) {}

  async fetchPage(kind: EntityKind, request: PageRequest): Promise<SourcePage> {
    this.requests.push({ kind, ...request });
    const response = this.serve(kind, request);
    if (response instanceof Error) throw response;
    return response;
  }
}

/** A source whose ids run contiguously from 1 to `total`, `limit` per page, pages numbered from 0. */
export const contiguousSource = (total: number, fields: (id: number) => Payload = () => ({})) =>
  new StubSourceClient((_kind, { page, limit }) => {
    const first = page * limit + 1;
    const last = Math.min(total, first + limit - 1);
    const results: Payload[] = [];
    for (let id = first; id <= last; id++) {
      results.push({ id, ...fields(id) });
    }
    const next = last < total ? `https://source.test/v1/customers/?page=${page + 1}&limit=${limit}` : null;
    return { results, next, count: total };
  });

export interface TargetCall {
  operation: 'createCustomer' | 'createOrder' | 'addCustomerTags' | 'createCustomerMetafield';
  body: unknown;
}

/** Target API stub that assigns ids from a counter and can fail chosen calls. */
export class StubTargetClient implements TargetClient {
  readonly calls: TargetCall[] = [];
  products: TargetProduct[] = [];
  failWhen: (call: TargetCall) => Error | null = () => null;
  private nextId = 9001;

  private respond(call: TargetCall): CreatedResource {
    this.calls.push(call);
    const failure = this.failWhen(call);
    if (failure) throw failure;
    return { id: this.nextId++ };
  }

  async createCustomer(customer: Payload): Promise<CreatedResource> {
    return this.respond({ operation: 'createCustomer', body: customer });
  }

  async createOrder(order: Payload): Promise<CreatedResource> {
    return this.respond({ operation: 'createOrder', body: order });
  }

  async addCustomerTags(customerId: number, tags: string[]): Promise<string[]> {
    this.respond({ operation: 'addCustomerTags', body: { customerId, tags } });
    return tags;
  }

  async createCustomerMetafield(customerId: number, metafield: MetafieldInput): Promise<CreatedResource> {
    return this.respond({ operation: 'createCustomerMetafield', body: { customerId, metafield } });
  }

  async listAllProducts(): Promise<TargetProduct[]> {
    return this.products;
  }

  count(operation: TargetCall['operation']): number {
    return this.calls.filter((call) => call.operation === operation).length;
  }
}

export class MemoryOutcomeRecorder implements OutcomeRecorder {
  readonly outcomes = new Map<string, MigrationOutcome>();

  async record(outcome: MigrationOutcome): Promise<void> {
    this.outcomes.set(`${outcome.entityKind}:${outcome.naturalId}`, outcome);
  }

  async successfulIds(kind: OutcomeKind, naturalIds: number[]): Promise<number[]> {
    return naturalIds.filter((id) => this.outcomes.get(`${kind}:${id}`)?.status === 'success');
  }

  async countsByStatus(kind: OutcomeKind): Promise<OutcomeCounts> {
    const counts: OutcomeCounts = { pending: 0, success: 0, failed: 0 };
    for (const outcome of this.outcomes.values()) {
      if (outcome.entityKind === kind) counts[outcome.status]++;
    }
    return counts;
  }

  async reset(): Promise<number> {
    const deleted = this.outcomes.size;
    this.outcomes.clear();
    return deleted;
  }
}

/** Limiter whose waits resolve immediately. */
export const instantLimiter = (name = 'test'): RateLimiter =>
  new RateLimiter(name, 1000, { now: () => 0, sleep: async () => undefined });

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

/** fetch replacement that replays scripted responses in order and records each request. */
export const scriptedFetch = (script: Array<() => Response | Error>) => {
  const requests: RecordedRequest[] = [];
  const pending = [...script];

  const fetchImpl: typeof fetch = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({
      url: String(input),
      method: init?.method ?? 'GET',
      headers,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
    });

    const next = pending.shift();
    if (!next) throw new Error(`Unexpected request to ${String(input)}`);
    const response = next();
    if (response instanceof Error) throw response;
    return response;
  };

  return { fetchImpl, requests };
};

export const jsonResponse = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json', ...headers } });
