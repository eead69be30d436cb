import { and, asc, count, countDistinct, eq, exists, gte, inArray, isNotNull, lte, ne, or, sql } from 'drizzle-orm';
import { lookupInChunks } from '../lib/chunked-lookup.js';
import { getLogger } from '../lib/logger.js';
import { isPayload } from '../lib/payload.js';
import type { EntityKind, StagingRecord } from '../transform/staging-record.js';
import type { Database } from './connection.js';
import {
  stagingCustomers,
  stagingOrders,
  stagingSubscriptions,
  type StagingRow,
  type StagingTable,
} from './schema/staging.js';

export interface IdRange {
  from?: number;
  to?: number;
}

/**
 * Durable, idempotent storage for collected source records, keyed by natural
 * id per entity kind. Writes are last-write-wins.
 */
export interface StagingStore {
  /** Insert-or-replace all records in one transaction. Returns rows written. */
  upsertBatch(kind: EntityKind, records: StagingRecord[]): Promise<number>;
  getByNaturalId(kind: EntityKind, naturalId: number): Promise<StagingRecord | null>;
  getMany(kind: EntityKind, naturalIds: number[]): Promise<StagingRecord[]>;
  getByOwner(kind: EntityKind, ownerId: number): Promise<StagingRecord[]>;
  /** The subset of `naturalIds` that is staged, ascending. */
  containsAny(kind: EntityKind, naturalIds: Iterable<number>): Promise<number[]>;
  count(kind: EntityKind): Promise<number>;
  countDistinctOwners(kind: EntityKind): Promise<number>;
  listNaturalIds(kind: EntityKind, range?: IdRange): Promise<number[]>;
  listEligibleCustomerIds(limit?: number): Promise<number[]>;
  /** Irreversibly deletes every staged record of a kind. Returns rows deleted. */
  wipe(kind: EntityKind): Promise<number>;
}

export const STAGING_TABLES: Record<EntityKind, StagingTable> = {
  customer: stagingCustomers,
  order: stagingOrders,
  subscription: stagingSubscriptions,
};

const ROWS_PER_STATEMENT = 500;
export const DEFAULT_LOOKUP_CHUNK = 999;

/** Last occurrence wins when the same natural id appears twice in a batch. */
export function dedupeByNaturalId(records: StagingRecord[]): StagingRecord[] {
  const byId = new Map<number, StagingRecord>();
  for (const record of records) {
    byId.delete(record.naturalId);
    byId.set(record.naturalId, record);
  }
  return [...byId.values()];
}

export function buildUpsertStatement(
  executor: Pick<Database, 'insert'>,
  kind: EntityKind,
  records: StagingRecord[],
) {
  const table = STAGING_TABLES[kind];
  return executor
    .insert(table)
    .values(
      records.map((record) => ({
        naturalId: record.naturalId,
        ownerId: record.ownerId,
        payload: record.payload,
        fetchedAt: record.fetchedAt,
      })),
    )
    .onConflictDoUpdate({
      target: table.naturalId,
      set: {
        ownerId: sql`excluded.owner_id`,
        payload: sql`excluded.payload`,
        fetchedAt: sql`excluded.fetched_at`,
      },
    });
}

export class PgStagingStore implements StagingStore {
  constructor(
    private readonly db: Database,
    private readonly lookupChunkSize: number = DEFAULT_LOOKUP_CHUNK,
  ) {}

  async upsertBatch(kind: EntityKind, records: StagingRecord[]): Promise<number> {
    const unique = dedupeByNaturalId(records);
    if (unique.length === 0) return 0;

    await this.db.transaction(async (tx) => {
      for (let offset = 0; offset < unique.length; offset += ROWS_PER_STATEMENT) {
        await buildUpsertStatement(tx, kind, unique.slice(offset, offset + ROWS_PER_STATEMENT));
      }
    });

    return unique.length;
  }

  async getByNaturalId(kind: EntityKind, naturalId: number): Promise<StagingRecord | null> {
    const table = STAGING_TABLES[kind];
    const rows = await this.db.select().from(table).where(eq(table.naturalId, naturalId)).limit(1);
    return rows.length > 0 ? rowToRecord(kind, rows[0]) : null;
  }

  async getMany(kind: EntityKind, naturalIds: number[]): Promise<StagingRecord[]> {
    const table = STAGING_TABLES[kind];
    const unique = [...new Set(naturalIds)];
    const records: StagingRecord[] = [];

    for (let offset = 0; offset < unique.length; offset += this.lookupChunkSize) {
      const chunk = unique.slice(offset, offset + this.lookupChunkSize);
      const rows = await this.db.select().from(table).where(inArray(table.naturalId, chunk));
      for (const row of rows) {
        const record = rowToRecord(kind, row);
        if (record) records.push(record);
      }
    }

    return records.sort((a, b) => a.naturalId - b.naturalId);
  }

  async getByOwner(kind: EntityKind, ownerId: number): Promise<StagingRecord[]> {
    const table = STAGING_TABLES[kind];
    const rows = await this.db
      .select()
      .from(table)
      .where(eq(table.ownerId, ownerId))
      .orderBy(asc(table.naturalId));

    const records: StagingRecord[] = [];
    for (const row of rows) {
      const record = rowToRecord(kind, row);
      if (record) records.push(record);
    }
    return records;
  }

  async containsAny(kind: EntityKind, naturalIds: Iterable<number>): Promise<number[]> {
    const table = STAGING_TABLES[kind];
    return lookupInChunks(naturalIds, this.lookupChunkSize, async (chunk) => {
      const rows = await this.db
        .select({ naturalId: table.naturalId })
        .from(table)
        .where(inArray(table.naturalId, chunk));
      return rows.map((row) => row.naturalId);
    });
  }

  async count(kind: EntityKind): Promise<number> {
    const table = STAGING_TABLES[kind];
    const [row] = await this.db.select({ value: count() }).from(table);
    return row?.value ?? 0;
  }

  async countDistinctOwners(kind: EntityKind): Promise<number> {
    const table = STAGING_TABLES[kind];
    const [row] = await this.db.select({ value: countDistinct(table.ownerId) }).from(table);
    return row?.value ?? 0;
  }

  async listNaturalIds(kind: EntityKind, range: IdRange = {}): Promise<number[]> {
    const table = STAGING_TABLES[kind];
    const rows = await this.db
      .select({ naturalId: table.naturalId })
      .from(table)
      .where(
        and(
          range.from !== undefined ? gte(table.naturalId, range.from) : undefined,
          range.to !== undefined ? lte(table.naturalId, range.to) : undefined,
        ),
      )
      .orderBy(asc(table.naturalId));
    return rows.map((row) => row.naturalId);
  }

  /**
   * Customers with at least one staged order, a subscription status other
   * than 'none', or positive lifetime revenue.
   */
  async listEligibleCustomerIds(limit?: number): Promise<number[]> {
    const subscriptionStatus = sql<string | null>`${stagingCustomers.payload}->>'subscription_status'`;
    const revenue = sql`${stagingCustomers.payload}->>'total_revenue'`;

    const query = this.db
      .select({ naturalId: stagingCustomers.naturalId })
      .from(stagingCustomers)
      .where(
        or(
          exists(
            this.db
              .select({ one: sql`1` })
              .from(stagingOrders)
              .where(eq(stagingOrders.ownerId, stagingCustomers.naturalId)),
          ),
          and(isNotNull(subscriptionStatus), ne(subscriptionStatus, 'none'), ne(subscriptionStatus, '')),
          sql`case when ${revenue} ~ '^[0-9]+(\\.[0-9]+)?$' then (${revenue})::numeric > 0 else false end`,
        ),
      )
      .orderBy(asc(stagingCustomers.naturalId));

    const rows = limit !== undefined ? await query.limit(limit) : await query;
    return rows.map((row) => row.naturalId);
  }

  async wipe(kind: EntityKind): Promise<number> {
    const result = await this.db.delete(STAGING_TABLES[kind]);
    const deleted = result.rowCount ?? 0;
    getLogger().warn({ kind, deleted }, 'Staging table wiped');
    return deleted;
  }
}

function rowToRecord(kind: EntityKind, row: StagingRow): StagingRecord | null {
  if (!isPayload(row.payload)) {
    getLogger().warn({ kind, naturalId: row.naturalId }, 'Skipping staged row with undecodable payload');
    return null;
  }
  return {
    naturalId: row.naturalId,
    ownerId: row.ownerId,
    payload: row.payload,
    fetchedAt: row.fetchedAt,
  };
}
