import { pgTable, bigint, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import type { Payload } from '../../lib/payload.js';

// ─── Staging Tables ──────────────────────────────────────────────────────────
// One table per entity kind, all with the same shape. The payload is the
// source record verbatim; natural_id and owner_id are lifted out of it for
// lookups. owner_id is deliberately not a foreign key: orders can be staged
// before their customer.

function stagingTable(name: string) {
  return pgTable(
    name,
    {
      naturalId: bigint('natural_id', { mode: 'number' }).primaryKey(),
      ownerId: bigint('owner_id', { mode: 'number' }),
      payload: jsonb('payload').$type<Payload>().notNull(),
      fetchedAt: timestamp('fetched_at', { withTimezone: true }).notNull(),
    },
    (table) => [index(`idx_${name}_owner`).on(table.ownerId)],
  );
}

export const stagingCustomers = stagingTable('staging_customers');
export const stagingOrders = stagingTable('staging_orders');
export const stagingSubscriptions = stagingTable('staging_subscriptions');

export type StagingTable = typeof stagingCustomers;
export type StagingRow = typeof stagingCustomers.$inferSelect;
export type NewStagingRow = typeof stagingCustomers.$inferInsert;
