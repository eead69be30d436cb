import {
  pgTable,
  varchar,
  integer,
  bigint,
  bigserial,
  text,
  timestamp,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

// ─── Collection Runs ─────────────────────────────────────────────────────────

export const collectionRuns = pgTable(
  'collection_runs',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    entityKind: varchar('entity_kind').notNull(), // 'customer', 'order', 'subscription'
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    status: varchar('status').notNull(), // 'running', 'completed', 'stopped', 'failed'

    startPage: integer('start_page').notNull(),
    pageSize: integer('page_size').notNull(),
    finalPage: integer('final_page'),
    pagesFetched: integer('pages_fetched').default(0),

    collectedCount: integer('collected_count').default(0),
    failedCount: integer('failed_count').default(0),

    errorMessage: text('error_message'),
  },
  (table) => [
    index('idx_collection_runs_kind').on(table.entityKind, table.startedAt),
  ],
);

export type CollectionRun = typeof collectionRuns.$inferSelect;
export type NewCollectionRun = typeof collectionRuns.$inferInsert;

// ─── Migration Outcomes ──────────────────────────────────────────────────────

export const migrationOutcomes = pgTable(
  'migration_outcomes',
  {
    entityKind: varchar('entity_kind').notNull(), // 'customer', 'order'
    naturalId: bigint('natural_id', { mode: 'number' }).notNull(),
    ownerId: bigint('owner_id', { mode: 'number' }),
    targetId: bigint('target_id', { mode: 'number' }),
    status: varchar('status').notNull(), // 'pending', 'success', 'failed'
    errorDetail: text('error_detail'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.entityKind, table.naturalId] }),
    index('idx_migration_outcomes_status').on(table.entityKind, table.status),
  ],
);

export type MigrationOutcomeRow = typeof migrationOutcomes.$inferSelect;
export type NewMigrationOutcomeRow = typeof migrationOutcomes.$inferInsert;
