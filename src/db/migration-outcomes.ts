import { and, count, eq, inArray, sql } from 'drizzle-orm';
import { lookupInChunks } from '../lib/chunked-lookup.js';
import type { Database } from './connection.js';
import { migrationOutcomes } from './schema/monitoring.js';

export type OutcomeKind = 'customer' | 'order';
export type OutcomeStatus = 'pending' | 'success' | 'failed';

export interface MigrationOutcome {
  entityKind: OutcomeKind;
  naturalId: number;
  ownerId: number | null;
  targetId: number | null;
  status: OutcomeStatus;
  errorDetail: string | null;
}

export type OutcomeCounts = Record<OutcomeStatus, number>;

/** Per-unit migration status, written only when the table is present. */
export interface OutcomeRecorder {
  record(outcome: MigrationOutcome): Promise<void>;
  /** Which of the given ids already migrated successfully. */
  successfulIds(kind: OutcomeKind, naturalIds: number[]): Promise<number[]>;
  countsByStatus(kind: OutcomeKind): Promise<OutcomeCounts>;
  /** Forget every recorded outcome so customers can be migrated again. */
  reset(): Promise<number>;
}

export class PgOutcomeRecorder implements OutcomeRecorder {
  constructor(
    private readonly db: Database,
    private readonly lookupChunkSize: number,
  ) {}

  async record(outcome: MigrationOutcome): Promise<void> {
    const updatedAt = new Date();
    await this.db
      .insert(migrationOutcomes)
      .values({ ...outcome, updatedAt })
      .onConflictDoUpdate({
        target: [migrationOutcomes.entityKind, migrationOutcomes.naturalId],
        set: {
          ownerId: outcome.ownerId,
          targetId: outcome.targetId,
          status: outcome.status,
          errorDetail: outcome.errorDetail,
          updatedAt,
        },
      });
  }

  async successfulIds(kind: OutcomeKind, naturalIds: number[]): Promise<number[]> {
    return lookupInChunks(naturalIds, this.lookupChunkSize, async (chunk) => {
      const rows = await this.db
        .select({ naturalId: migrationOutcomes.naturalId })
        .from(migrationOutcomes)
        .where(
          and(
            eq(migrationOutcomes.entityKind, kind),
            eq(migrationOutcomes.status, 'success'),
            inArray(migrationOutcomes.naturalId, chunk),
          ),
        );
      return rows.map((row) => row.naturalId);
    });
  }

  async countsByStatus(kind: OutcomeKind): Promise<OutcomeCounts> {
    const rows = await this.db
      .select({ status: migrationOutcomes.status, value: count() })
      .from(migrationOutcomes)
      .where(eq(migrationOutcomes.entityKind, kind))
      .groupBy(migrationOutcomes.status);

    const counts: OutcomeCounts = { pending: 0, success: 0, failed: 0 };
    for (const row of rows) {
      if (row.status === 'pending' || row.status === 'success' || row.status === 'failed') {
        counts[row.status] = row.value;
      }
    }
    return counts;
  }

  async reset(): Promise<number> {
    const result = await this.db.delete(migrationOutcomes);
    return result.rowCount ?? 0;
  }
}

/**
 * Whether outcome tracking is available, i.e. the migration_outcomes table
 * exists. Resolved once at startup.
 */
export async function detectOutcomeTracking(db: Database): Promise<boolean> {
  const result = await db.execute<{ present: boolean }>(
    sql`select to_regclass('public.migration_outcomes') is not null as present`,
  );
  return result.rows[0]?.present === true;
}
