import { and, desc, eq, isNotNull } from 'drizzle-orm';
import type { EntityKind } from '../transform/staging-record.js';
import type { Database } from './connection.js';
import { collectionRuns, type CollectionRun } from './schema/monitoring.js';

export type CollectionRunStatus = 'running' | 'completed' | 'stopped' | 'failed';

export interface CollectionRunOutcome {
  status: Exclude<CollectionRunStatus, 'running'>;
  finalPage: number | null;
  pagesFetched: number;
  collectedCount: number;
  failedCount: number;
  errorMessage?: string;
}

/** Bookkeeping of collector runs, used to resume from the last page reached. */
export interface CollectionRunLog {
  start(kind: EntityKind, startPage: number, pageSize: number): Promise<number>;
  finish(runId: number, outcome: CollectionRunOutcome): Promise<void>;
  /** Final page of the most recent finished run of this kind, if any. */
  resumePage(kind: EntityKind): Promise<number | null>;
  recent(limit: number): Promise<CollectionRun[]>;
}

export class PgCollectionRunLog implements CollectionRunLog {
  constructor(private readonly db: Database) {}

  async start(kind: EntityKind, startPage: number, pageSize: number): Promise<number> {
    const [run] = await this.db
      .insert(collectionRuns)
      .values({
        entityKind: kind,
        startedAt: new Date(),
        status: 'running',
        startPage,
        pageSize,
      })
      .returning({ id: collectionRuns.id });
    return run.id;
  }

  async finish(runId: number, outcome: CollectionRunOutcome): Promise<void> {
    await this.db
      .update(collectionRuns)
      .set({
        completedAt: new Date(),
        status: outcome.status,
        finalPage: outcome.finalPage,
        pagesFetched: outcome.pagesFetched,
        collectedCount: outcome.collectedCount,
        failedCount: outcome.failedCount,
        errorMessage: outcome.errorMessage ?? null,
      })
      .where(eq(collectionRuns.id, runId));
  }

  async resumePage(kind: EntityKind): Promise<number | null> {
    const rows = await this.db
      .select({ finalPage: collectionRuns.finalPage })
      .from(collectionRuns)
      .where(and(eq(collectionRuns.entityKind, kind), isNotNull(collectionRuns.finalPage)))
      .orderBy(desc(collectionRuns.startedAt))
      .limit(1);
    return rows[0]?.finalPage ?? null;
  }

  async recent(limit: number): Promise<CollectionRun[]> {
    return this.db.select().from(collectionRuns).orderBy(desc(collectionRuns.startedAt)).limit(limit);
  }
}
