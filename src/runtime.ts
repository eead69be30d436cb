import { createSourceClient, type SourceClient } from './api/source-client.js';
import { createTargetClient, type TargetClient } from './api/target-client.js';
import type { Env } from './config/env.js';
import { PgCollectionRunLog, type CollectionRunLog } from './db/collection-runs.js';
import type { Database } from './db/connection.js';
import { detectOutcomeTracking, PgOutcomeRecorder, type OutcomeRecorder } from './db/migration-outcomes.js';
import { PgStagingStore, type StagingStore } from './db/staging-store.js';
import { RunRegistry } from './control/run-registry.js';
import { getLogger } from './lib/logger.js';
import { AdaptiveRateLimiter, RateLimiter } from './lib/rate-limiter.js';

export interface WorkerSettings {
  collectPageSize: number;
  collectProgressEvery: number;
  collectMaxConsecutiveFailures: number;
  migrateBatchSize: number;
  migrateBatchPauseMs: number;
  migrationTag: string;
}

/** Everything a run needs, wired once at startup. */
export interface WorkerRuntime {
  settings: WorkerSettings;
  source: SourceClient;
  target: TargetClient;
  store: StagingStore;
  runLog: CollectionRunLog | null;
  outcomes: OutcomeRecorder | null;
  limiters: RateLimiter[];
  registry: RunRegistry;
}

export function settingsFromEnv(env: Env): WorkerSettings {
  return {
    collectPageSize: env.COLLECT_PAGE_SIZE,
    collectProgressEvery: env.COLLECT_PROGRESS_EVERY,
    collectMaxConsecutiveFailures: env.COLLECT_MAX_CONSECUTIVE_FAILURES,
    migrateBatchSize: env.MIGRATE_BATCH_SIZE,
    migrateBatchPauseMs: env.MIGRATE_BATCH_PAUSE_MS,
    migrationTag: env.MIGRATION_TAG,
  };
}

export async function createRuntime(env: Env, db: Database): Promise<WorkerRuntime> {
  const logger = getLogger();

  // One limiter per API, shared by every run against it
  const sourceLimiter = new RateLimiter('source', env.SOURCE_REQUESTS_PER_SECOND);
  const targetLimiter = env.TARGET_ADAPTIVE_RATE
    ? new AdaptiveRateLimiter('target', env.TARGET_REQUESTS_PER_SECOND)
    : new RateLimiter('target', env.TARGET_REQUESTS_PER_SECOND);

  const outcomeTracking = await detectOutcomeTracking(db);
  logger.info({ outcomeTracking }, 'Outcome tracking capability resolved');

  return {
    settings: settingsFromEnv(env),
    source: createSourceClient(env, sourceLimiter),
    target: createTargetClient(env, targetLimiter),
    store: new PgStagingStore(db, env.STAGING_LOOKUP_CHUNK),
    runLog: new PgCollectionRunLog(db),
    outcomes: outcomeTracking ? new PgOutcomeRecorder(db, env.STAGING_LOOKUP_CHUNK) : null,
    limiters: [sourceLimiter, targetLimiter],
    registry: new RunRegistry(),
  };
}
