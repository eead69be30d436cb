import { errorMessage } from '../api/http.js';
import type { CollectionRunLog, CollectionRunOutcome } from '../db/collection-runs.js';
import { getLogger } from '../lib/logger.js';
import {
  BatchCommitError,
  CollectionAbortedError,
  collectEntities,
  type CollectDeps,
  type CollectionResult,
  type CollectOptions,
} from './collector.js';

export interface CollectionJobDeps extends CollectDeps {
  /** Null disables run bookkeeping (and therefore resume). */
  runLog: CollectionRunLog | null;
}

function outcomeOf(result: CollectionResult, status: CollectionRunOutcome['status'], error?: string): CollectionRunOutcome {
  return {
    status,
    finalPage: result.finalPage,
    pagesFetched: result.pagesFetched,
    collectedCount: result.collectedCount,
    failedCount: result.failedCount,
    errorMessage: error,
  };
}

/**
 * Run the collector with a collection_runs row around it, so the next run
 * can resume from the page this one reached.
 */
export async function runCollectionJob(options: CollectOptions, deps: CollectionJobDeps): Promise<CollectionResult> {
  const logger = getLogger();
  const { runLog } = deps;
  const runId = runLog ? await runLog.start(options.kind, options.startPage ?? 0, options.pageSize) : null;

  const finish = async (outcome: CollectionRunOutcome): Promise<void> => {
    if (!runLog || runId === null) return;
    try {
      await runLog.finish(runId, outcome);
    } catch (err) {
      logger.warn({ runId, err: errorMessage(err) }, 'Failed to update collection run');
    }
  };

  try {
    const result = await collectEntities(options, deps);
    await finish(outcomeOf(result, result.state === 'stopped' ? 'stopped' : 'completed'));
    return result;
  } catch (err) {
    if (err instanceof CollectionAbortedError || err instanceof BatchCommitError) {
      await finish(outcomeOf(err.result, 'failed', err.message));
    } else {
      await finish({
        status: 'failed',
        finalPage: null,
        pagesFetched: 0,
        collectedCount: 0,
        failedCount: 0,
        errorMessage: errorMessage(err),
      });
    }
    throw err;
  }
}
