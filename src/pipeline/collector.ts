import type { SourceClient, SourcePage } from '../api/source-client.js';
import { errorMessage } from '../api/http.js';
import type { StagingStore } from '../db/staging-store.js';
import { getLogger } from '../lib/logger.js';
import { isCancelled, noopObserver, type ProgressObserver } from '../lib/progress.js';
import {
  decodeStagingRecord,
  InvalidRecordError,
  type EntityKind,
  type StagingRecord,
} from '../transform/staging-record.js';

/**
 * Paginated collector.
 *
 * IDLE → FETCHING → (PAGE_EMPTY | PAGE_ERROR | PAGE_OK) → (DONE | FETCHING) | STOPPED
 *
 * One page per iteration: fetch, decode, upsert the page's records in one
 * transaction, then advance using the page number carried by the API's
 * `next` link. Cancellation is polled at the top of each iteration only, so
 * a page that has started is always committed before the run stops.
 */

export type CollectorState =
  | 'idle'
  | 'fetching'
  | 'page_empty'
  | 'page_error'
  | 'page_ok'
  | 'done'
  | 'stopped'
  | 'page_limit';

interface ProgressCounters {
  kind: EntityKind;
  state: CollectorState;
  page: number;
  collectedCount: number;
  failedCount: number;
}

export type CollectionProgressEvent =
  | ({ type: 'page_fetching' } & ProgressCounters)
  | ({ type: 'records_processed'; processedInPage: number; pageRecords: number } & ProgressCounters)
  | ({ type: 'page_committed'; pageRecords: number; nextPage: number | null } & ProgressCounters)
  | ({ type: 'page_failed'; error: string; consecutiveFailures: number } & ProgressCounters);

export interface CollectOptions {
  kind: EntityKind;
  startPage?: number;
  pageSize: number;
  signal?: AbortSignal;
  observer?: ProgressObserver<CollectionProgressEvent>;
  /** Emit `records_processed` every N records within a page. */
  progressEvery?: number;
  /** Abort once more than this many pages fail in a row. */
  maxConsecutiveFailures?: number;
  /** Stop after this many page requests. */
  maxPages?: number;
}

export interface CollectDeps {
  source: SourceClient;
  store: StagingStore;
  now?: () => Date;
}

export interface CollectionResult {
  kind: EntityKind;
  collectedCount: number;
  failedCount: number;
  finalPage: number;
  pagesFetched: number;
  state: 'done' | 'stopped' | 'page_limit';
}

export class CollectionAbortedError extends Error {
  constructor(
    message: string,
    public readonly result: CollectionResult,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'CollectionAbortedError';
  }
}

export class BatchCommitError extends Error {
  constructor(
    message: string,
    public readonly page: number,
    public readonly result: CollectionResult,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'BatchCommitError';
  }
}

const DEFAULT_PROGRESS_EVERY = 100;
const DEFAULT_MAX_CONSECUTIVE_FAILURES = 10;

/** Any absolute URL works here; only the query string of `next` is read. */
const CURSOR_BASE = 'http://cursor.invalid/';

/**
 * Page number to fetch after `currentPage`, taken from the `page` query
 * parameter of the `next` link. Falls back to `currentPage + 1` when the link
 * carries no usable page number or one that does not move forward.
 */
export function resolveNextPage(next: string, currentPage: number): { page: number; fellBack: boolean } {
  let parsed: number | null = null;
  try {
    const raw = new URL(next, CURSOR_BASE).searchParams.get('page');
    if (raw !== null && /^\d+$/.test(raw)) {
      parsed = Number(raw);
    }
  } catch (err) {
    getLogger().debug({ next, err: errorMessage(err) }, 'Unparsable next link');
    parsed = null;
  }

  if (parsed !== null && Number.isSafeInteger(parsed) && parsed > currentPage) {
    return { page: parsed, fellBack: false };
  }
  return { page: currentPage + 1, fellBack: true };
}

export async function collectEntities(options: CollectOptions, deps: CollectDeps): Promise<CollectionResult> {
  const logger = getLogger();
  const { kind, pageSize, signal } = options;
  const observer = options.observer ?? noopObserver<CollectionProgressEvent>();
  const progressEvery = options.progressEvery ?? DEFAULT_PROGRESS_EVERY;
  const maxConsecutiveFailures = options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
  const now = deps.now ?? (() => new Date());

  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  let page = options.startPage ?? 0;
  let state: CollectorState = 'idle';
  let collectedCount = 0;
  let failedCount = 0;
  let pagesFetched = 0;
  let pagesAttempted = 0;
  let consecutiveFailures = 0;

  const snapshot = (final: CollectionResult['state']): CollectionResult => ({
    kind,
    collectedCount,
    failedCount,
    finalPage: page,
    pagesFetched,
    state: final,
  });
  const counters = (): ProgressCounters => ({ kind, state, page, collectedCount, failedCount });

  logger.info({ kind, startPage: page, pageSize }, `Starting ${kind} collection`);

  for (;;) {
    if (isCancelled(signal)) {
      state = 'stopped';
      logger.info({ kind, page, collectedCount, failedCount }, `${kind} collection stopped`);
      return snapshot('stopped');
    }

    if (options.maxPages !== undefined && pagesAttempted >= options.maxPages) {
      state = 'page_limit';
      logger.info({ kind, page, maxPages: options.maxPages }, `${kind} collection reached page limit`);
      return snapshot('page_limit');
    }

    state = 'fetching';
    observer.onProgress({ type: 'page_fetching', ...counters() });
    pagesAttempted++;

    let response: SourcePage;
    try {
      response = await deps.source.fetchPage(kind, { page, limit: pageSize });
      pagesFetched++;
    } catch (err) {
      state = 'page_error';
      consecutiveFailures++;
      failedCount += pageSize;
      const message = errorMessage(err);

      logger.warn(
        { kind, page, consecutiveFailures, err: message },
        `${kind} page fetch failed: skipping page`,
      );
      observer.onProgress({ type: 'page_failed', error: message, consecutiveFailures, ...counters() });

      if (consecutiveFailures > maxConsecutiveFailures) {
        logger.error({ kind, page, consecutiveFailures }, `${kind} collection aborted`);
        throw new CollectionAbortedError(
          `Aborted ${kind} collection after ${consecutiveFailures} consecutive page failures`,
          snapshot('stopped'),
          { cause: err },
        );
      }

      page += 1;
      continue;
    }

    consecutiveFailures = 0;

    if (response.results.length === 0) {
      state = 'page_empty';
      logger.info({ kind, page, state, collectedCount, failedCount }, `${kind} collection complete`);
      return snapshot('done');
    }

    state = 'page_ok';
    const fetchedAt = now();
    const records: StagingRecord[] = [];
    let invalidCount = 0;

    response.results.forEach((raw, index) => {
      try {
        records.push(decodeStagingRecord(kind, raw, fetchedAt));
      } catch (err) {
        if (!(err instanceof InvalidRecordError)) throw err;
        invalidCount++;
        logger.warn({ kind, page, index, rawId: err.rawId, err: err.message }, 'Skipping invalid record');
      }

      const processed = index + 1;
      if (processed % progressEvery === 0) {
        observer.onProgress({
          type: 'records_processed',
          processedInPage: processed,
          pageRecords: response.results.length,
          ...counters(),
        });
      }
    });

    try {
      await deps.store.upsertBatch(kind, records);
    } catch (err) {
      failedCount += response.results.length;
      logger.error({ kind, page, records: response.results.length, err: errorMessage(err) }, 'Batch commit failed');
      throw new BatchCommitError(
        `Failed to commit ${kind} page ${page}: ${errorMessage(err)}`,
        page,
        snapshot('stopped'),
        { cause: err },
      );
    }

    collectedCount += records.length;
    failedCount += invalidCount;

    if (response.next === null) {
      observer.onProgress({
        type: 'page_committed',
        pageRecords: response.results.length,
        nextPage: null,
        ...counters(),
      });
      logger.info({ kind, page, collectedCount, failedCount }, `${kind} collection complete: no next link`);
      return snapshot('done');
    }

    const advance = resolveNextPage(response.next, page);
    if (advance.fellBack) {
      logger.warn(
        { kind, page, next: response.next, fallbackPage: advance.page },
        'Next link has no usable page number: advancing by one',
      );
    }

    observer.onProgress({
      type: 'page_committed',
      pageRecords: response.results.length,
      nextPage: advance.page,
      ...counters(),
    });
    logger.debug({ kind, page, records: records.length, invalid: invalidCount, collectedCount }, 'Page committed');

    page = advance.page;
  }
}
