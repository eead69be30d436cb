import { isDeepStrictEqual } from 'node:util';
import type { SourceClient, SourcePage } from '../api/source-client.js';
import { errorMessage } from '../api/http.js';
import type { StagingStore } from '../db/staging-store.js';
import { getLogger } from '../lib/logger.js';
import { isPayload, isPlainObject, payloadSize, readString, type Payload } from '../lib/payload.js';
import { isCancelled } from '../lib/progress.js';
import { extractNaturalId, type EntityKind, type StagingRecord } from '../transform/staging-record.js';

export interface AuditDeps {
  source: SourceClient;
  store: StagingStore;
}

// ─── Set reconciliation ──────────────────────────────────────────────────────

export interface IdReconciliation {
  /** Expected but not staged. */
  missing: number[];
  /** Staged but not expected. */
  extra: number[];
}

export function reconcileIdSets(expected: Iterable<number>, actual: Iterable<number>): IdReconciliation {
  const expectedSet = new Set(expected);
  const actualSet = new Set(actual);
  const missing = [...expectedSet].filter((id) => !actualSet.has(id)).sort((a, b) => a - b);
  const extra = [...actualSet].filter((id) => !expectedSet.has(id)).sort((a, b) => a - b);
  return { missing, extra };
}

// ─── Record helpers ──────────────────────────────────────────────────────────

const NO_LABEL = 'N/A';

/** Human-readable identifier used in reports: the record's email. */
export function labelOf(kind: EntityKind, payload: Payload): string | null {
  switch (kind) {
    case 'customer':
      return readString(payload, 'email');
    case 'order':
      return readString(payload, 'customer_email');
    case 'subscription': {
      const customer = payload.customer;
      return isPlainObject(customer) ? readString(customer, 'email') : null;
    }
  }
}

/** Top-level fields whose values differ between two documents, sorted. */
export function differingFields(left: Payload, right: Payload): string[] {
  const keys = new Set([...Object.keys(left), ...Object.keys(right)]);
  return [...keys].filter((key) => !isDeepStrictEqual(left[key], right[key])).sort();
}

function rawSize(raw: unknown): number {
  if (isPayload(raw)) return payloadSize(raw);
  return Buffer.byteLength(JSON.stringify(raw) ?? '', 'utf8');
}

interface PageEntry {
  id: number | null;
  payload: Payload | null;
  raw: unknown;
}

function pageEntries(response: SourcePage): PageEntry[] {
  return response.results.map((raw) => {
    if (!isPayload(raw)) return { id: null, payload: null, raw };
    return { id: extractNaturalId(raw), payload: raw, raw };
  });
}

// ─── Single-page audit ───────────────────────────────────────────────────────

export interface MissingRecord {
  id: number | null;
  label: string;
  size: number;
  hasId: boolean;
}

export interface DataIssue {
  id: number;
  apiLabel: string;
  dbLabel: string;
  differingFields: string[];
}

export type PageAuditReport =
  | {
      status: 'ok';
      kind: EntityKind;
      page: number;
      apiCount: number;
      dbCount: number;
      presentIds: number[];
      missingCount: number;
      missingRecords: MissingRecord[];
      dataIssues: DataIssue[];
    }
  | { status: 'error'; kind: EntityKind; page: number; error: string };

export interface PageAuditOptions {
  /** Detail is kept for at most this many missing records. */
  maxMissing?: number;
}

const DEFAULT_MAX_MISSING = 50;

function compareStaged(entry: PageEntry & { id: number; payload: Payload }, kind: EntityKind, staged: StagingRecord): DataIssue | null {
  const fields = differingFields(entry.payload, staged.payload);
  if (fields.length === 0) return null;
  return {
    id: entry.id,
    apiLabel: labelOf(kind, entry.payload) ?? NO_LABEL,
    dbLabel: labelOf(kind, staged.payload) ?? NO_LABEL,
    differingFields: fields,
  };
}

export async function auditPage(
  kind: EntityKind,
  page: number,
  pageSize: number,
  deps: AuditDeps,
  options: PageAuditOptions = {},
): Promise<PageAuditReport> {
  const logger = getLogger();
  const maxMissing = options.maxMissing ?? DEFAULT_MAX_MISSING;

  let response: SourcePage;
  try {
    response = await deps.source.fetchPage(kind, { page, limit: pageSize });
  } catch (err) {
    logger.warn({ kind, page, err: errorMessage(err) }, 'Audit page fetch failed');
    return { status: 'error', kind, page, error: errorMessage(err) };
  }

  const entries = pageEntries(response);
  const ids = entries.flatMap((entry) => (entry.id !== null ? [entry.id] : []));
  const staged = new Map((await deps.store.getMany(kind, ids)).map((record) => [record.naturalId, record]));

  const presentIds: number[] = [];
  const missingRecords: MissingRecord[] = [];
  const dataIssues: DataIssue[] = [];
  let missingCount = 0;

  for (const entry of entries) {
    const { id, payload } = entry;
    const stagedRecord = id !== null ? staged.get(id) : undefined;

    if (id === null || payload === null || stagedRecord === undefined) {
      missingCount++;
      if (missingRecords.length < maxMissing) {
        missingRecords.push({
          id,
          label: (payload && labelOf(kind, payload)) ?? NO_LABEL,
          size: rawSize(entry.raw),
          hasId: id !== null,
        });
      }
      continue;
    }

    presentIds.push(id);
    const issue = compareStaged({ ...entry, id, payload }, kind, stagedRecord);
    if (issue) dataIssues.push(issue);
  }

  logger.info(
    { kind, page, apiCount: entries.length, dbCount: staged.size, missingCount, dataIssues: dataIssues.length },
    'Page audit complete',
  );

  return {
    status: 'ok',
    kind,
    page,
    apiCount: entries.length,
    dbCount: staged.size,
    presentIds,
    missingCount,
    missingRecords,
    dataIssues,
  };
}

// ─── Range audit ─────────────────────────────────────────────────────────────

export interface RangeAuditOptions {
  /** Also compare staged payloads with the source and report mismatches. */
  compareContent?: boolean;
  signal?: AbortSignal;
}

export interface RangeAuditReport {
  kind: EntityKind;
  pagesAudited: Array<{ page: number; apiCount: number; ids: number[] }>;
  missingFromDb: number[];
  extraInDb: number[];
  dataMismatches: DataIssue[];
  apiErrors: Array<{ page: number; error: string }>;
  summary: {
    totalApiRecords: number;
    totalDbRecords: number;
    missingCount: number;
    extraCount: number;
    mismatchCount: number;
    /** Source records with no usable id; counted as missing in single-page audits. */
    invalidApiRecords: number;
  };
}

/**
 * Re-fetch pages `start..end` (inclusive) and reconcile the ids seen against
 * staging. Missing ids come from one batched membership lookup; extra ids are
 * staged ids inside the audited id span that the source no longer returned.
 * An empty page ends the range early.
 */
export async function auditPageRange(
  kind: EntityKind,
  startPage: number,
  endPage: number,
  pageSize: number,
  deps: AuditDeps,
  options: RangeAuditOptions = {},
): Promise<RangeAuditReport> {
  const logger = getLogger();
  if (endPage < startPage) {
    throw new RangeError(`endPage ${endPage} is before startPage ${startPage}`);
  }

  const pagesAudited: RangeAuditReport['pagesAudited'] = [];
  const apiErrors: RangeAuditReport['apiErrors'] = [];
  const expected = new Map<number, Payload>();
  let totalApiRecords = 0;
  let invalidApiRecords = 0;

  for (let page = startPage; page <= endPage; page++) {
    if (isCancelled(options.signal)) break;

    let response: SourcePage;
    try {
      response = await deps.source.fetchPage(kind, { page, limit: pageSize });
    } catch (err) {
      apiErrors.push({ page, error: errorMessage(err) });
      logger.warn({ kind, page, err: errorMessage(err) }, 'Audit page fetch failed');
      continue;
    }

    if (response.results.length === 0) {
      logger.info({ kind, page }, 'Audit range reached an empty page');
      break;
    }

    const ids: number[] = [];
    for (const entry of pageEntries(response)) {
      if (entry.id === null || entry.payload === null) {
        invalidApiRecords++;
        continue;
      }
      ids.push(entry.id);
      expected.set(entry.id, entry.payload);
    }
    totalApiRecords += response.results.length;
    pagesAudited.push({ page, apiCount: response.results.length, ids });
  }

  const present = await deps.store.containsAny(kind, expected.keys());
  const { missing } = reconcileIdSets(expected.keys(), present);

  let extra: number[] = [];
  if (expected.size > 0) {
    const expectedIds = [...expected.keys()];
    const span = await deps.store.listNaturalIds(kind, {
      from: expectedIds.reduce((min, id) => Math.min(min, id)),
      to: expectedIds.reduce((max, id) => Math.max(max, id)),
    });
    extra = reconcileIdSets(expectedIds, span).extra;
  }

  const dataMismatches: DataIssue[] = [];
  if (options.compareContent && present.length > 0) {
    for (const staged of await deps.store.getMany(kind, present)) {
      const payload = expected.get(staged.naturalId);
      if (!payload) continue;
      const issue = compareStaged({ id: staged.naturalId, payload, raw: payload }, kind, staged);
      if (issue) dataMismatches.push(issue);
    }
  }

  const report: RangeAuditReport = {
    kind,
    pagesAudited,
    missingFromDb: missing,
    extraInDb: extra,
    dataMismatches,
    apiErrors,
    summary: {
      totalApiRecords,
      totalDbRecords: present.length,
      missingCount: missing.length,
      extraCount: extra.length,
      mismatchCount: dataMismatches.length,
      invalidApiRecords,
    },
  };

  logger.info({ kind, startPage, endPage, ...report.summary, apiErrors: apiErrors.length }, 'Range audit complete');
  return report;
}

// ─── Density overview ────────────────────────────────────────────────────────

export interface DensityBucket {
  pageRange: string;
  startPage: number;
  endPage: number;
  idFrom: number;
  idTo: number;
  firstId: number | null;
  lastId: number | null;
  observedCount: number;
  expectedCount: number;
  delta: number;
}

export const MAX_DENSITY_BUCKETS = 10_000;

export interface DensityOptions {
  pageSize?: number;
  pagesPerBucket?: number;
}

/**
 * Group ascending ids into contiguous id ranges of `pageSize × pagesPerBucket`
 * starting at the smallest id, assuming the source pages through dense ids.
 * Empty ranges are reported too. A strongly negative delta points at a region
 * worth a range audit; it proves nothing on its own.
 *
 * Throws a RangeError when the id spread would need more than
 * MAX_DENSITY_BUCKETS buckets.
 */
export function bucketDensity(sortedIds: number[], options: DensityOptions = {}): DensityBucket[] {
  const pageSize = options.pageSize ?? 1000;
  const pagesPerBucket = options.pagesPerBucket ?? 10;
  if (sortedIds.length === 0) return [];

  const span = pageSize * pagesPerBucket;
  const base = sortedIds[0];
  const bucketCount = Math.floor((sortedIds[sortedIds.length - 1] - base) / span) + 1;
  if (bucketCount > MAX_DENSITY_BUCKETS) {
    throw new RangeError(
      `Density overview would need ${bucketCount} buckets (limit ${MAX_DENSITY_BUCKETS}); raise pageSize or pagesPerBucket`,
    );
  }

  const buckets: DensityBucket[] = [];
  for (let index = 0; index < bucketCount; index++) {
    const startPage = index * pagesPerBucket;
    const endPage = startPage + pagesPerBucket - 1;
    buckets.push({
      pageRange: `${startPage}-${endPage}`,
      startPage,
      endPage,
      idFrom: base + index * span,
      idTo: base + (index + 1) * span - 1,
      firstId: null,
      lastId: null,
      observedCount: 0,
      expectedCount: span,
      delta: -span,
    });
  }

  for (const id of sortedIds) {
    const bucket = buckets[Math.floor((id - base) / span)];
    if (bucket.firstId === null) bucket.firstId = id;
    bucket.lastId = id;
    bucket.observedCount++;
    bucket.delta = bucket.observedCount - bucket.expectedCount;
  }

  return buckets;
}

export async function densityOverview(
  kind: EntityKind,
  store: StagingStore,
  options: DensityOptions = {},
): Promise<DensityBucket[]> {
  return bucketDensity(await store.listNaturalIds(kind), options);
}

// ─── Id gaps ─────────────────────────────────────────────────────────────────

const MAX_GAP_SCAN = 1_000_000;

/** Ids in `startId..endId` (inclusive) that are not staged. */
export async function findIdGaps(
  kind: EntityKind,
  startId: number,
  endId: number,
  store: StagingStore,
): Promise<number[]> {
  if (endId < startId) {
    throw new RangeError(`endId ${endId} is before startId ${startId}`);
  }
  if (endId - startId + 1 > MAX_GAP_SCAN) {
    throw new RangeError(`Gap scans are limited to ${MAX_GAP_SCAN} ids`);
  }

  const staged = new Set(await store.listNaturalIds(kind, { from: startId, to: endId }));
  const gaps: number[] = [];
  for (let id = startId; id <= endId; id++) {
    if (!staged.has(id)) gaps.push(id);
  }
  return gaps;
}
