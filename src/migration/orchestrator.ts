import type { TargetClient } from '../api/target-client.js';
import { errorMessage } from '../api/http.js';
import type { MigrationOutcome, OutcomeRecorder } from '../db/migration-outcomes.js';
import type { StagingStore } from '../db/staging-store.js';
import { getLogger } from '../lib/logger.js';
import type { Payload } from '../lib/payload.js';
import { isCancelled, noopObserver, type ProgressObserver } from '../lib/progress.js';
import {
  buildSubscriptionSummary,
  hasSubscriptionIndicator,
  mapCustomer,
  mapOrder,
  type ProductIndex,
} from '../transform/field-mapper.js';
import { eligibilityReasons, type EligibilityReason } from './eligibility.js';
import { loadProductIndex } from './product-index.js';

/**
 * Migration orchestrator.
 *
 * Each eligible customer is one unit: the customer, its orders and a
 * subscription summary. The customer must be created for the unit to count;
 * orders, the migration tag and the summary are best effort, since the target
 * API cannot roll any of them back together.
 */

export type UnitStatus = 'success' | 'failed' | 'skipped' | 'dry_run';

export interface OrderFailure {
  naturalId: number;
  error: string;
}

export interface UnitReport {
  naturalId: number;
  targetId: number | null;
  status: UnitStatus;
  reasons: EligibilityReason[];
  ordersAttempted: number;
  ordersMigrated: number;
  orderFailures: OrderFailure[];
  /** Orders that would be created; dry runs only. */
  plannedOrders: number[];
  warnings: string[];
  error: string | null;
}

interface ProgressTotals {
  index: number;
  total: number;
  migrated: number;
  failed: number;
  skipped: number;
}

export type MigrationProgressEvent =
  | ({ type: 'unit_started'; naturalId: number } & ProgressTotals)
  | ({ type: 'unit_finished'; naturalId: number; status: UnitStatus } & ProgressTotals)
  | ({ type: 'batch_pause'; pauseMs: number } & ProgressTotals);

export interface MigrateOptions {
  dryRun?: boolean;
  /** Migrate at most this many eligible customers. */
  limit?: number;
  /** Migrate exactly these customers instead of listing eligible ones. */
  customerIds?: number[];
  batchSize?: number;
  batchPauseMs?: number;
  /** Skip customers whose migration is already recorded as successful. */
  skipMigrated?: boolean;
  migrationTag: string;
  signal?: AbortSignal;
  observer?: ProgressObserver<MigrationProgressEvent>;
}

export interface MigrateDeps {
  store: StagingStore;
  target: TargetClient;
  /** Null when outcome tracking is not available. */
  outcomes: OutcomeRecorder | null;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface MigrationSummary {
  migrated: number;
  failed: number;
  skipped: number;
  totalProcessed: number;
  dryRun: boolean;
  state: 'done' | 'stopped';
  units: UnitReport[];
}

const DEFAULT_BATCH_SIZE = 50;
const DEFAULT_BATCH_PAUSE_MS = 1000;

export interface UnitContext {
  deps: MigrateDeps;
  products: ProductIndex;
  dryRun: boolean;
  migrationTag: string;
  now: () => Date;
}

function emptyUnit(naturalId: number, status: UnitStatus): UnitReport {
  return {
    naturalId,
    targetId: null,
    status,
    reasons: [],
    ordersAttempted: 0,
    ordersMigrated: 0,
    orderFailures: [],
    plannedOrders: [],
    warnings: [],
    error: null,
  };
}

async function recordOutcome(outcomes: OutcomeRecorder | null, outcome: MigrationOutcome): Promise<void> {
  if (!outcomes) return;
  try {
    await outcomes.record(outcome);
  } catch (err) {
    getLogger().warn(
      { entityKind: outcome.entityKind, naturalId: outcome.naturalId, err: errorMessage(err) },
      'Failed to record migration outcome',
    );
  }
}

export async function migrateUnit(naturalId: number, ctx: UnitContext): Promise<UnitReport> {
  const logger = getLogger();
  const { store, target, outcomes } = ctx.deps;
  const unit = emptyUnit(naturalId, 'failed');

  // 1. Assemble
  const customer = await store.getByNaturalId('customer', naturalId);
  if (!customer) {
    unit.error = 'Customer not found in staging';
    logger.warn({ naturalId }, 'Skipping unit: customer not staged');
    return unit;
  }
  const orders = await store.getByOwner('order', naturalId);
  const subscriptions = await store.getByOwner('subscription', naturalId);
  unit.reasons = eligibilityReasons(customer.payload, orders.length);
  unit.ordersAttempted = orders.length;

  // 2. Map
  let mappedCustomer: Payload;
  try {
    mappedCustomer = mapCustomer(customer.payload, naturalId);
  } catch (err) {
    unit.error = errorMessage(err);
    logger.warn({ naturalId, err: unit.error }, 'Customer mapping failed');
    return unit;
  }

  const mappedOrders: Array<{ naturalId: number; body: Payload }> = [];
  for (const order of orders) {
    try {
      mappedOrders.push({ naturalId: order.naturalId, body: mapOrder(order.payload, order.naturalId, null, ctx.products) });
    } catch (err) {
      unit.orderFailures.push({ naturalId: order.naturalId, error: errorMessage(err) });
    }
  }

  const wantsSummary = hasSubscriptionIndicator(customer.payload) || subscriptions.length > 0;

  if (ctx.dryRun) {
    unit.status = 'dry_run';
    unit.plannedOrders = mappedOrders.map((order) => order.naturalId);
    if (wantsSummary) unit.warnings.push('Would attach subscription summary');
    logger.info(
      { naturalId, orders: orders.length, plannable: mappedOrders.length, reasons: unit.reasons },
      'Dry run: unit mapped',
    );
    return unit;
  }

  // 3. Push customer, then orders
  let targetId: number;
  try {
    targetId = (await target.createCustomer(mappedCustomer)).id;
  } catch (err) {
    unit.error = errorMessage(err);
    logger.error({ naturalId, err: unit.error }, 'Target customer creation failed');
    return unit;
  }
  unit.targetId = targetId;

  for (const order of mappedOrders) {
    try {
      const created = await target.createOrder({ ...order.body, customer: { id: targetId } });
      unit.ordersMigrated++;
      await recordOutcome(outcomes, {
        entityKind: 'order',
        naturalId: order.naturalId,
        ownerId: naturalId,
        targetId: created.id,
        status: 'success',
        errorDetail: null,
      });
    } catch (err) {
      unit.orderFailures.push({ naturalId: order.naturalId, error: errorMessage(err) });
      logger.warn({ naturalId, orderId: order.naturalId, err: errorMessage(err) }, 'Order creation failed: continuing');
    }
  }

  for (const failure of unit.orderFailures) {
    await recordOutcome(outcomes, {
      entityKind: 'order',
      naturalId: failure.naturalId,
      ownerId: naturalId,
      targetId: null,
      status: 'failed',
      errorDetail: failure.error,
    });
  }

  // 4. Tag and summary
  try {
    await target.addCustomerTags(targetId, [ctx.migrationTag]);
  } catch (err) {
    unit.warnings.push(`Tagging failed: ${errorMessage(err)}`);
    logger.warn({ naturalId, targetId, err: errorMessage(err) }, 'Failed to tag migrated customer');
  }

  if (wantsSummary) {
    try {
      await target.createCustomerMetafield(
        targetId,
        buildSubscriptionSummary(customer.payload, naturalId, subscriptions, ctx.now()),
      );
    } catch (err) {
      unit.warnings.push(`Subscription summary failed: ${errorMessage(err)}`);
      logger.warn({ naturalId, targetId, err: errorMessage(err) }, 'Failed to attach subscription summary');
    }
  }

  unit.status = 'success';
  logger.info(
    { naturalId, targetId, ordersMigrated: unit.ordersMigrated, ordersAttempted: unit.ordersAttempted },
    'Customer unit migrated',
  );
  return unit;
}

export async function migrateCustomers(options: MigrateOptions, deps: MigrateDeps): Promise<MigrationSummary> {
  const logger = getLogger();
  const dryRun = options.dryRun ?? false;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const batchPauseMs = options.batchPauseMs ?? DEFAULT_BATCH_PAUSE_MS;
  const skipMigrated = options.skipMigrated ?? true;
  const observer = options.observer ?? noopObserver<MigrationProgressEvent>();
  const sleep = deps.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const now = deps.now ?? (() => new Date());

  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const customerIds = options.customerIds ?? (await deps.store.listEligibleCustomerIds(options.limit));
  const alreadyMigrated = new Set(
    skipMigrated && deps.outcomes ? await deps.outcomes.successfulIds('customer', customerIds) : [],
  );
  const products = await loadProductIndex(deps.target);
  const ctx: UnitContext = { deps, products, dryRun, migrationTag: options.migrationTag, now };

  logger.info(
    { customers: customerIds.length, alreadyMigrated: alreadyMigrated.size, dryRun, outcomeTracking: deps.outcomes !== null },
    'Starting customer migration',
  );

  const units: UnitReport[] = [];
  let migrated = 0;
  let failed = 0;
  let skipped = 0;
  let processed = 0;
  let state: MigrationSummary['state'] = 'done';

  const totals = (index: number): ProgressTotals => ({ index, total: customerIds.length, migrated, failed, skipped });

  for (let index = 0; index < customerIds.length; index++) {
    if (isCancelled(options.signal)) {
      state = 'stopped';
      logger.info({ index, migrated, failed, skipped }, 'Customer migration stopped');
      break;
    }

    const naturalId = customerIds[index];
    if (alreadyMigrated.has(naturalId)) {
      skipped++;
      units.push(emptyUnit(naturalId, 'skipped'));
      observer.onProgress({ type: 'unit_finished', naturalId, status: 'skipped', ...totals(index) });
      continue;
    }

    observer.onProgress({ type: 'unit_started', naturalId, ...totals(index) });

    let unit: UnitReport;
    try {
      unit = await migrateUnit(naturalId, ctx);
    } catch (err) {
      unit = { ...emptyUnit(naturalId, 'failed'), error: errorMessage(err) };
      logger.error({ naturalId, err: unit.error }, 'Customer unit failed unexpectedly');
    }
    units.push(unit);
    processed++;

    if (unit.status === 'failed') {
      failed++;
    } else {
      migrated++;
    }

    if (!dryRun) {
      await recordOutcome(deps.outcomes, {
        entityKind: 'customer',
        naturalId,
        ownerId: null,
        targetId: unit.targetId,
        status: unit.status === 'success' ? 'success' : 'failed',
        errorDetail: unit.error,
      });
    }

    observer.onProgress({ type: 'unit_finished', naturalId, status: unit.status, ...totals(index) });

    const more = index + 1 < customerIds.length;
    if (!dryRun && more && batchPauseMs > 0 && processed % batchSize === 0) {
      observer.onProgress({ type: 'batch_pause', pauseMs: batchPauseMs, ...totals(index) });
      await sleep(batchPauseMs);
    }
  }

  const summary: MigrationSummary = {
    migrated,
    failed,
    skipped,
    totalProcessed: processed,
    dryRun,
    state,
    units,
  };

  logger.info({ migrated, failed, skipped, totalProcessed: processed, dryRun, state }, 'Customer migration finished');
  return summary;
}
