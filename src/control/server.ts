import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { z } from 'zod';
import { auditPage, auditPageRange, densityOverview, findIdGaps, type DensityBucket } from '../audit/auditor.js';
import type { CollectionProgressEvent, CollectionResult } from '../pipeline/collector.js';
import { runCollectionJob } from '../pipeline/collection-job.js';
import { getLogger } from '../lib/logger.js';
import { migrateCustomers, type MigrationProgressEvent, type MigrationSummary } from '../migration/orchestrator.js';
import type { WorkerRuntime } from '../runtime.js';
import { ENTITY_KINDS, type EntityKind } from '../transform/staging-record.js';

let _server: FastifyInstance | null = null;

export class BadRequestError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'BadRequestError';
  }
}

// ─── Request schemas ─────────────────────────────────────────────────────────

const kindParams = z.object({ kind: z.enum(ENTITY_KINDS) });
const runParams = z.object({ id: z.string().uuid() });

const queryFlag = z.enum(['true', 'false']).transform((value) => value === 'true');
const page = z.coerce.number().int().nonnegative();
const positiveInt = z.coerce.number().int().positive();

const collectBody = z
  .object({
    startPage: page.optional(),
    pageSize: positiveInt.max(5000).optional(),
    maxPages: positiveInt.optional(),
  })
  .default({});

const migrateBody = z
  .object({
    dryRun: z.boolean().default(false),
    limit: positiveInt.optional(),
    customerIds: z.array(positiveInt).min(1).optional(),
    skipMigrated: z.boolean().default(true),
  })
  .default({});

const auditPageQuery = z.object({
  kind: z.enum(ENTITY_KINDS).default('customer'),
  page,
  pageSize: positiveInt.max(5000).optional(),
  maxMissing: positiveInt.optional(),
});

const auditRangeQuery = z
  .object({
    kind: z.enum(ENTITY_KINDS).default('customer'),
    start: page,
    end: page,
    pageSize: positiveInt.max(5000).optional(),
    compareContent: queryFlag.default('false'),
  })
  .refine((query) => query.end >= query.start, { message: 'end must not be before start', path: ['end'] })
  .refine((query) => query.end - query.start < 1000, { message: 'at most 1000 pages per audit', path: ['end'] });

const densityQuery = z.object({
  kind: z.enum(ENTITY_KINDS).default('customer'),
  pageSize: positiveInt.optional(),
  pagesPerBucket: positiveInt.optional(),
});

const gapsQuery = z
  .object({
    kind: z.enum(ENTITY_KINDS).default('customer'),
    startId: positiveInt,
    endId: positiveInt,
  })
  .refine((query) => query.endId >= query.startId, { message: 'endId must not be before startId', path: ['endId'] });

const confirmBody = z.object({ confirm: z.string() });

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new BadRequestError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; '),
    );
  }
  return result.data;
}

// ─── Server ──────────────────────────────────────────────────────────────────

export function buildControlServer(runtime: WorkerRuntime): FastifyInstance {
  const server = Fastify({ logger: false });
  const { registry, settings, store, source } = runtime;

  server.setErrorHandler<FastifyError>((err, _request, reply) => {
    if (err instanceof BadRequestError) {
      return reply.code(err.statusCode).send({ error: err.message });
    }
    const statusCode = err.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.code(statusCode).send({ error: err.message });
    }
    getLogger().error({ err }, 'Control request failed');
    return reply.code(500).send({ error: err.message });
  });

  // Simple liveness probe
  server.get('/live', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ status: 'alive' });
  });

  server.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const limiters = runtime.limiters.map((limiter) => limiter.snapshot());
    const activeRuns = registry.active().map((run) => ({ id: run.id, label: run.label }));

    try {
      await store.count('customer');
    } catch (err) {
      getLogger().error({ err }, 'Health check error');
      return reply.code(503).send({
        status: 'degraded',
        timestamp: new Date().toISOString(),
        error: err instanceof Error ? err.message : 'Unknown error',
        limiters,
        activeRuns,
      });
    }

    return reply.code(200).send({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      outcomeTracking: runtime.outcomes !== null,
      limiters,
      activeRuns,
    });
  });

  server.get('/stats', async (_request: FastifyRequest, reply: FastifyReply) => {
    const staged: Record<string, number> = {};
    for (const kind of ENTITY_KINDS) {
      staged[kind] = await store.count(kind);
    }

    const customersWithOrders = await store.countDistinctOwners('order');
    const customersWithSubscriptions = await store.countDistinctOwners('subscription');

    const migration = runtime.outcomes
      ? {
          customers: await runtime.outcomes.countsByStatus('customer'),
          orders: await runtime.outcomes.countsByStatus('order'),
        }
      : null;

    const migratedCustomers = migration?.customers.success ?? 0;

    return reply.code(200).send({
      staged,
      customersWithOrders,
      customersWithSubscriptions,
      migration,
      migrationProgress: Math.round((migratedCustomers / Math.max(staged.customer, 1)) * 10_000) / 100,
    });
  });

  // ─── Runs ──────────────────────────────────────────────────────────────────

  server.post('/collect/:kind', async (request: FastifyRequest, reply: FastifyReply) => {
    const { kind } = parse(kindParams, request.params);
    const body = parse(collectBody, request.body ?? undefined);
    const label = `collect:${kind}`;

    const startPage = body.startPage ?? (runtime.runLog ? await runtime.runLog.resumePage(kind) : null) ?? 0;
    const pageSize = body.pageSize ?? settings.collectPageSize;

    // Check and start with no await in between.
    if (registry.isRunning(label)) {
      throw new BadRequestError(`A ${kind} collection is already running`, 409);
    }

    const view = registry.start<CollectionProgressEvent, CollectionResult>(
      'collect',
      label,
      ({ signal, observer }) =>
        runCollectionJob(
          {
            kind,
            startPage,
            pageSize,
            signal,
            observer,
            progressEvery: settings.collectProgressEvery,
            maxConsecutiveFailures: settings.collectMaxConsecutiveFailures,
            maxPages: body.maxPages,
          },
          { source, store, runLog: runtime.runLog },
        ),
      (result) => (result.state === 'stopped' ? 'stopped' : 'completed'),
    );

    return reply.code(202).send({ ...view, startPage, pageSize });
  });

  server.post('/migrate', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parse(migrateBody, request.body ?? undefined);
    const label = 'migrate';

    if (registry.isRunning(label)) {
      throw new BadRequestError('A migration is already running', 409);
    }

    const view = registry.start<MigrationProgressEvent, MigrationSummary>(
      'migrate',
      label,
      ({ signal, observer }) =>
        migrateCustomers(
          {
            dryRun: body.dryRun,
            limit: body.limit,
            customerIds: body.customerIds,
            skipMigrated: body.skipMigrated,
            batchSize: settings.migrateBatchSize,
            batchPauseMs: settings.migrateBatchPauseMs,
            migrationTag: settings.migrationTag,
            signal,
            observer,
          },
          { store, target: runtime.target, outcomes: runtime.outcomes },
        ),
      (summary) => (summary.state === 'stopped' ? 'stopped' : 'completed'),
    );

    return reply.code(202).send({ ...view, dryRun: body.dryRun });
  });

  server.get('/runs', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ runs: registry.list() });
  });

  server.get('/runs/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = parse(runParams, request.params);
    const run = registry.get(id);
    if (!run) {
      return reply.code(404).send({ error: `Unknown run ${id}` });
    }
    return reply.code(200).send(run);
  });

  server.post('/runs/:id/stop', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = parse(runParams, request.params);
    if (!registry.get(id)) {
      return reply.code(404).send({ error: `Unknown run ${id}` });
    }
    const stopping = registry.stop(id);
    return reply.code(stopping ? 202 : 409).send({ id, stopping });
  });

  // ─── Audits ────────────────────────────────────────────────────────────────

  server.get('/audit/page', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parse(auditPageQuery, request.query);
    const report = await auditPage(
      query.kind,
      query.page,
      query.pageSize ?? settings.collectPageSize,
      { source, store },
      { maxMissing: query.maxMissing },
    );
    return reply.code(report.status === 'ok' ? 200 : 502).send(report);
  });

  server.get('/audit/range', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parse(auditRangeQuery, request.query);
    const report = await auditPageRange(
      query.kind,
      query.start,
      query.end,
      query.pageSize ?? settings.collectPageSize,
      { source, store },
      { compareContent: query.compareContent },
    );
    return reply.code(200).send(report);
  });

  server.get('/audit/density', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parse(densityQuery, request.query);
    let buckets: DensityBucket[];
    try {
      buckets = await densityOverview(query.kind, store, {
        pageSize: query.pageSize ?? settings.collectPageSize,
        pagesPerBucket: query.pagesPerBucket,
      });
    } catch (err) {
      if (err instanceof RangeError) throw new BadRequestError(err.message);
      throw err;
    }
    return reply.code(200).send({ kind: query.kind, buckets });
  });

  server.get('/audit/gaps', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parse(gapsQuery, request.query);
    if (query.endId - query.startId >= 1_000_000) {
      throw new BadRequestError('at most 1000000 ids per gap scan');
    }
    const gaps = await findIdGaps(query.kind, query.startId, query.endId, store);
    return reply.code(200).send({ kind: query.kind, startId: query.startId, endId: query.endId, count: gaps.length, gaps });
  });

  // ─── Destructive maintenance ───────────────────────────────────────────────

  server.delete('/staging/:kind', async (request: FastifyRequest, reply: FastifyReply) => {
    const { kind } = parse(kindParams, request.params);
    const { confirm } = parse(confirmBody, request.body ?? undefined);
    assertConfirmed(confirm, kind);

    if (registry.active().length > 0) {
      throw new BadRequestError('Cannot wipe staging while runs are active', 409);
    }

    const deleted = await store.wipe(kind);
    return reply.code(200).send({ kind, deleted });
  });

  server.delete('/migration/outcomes', async (request: FastifyRequest, reply: FastifyReply) => {
    const { confirm } = parse(confirmBody, request.body ?? undefined);
    assertConfirmed(confirm, 'outcomes');

    if (!runtime.outcomes) {
      throw new BadRequestError('Outcome tracking is not available', 409);
    }
    if (registry.isRunning('migrate')) {
      throw new BadRequestError('Cannot reset outcomes while a migration is running', 409);
    }

    const deleted = await runtime.outcomes.reset();
    return reply.code(200).send({ deleted });
  });

  return server;
}

function assertConfirmed(confirm: string, expected: EntityKind | 'outcomes'): void {
  if (confirm !== expected) {
    throw new BadRequestError(`Set "confirm" to "${expected}" to proceed`);
  }
}

export async function startControlServer(runtime: WorkerRuntime, port: number): Promise<void> {
  _server = buildControlServer(runtime);
  await _server.listen({ port, host: '0.0.0.0' });
}

export async function stopControlServer(): Promise<void> {
  if (_server) {
    await _server.close();
    _server = null;
  }
}
