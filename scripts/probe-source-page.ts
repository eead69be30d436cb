/**
 * Fetch a single page from the source API and log what came back, without
 * touching the database.
 *
 * Run with: npm run build && npm run probe -- customer 0 100
 */
import 'dotenv/config';
import { errorMessage } from '../src/api/http.js';
import { createSourceClient } from '../src/api/source-client.js';
import { loadEnv } from '../src/config/env.js';
import { createLogger } from '../src/lib/logger.js';
import { RateLimiter } from '../src/lib/rate-limiter.js';
import { resolveNextPage } from '../src/pipeline/collector.js';
import { decodeStagingRecord, isEntityKind } from '../src/transform/staging-record.js';

async function main() {
  const env = loadEnv();
  const logger = createLogger();

  const [kindArg = 'customer', pageArg = '0', limitArg = '100'] = process.argv.slice(2);
  if (!isEntityKind(kindArg)) {
    throw new Error(`Unknown entity kind "${kindArg}"`);
  }
  const page = Number(pageArg);
  const limit = Number(limitArg);

  const source = createSourceClient(env, new RateLimiter('source', env.SOURCE_REQUESTS_PER_SECOND));

  logger.info({ kind: kindArg, page, limit }, '=== Probe: fetching one source page ===');
  const result = await source.fetchPage(kindArg, { page, limit });

  const ids: number[] = [];
  let invalid = 0;
  for (const raw of result.results) {
    try {
      ids.push(decodeStagingRecord(kindArg, raw).naturalId);
    } catch (err) {
      invalid++;
      logger.warn({ err: errorMessage(err) }, 'Undecodable record');
    }
  }

  logger.info(
    {
      records: result.results.length,
      invalid,
      firstId: ids[0] ?? null,
      lastId: ids[ids.length - 1] ?? null,
      count: result.count,
      next: result.next,
      nextPage: result.next === null ? null : resolveNextPage(result.next, page).page,
    },
    'Probe complete',
  );
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
