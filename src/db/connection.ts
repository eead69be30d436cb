import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { getEnv } from '../config/env.js';
import { getLogger } from '../lib/logger.js';
import * as schema from './schema/index.js';

const { Pool } = pg;

let _pool: pg.Pool | null = null;
let _db: Database | null = null;

export function buildDb(pool: pg.Pool) {
  return drizzle(pool, { schema, logger: false });
}

export type Database = ReturnType<typeof buildDb>;

export function createDb(): Database {
  if (_db) return _db;

  const env = getEnv();
  const logger = getLogger();

  _pool = new Pool({
    connectionString: env.DATABASE_URL,
    max: env.DATABASE_POOL_SIZE,
    // Staged rows can always be collected again from the source API.
    options: '-c synchronous_commit=off',
  });

  _pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database pool error');
  });

  _db = buildDb(_pool);

  logger.info('Database connection pool created');
  return _db;
}

export async function closeDb(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
    _db = null;
    getLogger().info('Database connection pool closed');
  }
}
