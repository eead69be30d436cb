import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Source commerce API
  SOURCE_API_BASE_URL: z.string().url().default('https://api.source-commerce.example/v1'),
  SOURCE_API_KEY: z.string().min(1, 'Source API key is required'),
  SOURCE_API_SECRET: z.string().min(1, 'Source API secret is required'),
  SOURCE_REQUESTS_PER_SECOND: z.coerce.number().positive().default(2),
  SOURCE_RETRY_AFTER_DEFAULT_SECONDS: z.coerce.number().positive().default(60),

  // Target commerce API
  TARGET_API_BASE_URL: z.string().url().default('https://target-shop.example/admin/api/2024-01'),
  TARGET_API_TOKEN: z.string().min(1, 'Target API token is required'),
  TARGET_REQUESTS_PER_SECOND: z.coerce.number().positive().default(2),
  TARGET_ADAPTIVE_RATE: booleanFlag.default('true'),
  TARGET_RETRY_AFTER_DEFAULT_SECONDS: z.coerce.number().positive().default(2),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // PostgreSQL
  DATABASE_URL: z.string().min(1, 'Database URL is required'),
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(10),

  // Collection
  COLLECT_PAGE_SIZE: z.coerce.number().int().positive().default(1000),
  COLLECT_PROGRESS_EVERY: z.coerce.number().int().positive().default(100),
  COLLECT_MAX_CONSECUTIVE_FAILURES: z.coerce.number().int().nonnegative().default(10),
  STAGING_LOOKUP_CHUNK: z.coerce.number().int().positive().default(999),

  // Migration
  MIGRATE_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  MIGRATE_BATCH_PAUSE_MS: z.coerce.number().int().nonnegative().default(1000),
  MIGRATION_TAG: z.string().min(1).default('source-migrated'),

  // Worker Configuration
  WORKER_PORT: z.coerce.number().int().positive().default(3001),
  WORKER_LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),

  // Node
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (_env) return _env;

  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.flatten().fieldErrors;
    const messages = Object.entries(formatted)
      .map(([key, errors]) => `  ${key}: ${errors?.join(', ')}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${messages}`);
  }

  _env = result.data;
  return _env;
}

export function getEnv(): Env {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnv() first.');
  }
  return _env;
}

/** Drops the cached environment so the next loadEnv() parses again. */
export function resetEnv(): void {
  _env = null;
}
