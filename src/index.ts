import { loadEnv } from './config/env.js';
import { createLogger } from './lib/logger.js';
import { createDb, closeDb } from './db/connection.js';
import { startControlServer, stopControlServer } from './control/server.js';
import { createRuntime } from './runtime.js';

async function main() {
  // 1. Load and validate environment
  const env = loadEnv();

  // 2. Initialize logger
  const logger = createLogger();
  logger.info({ source: env.SOURCE_API_BASE_URL, target: env.TARGET_API_BASE_URL }, 'Commerce migration worker starting');

  // 3. Initialize database connection
  const db = createDb();
  logger.info('Database connection initialized');

  // 4. Wire clients, stores and the run registry
  const runtime = await createRuntime(env, db);

  // 5. Start control server
  await startControlServer(runtime, env.WORKER_PORT);
  logger.info({ port: env.WORKER_PORT }, 'Control server started');

  let shuttingDown = false;

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');

    try {
      await stopControlServer();
      logger.info('Control server stopped');

      await runtime.registry.stopAll();
      logger.info('Active runs stopped');

      await closeDb();
      logger.info('Database connections closed');

      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception, shutting down');
    void shutdown('uncaughtException');
  });
}

main().catch((err) => {
  console.error('Fatal startup error:', err);
  process.exit(1);
});
