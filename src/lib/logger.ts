import pino from 'pino';
import { loadEnv } from '../config/env.js';

let _logger: pino.Logger | null = null;

export function createLogger(): pino.Logger {
  if (_logger) return _logger;

  const env = loadEnv();

  _logger = pino({
    level: env.WORKER_LOG_LEVEL,
    ...(env.NODE_ENV === 'development'
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'commerce-migration-worker',
      env: env.NODE_ENV,
    },
  });

  return _logger;
}

// Library modules log through this; the entrypoint creates the logger first,
// tests get it lazily from their environment.
export function getLogger(): pino.Logger {
  return _logger ?? createLogger();
}
