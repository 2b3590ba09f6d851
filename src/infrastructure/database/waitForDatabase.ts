import { withRetry, type RetryConfig } from '../../utils/retry.js';
import type { Logger } from '../../utils/logger.js';
import { initializeDatabase, type DatabaseConnection } from './DatabaseConnection.js';

export interface ReadinessOptions {
  attempts: number;
  delayMs: number;
}

/**
 * Startup readiness loop: keeps trying to open the store and answer a ping,
 * giving up after a bounded number of attempts.
 */
export async function waitForDatabase(
  dbPath: string,
  options: ReadinessOptions,
  logger: Logger,
  connect: (dbPath: string) => DatabaseConnection = initializeDatabase
): Promise<DatabaseConnection> {
  const config: RetryConfig = {
    maxAttempts: options.attempts,
    initialDelayMs: options.delayMs,
    maxDelayMs: options.delayMs,
    multiplier: 1,
    timeoutMs: Math.max(options.delayMs, 5000),
  };

  return withRetry(
    async () => {
      const connection = connect(dbPath);
      connection.ping();
      return connection;
    },
    config,
    (log) => {
      if (!log.success) {
        logger.warn(`Waiting for database to become available (attempt ${log.attempt}/${options.attempts}): ${log.error}`);
      }
    }
  );
}
