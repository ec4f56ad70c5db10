/**
 * Storage call guard
 * Layer: Infrastructure
 *
 * Every repository/strategy query goes through `guardStorage` so that any
 * driver, pool or timeout failure surfaces as StorageUnavailableError, and
 * carries `QUERY_TIMEOUT` so an abandoned request cannot hold a connection
 * forever. Only PostgreSQL can cancel a running statement; on SQLite the
 * caller is released and the statement finishes on its own.
 */
import { config } from '@core/config';
import type { Logger } from '@core/logger';
import { AppError, StorageUnavailableError } from '@shared/errors/AppError';

export const QUERY_TIMEOUT = {
  ms: config.database.queryTimeoutMs,
  options: { cancel: config.database.client === 'postgres' },
} as const;

export async function guardStorage<T>(
  operation: string,
  log: Logger,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof AppError) throw err;
    log.error({ err, operation }, 'Storage query failed');
    throw new StorageUnavailableError(operation, err);
  }
}
