/**
 * Database Connection Pool — Singleton
 * Layer: Infrastructure
 * Pattern: Singleton
 *
 * One knex instance per process. Under the cluster entry point every worker
 * builds its own pool. `destroyDbConnection()` runs on SIGTERM/SIGINT and in
 * test teardown.
 */
import knex, { Knex } from 'knex';
import { config } from '@core/config';
import { logger } from '@core/logger';

import { buildKnexConfig } from './knexConfig';

let instance: Knex | null = null;

export function getDbConnection(): Knex {
  if (!instance) {
    instance = knex(buildKnexConfig());

    logger.info(
      {
        client: config.database.client,
        target:
          config.database.client === 'sqlite'
            ? config.database.sqliteFilename
            : describePostgresTarget(config.database.url),
      },
      'Database connection pool initialized',
    );
  }

  return instance;
}

/** Gracefully tears down the pool (used on SIGTERM / test cleanup). */
export async function destroyDbConnection(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = null;
    logger.info('Database connection pool destroyed');
  }
}

/** host:port/db without credentials. */
export function describePostgresTarget(url: string): string {
  try {
    const u = new URL(url);
    return `${u.hostname}:${u.port || '5432'}${u.pathname}`;
  } catch {
    return '(unparsable DATABASE_URL)';
  }
}
