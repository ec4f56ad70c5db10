/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point
 *
 * The primary process forks WEB_CONCURRENCY workers (default: one per CPU)
 * and replaces any that die. Each worker runs its own Express app and its
 * own knex pool; with DB_CLIENT=sqlite every worker opens the same database
 * file read-mostly, with DB_CLIENT=postgres each holds up to DB_POOL_MAX
 * connections.
 *
 * On SIGTERM/SIGINT a worker stops accepting connections, lets in-flight
 * requests finish, destroys its pool and exits 0.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers, dbClient: config.database.client },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker died — restarting');
    cluster.fork();
  });
} else {
  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      destroyDbConnection()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
