/**
 * Health Check Routes
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health        →  liveness: the process is up (no I/O)
 *   GET /api/v1/health/ready  →  readiness: storage answers a trivial query
 *
 * Readiness returns 503 while the database is unreachable so a load balancer
 * stops routing to this instance; liveness stays 200 so it is not restarted
 * for an outage it cannot fix.
 */
import { config } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { IPostRepository } from '@domain/interfaces/IPostRepository';
import { StorageUnavailableError } from '@shared/errors/AppError';
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
});

router.get('/health/ready', async (_req, res) => {
  const repo = container.resolve<IPostRepository>(TOKENS.PostRepository);
  try {
    const latencyMs = await repo.ping();
    res.status(200).json({
      status: 'ok',
      database: { client: config.database.client, latencyMs },
    });
  } catch (err) {
    if (!(err instanceof StorageUnavailableError)) throw err;
    res.status(503).json({
      status: 'unavailable',
      database: { client: config.database.client, message: err.message },
    });
  }
});

export { router as healthRoutes };
