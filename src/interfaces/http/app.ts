/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh app per call: each cluster worker builds its own, and
 * integration tests build one after swapping container registrations.
 *
 * Middleware order:
 *   1. requestTimer  — stamps req.requestStartTime for totalTimeMs.
 *   2. helmet, cors, compression.
 *   3. requestLogger — pino-http, one line per request.
 *   4. Routes, then a JSON 404 for anything they did not match.
 *   5. errorHandler  — last, catches everything above (Express 5 forwards
 *      rejected async handlers here).
 *
 * The side-effect import of '@core/container' registers every binding before
 * the route modules resolve their controllers.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { postRoutes } from '@interfaces/http/routes/postRoutes';
import { NotFoundError } from '@shared/errors/AppError';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(requestLogger);

  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/posts', postRoutes);

  app.use((req, _res, next) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  });

  app.use(errorHandler);

  return app;
}
