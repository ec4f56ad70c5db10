/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http on the shared logger, so request lines and application lines use
 * one format. Readiness probes hit /health every few seconds; they are logged
 * at debug so they do not drown the search traffic.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  customLogLevel: (req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return req.url?.startsWith('/api/v1/health') ? 'debug' : 'info';
  },
});
