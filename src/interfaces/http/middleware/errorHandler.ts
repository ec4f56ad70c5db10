/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Last in the chain; Express 5 forwards rejected async handlers here.
 *
 *   - ValidationError (400): logged at warn, message returned as-is.
 *   - StorageUnavailableError (503): logged at error with the driver error
 *     (`cause`), generic message returned, nothing retried.
 *   - Other AppError: its status and message.
 *   - Client errors raised by Express itself (e.g. a path parameter that is
 *     not valid percent-encoding) carry a 4xx `status`; that status and the
 *     message are passed through.
 *   - Anything else: logged, generic 500.
 *
 * Express recognises an error handler by its four parameters.
 */
import { logger } from '@core/logger';
import { AppError, StorageUnavailableError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof StorageUnavailableError) {
    logger.error({ err, cause: err.cause, path: req.path }, 'Storage unavailable');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  if (err instanceof AppError) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    logger.warn({ statusCode: status, message: err.message }, 'Rejected request');
    res.status(status).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}

function clientErrorStatus(err: Error): number | undefined {
  const status: unknown = 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}
