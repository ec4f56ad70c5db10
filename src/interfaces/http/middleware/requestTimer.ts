/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps the arrival time so the controller can report `meta.totalTimeMs`
 * next to the coordinator's `meta.queryTimeMs`. Registered first.
 */
import '@shared/express';

import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
