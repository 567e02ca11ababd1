/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps the moment a request enters the pipeline. The catalog controller
 * turns it into `meta.totalTimeMs`, next to the repository's `queryTimeMs`.
 *
 * MUST be registered first so the measurement includes every later
 * middleware.
 */
/// <reference path="../../../shared/express.d.ts" />
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
