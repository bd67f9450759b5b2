/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps req.requestStartTime as the request enters the stack; the analysis
 * controller reports `meta.totalTimeMs` from it. Must be registered first.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
