/**
 * Catch-all for unmatched routes. Registered after every router and before
 * the error handler, which turns the NotFoundError into a 404 envelope.
 */
import { NotFoundError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function notFound(req: Request, _res: Response, _next: NextFunction): void {
  throw new NotFoundError('Route', `${req.method} ${req.path}`);
}
