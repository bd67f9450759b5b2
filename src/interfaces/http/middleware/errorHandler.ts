/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Last in the chain. Express 5 forwards rejected promises from async
 * handlers here, so controllers never wrap their own try/catch.
 *
 *   - AppError (operational): warn log, the error's status and message.
 *   - Unparseable JSON body (from express.json()): 400.
 *   - Anything else: error log, generic 500, no internals in the response.
 *
 * Four parameters are what mark this as an error handler to Express.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  if ('type' in err && err.type === 'entity.parse.failed') {
    logger.warn({ message: err.message }, 'Malformed JSON body');
    res.status(400).json({
      status: 'error',
      message: 'Request body is not valid JSON',
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
