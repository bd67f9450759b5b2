/**
 * Request Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * `validate(schema, source)` returns a middleware that parses `req[source]`
 * with a Zod schema before the controller runs:
 *
 *   router.post('/analyze', validate(analyzeBodySchema, 'body'), controller.analyze);
 *
 * On success `req[source]` is replaced by the parsed data. On failure a
 * ValidationError (400) carries the issue messages to the error handler and
 * the controller is never reached. Express 5 exposes `req.query` as a
 * getter, so only body and params can be replaced.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod/v4';

export function validate<T extends z.ZodType>(schema: T, source: 'body' | 'params') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      const messages = result.error.issues.map((issue) => issue.message).join('; ');
      throw new ValidationError(messages);
    }

    (req as unknown as Record<string, unknown>)[source] = result.data;
    next();
  };
}
