/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Operational errors (bad request body, unknown route)
 * carry their HTTP status and a message that is safe to show the client.
 * Anything that is not an AppError is treated as a programmer error by the
 * global error handler: logged in full, answered with a generic 500.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses regardless of the compilation target.
 *
 * Pipeline stage failures are NOT thrown as AppErrors; they are Result
 * values mapped by interfaces/http/presenters/analysisResponse.ts.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

