/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 *   1. Operational errors — expected outcomes such as "bank not found" or
 *      "name is required". They carry the HTTP status the adapters answer
 *      with (404, 400, ...).
 *   2. Programmer errors — anything else. The error handler answers 500 and
 *      logs the details without sending them to the client.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses of Error regardless of the compilation target; the
 * HTML adapter relies on `err instanceof ValidationError` to turn a failed
 * form into a flash + redirect.
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
