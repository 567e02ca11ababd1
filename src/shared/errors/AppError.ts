/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of errors reach the HTTP boundary:
 *
 *   1. Operational errors — expected problems like a non-numeric `limit`
 *      or an unknown route. They carry their HTTP status and a message that
 *      is safe to show the client.
 *
 *   2. Programmer / infrastructure errors — a failed query, a dropped
 *      connection. These become a generic 500 and are logged in full.
 *
 * The global error handler (errorHandler.ts) checks `instanceof AppError`
 * and `isOperational` to decide which response to send.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses whatever the compilation target.
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

