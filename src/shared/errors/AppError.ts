/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure reach the HTTP boundary:
 *
 *   1. Operational errors — bad parameters (400), storage unreachable (503).
 *      Expected; the client gets the status and message.
 *   2. Programmer errors — anything else. The client gets a generic 500 and
 *      the details go to the log.
 *
 * `isOperational` lets the error handler tell them apart.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses of Error under every compilation target.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true, options?: ErrorOptions) {
    super(message, options);
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

/** Malformed, out-of-range or missing request parameters. Never retried. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/**
 * The backend could not be reached or a query failed (including timeouts).
 * The driver error is kept as `cause` for the log; it is never sent to clients.
 */
export class StorageUnavailableError extends AppError {
  constructor(operation: string, cause?: unknown) {
    super(`Storage unavailable: ${operation} failed`, 503, true, { cause });
  }
}
