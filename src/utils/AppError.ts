/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static badRequest(message: string): AppError {
    return new AppError(message, 400);
  }

  static internal(message = 'Internal server error'): AppError {
    return new AppError(message, 500, false);
  }
}

/**
 * Raised when the invoice snapshot cannot be fetched for a matching run.
 * The matching engine itself never raises it.
 */
export class MatchingFailedError extends AppError {
  constructor(message = 'Failed to match invoices', cause?: unknown) {
    super(message, 500);
    this.cause = cause;
  }
}

export default AppError;
