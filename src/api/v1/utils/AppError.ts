export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string = "Something went wrong", statusCode: number = 500) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export type FieldErrors = Record<string, string>;

/** Client-correctable input problem, one message per offending field. */
export class ValidationError extends AppError {
  errors: FieldErrors;

  constructor(errors: FieldErrors, message: string = "Validation failed") {
    super(message, 400);
    this.errors = errors;
  }

  static forField(field: string, message: string) {
    return new ValidationError({ [field]: message });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = "Resource not found") {
    super(message, 404);
  }
}

/** A workflow transition requested from a state that does not allow it. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * Internal ledger failure: a row missing mid-transaction or a lost race.
 * The whole atomic unit was rolled back and may be retried.
 */
export class ConsistencyError extends AppError {
  constructor(message: string = "Inventory ledger is busy, please retry") {
    super(message, 503);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = "Authentication required") {
    super(message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = "Access denied. Insufficient permissions") {
    super(message, 403);
  }
}
