import { validationErrorType } from 'App/types/errorType';

export class CustomError extends Error {
  public code: string;
  public statusCode: number;
  public details?: validationErrorType[];

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: validationErrorType[],
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
  }
}

export class NotFoundError extends CustomError {
  constructor(message: string = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ValidationError extends CustomError {
  constructor(
    message: string = 'Validation error',
    details?: validationErrorType[],
  ) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Raised while folding a snapshot into the rolling series.
 * The poller treats any subclass as a failed cycle.
 */
export class AggregationError extends CustomError {
  constructor(message: string, code: string = 'AGGREGATION_ERROR') {
    super(message, code, 422);
  }
}

/** A rate update was attempted with a zero elapsed interval. */
export class DivisionByZeroError extends AggregationError {
  constructor(message: string = 'division by zero') {
    super(message, 'DIVISION_BY_ZERO');
  }
}

/** A required field is absent from an upstream snapshot. */
export class MissingFieldError extends AggregationError {
  public readonly field: string;

  constructor(field: string) {
    super(`missing ${field}`, 'MISSING_FIELD');
    this.field = field;
  }
}

/** Transport failure, non-2xx status or undecodable body from the polled endpoint. */
export class UpstreamError extends CustomError {
  constructor(message: string = 'Upstream request failed') {
    super(message, 'UPSTREAM_ERROR', 502);
  }
}

export class PollerFatalError extends CustomError {
  constructor(message: string, cause?: unknown) {
    super(message, 'POLLER_FATAL', 500);
    this.cause = cause;
  }
}
