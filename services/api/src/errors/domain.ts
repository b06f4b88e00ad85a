import { HttpError } from './HttpError.js';

/**
 * An externally supplied identifier could not be decoded. Distinct from "not found".
 */
export class InvalidIdError extends HttpError {
  readonly field: string;

  constructor(field: string) {
    super(400, `Invalid ${field}`, { code: 'INVALID_ID' });
    this.name = 'InvalidIdError';
    this.field = field;
  }
}

/**
 * Caller violated an operation's input contract.
 */
export class ArgumentError extends HttpError {
  constructor(message: string) {
    super(400, message, { code: 'ARGUMENT_ERROR' });
    this.name = 'ArgumentError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message, { code: 'NOT_FOUND' });
    this.name = 'NotFoundError';
  }
}

/**
 * The request is well-formed but the current state forbids it.
 */
export class InvalidOperationError extends HttpError {
  constructor(message: string) {
    super(409, message, { code: 'INVALID_OPERATION' });
    this.name = 'InvalidOperationError';
  }
}

/**
 * The per-location lock could not be acquired in time. Transient; clients
 * should retry with backoff.
 */
export class LockTimeoutError extends HttpError {
  readonly locationId: string;
  readonly retryable = true;

  constructor(locationId: string, timeoutMs: number, opts?: { cause?: unknown }) {
    super(503, `Location is busy; lock not acquired within ${timeoutMs}ms`, {
      code: 'LOCATION_BUSY',
      cause: opts?.cause,
    });
    this.name = 'LockTimeoutError';
    this.locationId = locationId;
  }
}

/**
 * No unused security code could be found for the day.
 */
export class ExhaustedKeyspaceError extends HttpError {
  constructor(issueDate: string, attempts: number) {
    super(500, `No unused security code available for ${issueDate} after ${attempts} attempts`, {
      code: 'EXHAUSTED_KEYSPACE',
    });
    this.name = 'ExhaustedKeyspaceError';
  }
}
