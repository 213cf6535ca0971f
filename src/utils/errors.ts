/**
 * Error taxonomy for the queue. Every error carries a stable `code` that the
 * command layer and the HTTP server map onto results and status codes.
 */

export type QueueErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'RETRYABLE_EXECUTION_ERROR'
  | 'FATAL_EXECUTION_ERROR'
  | 'ATTEMPT_TIMEOUT'
  | 'QUEUE_CLOSED';

export class QueueError extends Error {
  public readonly code: QueueErrorCode;
  public readonly statusCode: number;

  constructor(message: string, code: QueueErrorCode, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export interface ValidationDetail {
  field: string;
  message: string;
  value?: unknown;
}

export class ValidationError extends QueueError {
  public readonly isValidationError = true;
  public readonly validationDetails: ValidationDetail[];

  constructor(message: string, details: ValidationDetail[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
    this.validationDetails = details;
  }
}

export class NotFoundError extends QueueError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

export class QueueClosedError extends QueueError {
  constructor(message = 'Queue is shut down and no longer accepts tasks') {
    super(message, 'QUEUE_CLOSED', 503);
  }
}

/**
 * Thrown by executors for transient failures (network, registry hiccups).
 */
export class RetryableExecutionError extends QueueError {
  constructor(message: string, code: QueueErrorCode = 'RETRYABLE_EXECUTION_ERROR') {
    super(message, code, 500);
  }
}

/**
 * Thrown by executors for failures that no retry can fix.
 */
export class FatalExecutionError extends QueueError {
  constructor(message: string) {
    super(message, 'FATAL_EXECUTION_ERROR', 500);
  }
}

export class AttemptTimeoutError extends RetryableExecutionError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`, 'ATTEMPT_TIMEOUT');
    this.timeoutMs = timeoutMs;
  }
}

export function isQueueError(error: unknown): error is QueueError {
  return error instanceof QueueError;
}

/**
 * HTTP status for an arbitrary thrown value
 */
export function statusCodeFor(error: unknown): number {
  return isQueueError(error) ? error.statusCode : 500;
}
