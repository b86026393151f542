import type { ClassifiedFailure } from './types.js';
import { getErrorMessage } from './utils.js';

export type DispatchErrorCode =
  | 'invalid_identifier'
  | 'queue_full'
  | 'retryable_dispatch_failure'
  | 'fatal_dispatch_failure'
  | 'no_endpoints_available'
  | 'payload_too_large'
  | 'await_timeout'
  | 'startup_check_failed';

export class DispatchError extends Error {
  readonly code: DispatchErrorCode;

  constructor(code: DispatchErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends DispatchError {
  constructor(message: string) {
    super('invalid_identifier', message);
  }
}

export class QueueFullError extends DispatchError {
  constructor(capacity: number) {
    super('queue_full', `queue is at capacity (${capacity} items)`);
  }
}

/** Transient endpoint-level failure: timeout, rate limit, refused connection. */
export class RetryableDispatchFailure extends DispatchError {
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null = null) {
    super('retryable_dispatch_failure', message);
    this.retryAfterMs = retryAfterMs;
  }
}

/** Permanent rejection; the batch is not retried. */
export class FatalDispatchFailure extends DispatchError {
  constructor(message: string, code: DispatchErrorCode = 'fatal_dispatch_failure') {
    super(code, message);
  }
}

export class NoEndpointsAvailableError extends FatalDispatchFailure {
  constructor() {
    super('no endpoints available: every endpoint is quarantined', 'no_endpoints_available');
  }
}

/** The startup operation could not be committed; the daemon does not start serving. */
export class StartupCheckError extends FatalDispatchFailure {
  constructor(message: string) {
    super(`startup check failed: ${message}`, 'startup_check_failed');
  }
}

export class PayloadTooLargeError extends FatalDispatchFailure {
  readonly sizeBytes: number;
  readonly maxBytes: number;

  constructor(sizeBytes: number, maxBytes: number) {
    super(`operation payload is ${sizeBytes} bytes, limit is ${maxBytes}`, 'payload_too_large');
    this.sizeBytes = sizeBytes;
    this.maxBytes = maxBytes;
  }
}

export class AwaitTimeoutError extends DispatchError {
  readonly sequence: number | null;

  constructor(timeoutMs: number, sequence: number | null) {
    super('await_timeout', `timed out after ${timeoutMs}ms, outcome still pending`);
    this.sequence = sequence;
  }
}

/** Maps a thrown value onto the retry policy; unknown errors are transient. */
export function classifyError(error: unknown): ClassifiedFailure {
  if (error instanceof FatalDispatchFailure) {
    return { kind: 'fatal', reason: error.message };
  }
  if (error instanceof RetryableDispatchFailure && error.retryAfterMs !== null) {
    return { kind: 'retryable', reason: error.message, retryAfterMs: error.retryAfterMs };
  }
  return { kind: 'retryable', reason: getErrorMessage(error) };
}
