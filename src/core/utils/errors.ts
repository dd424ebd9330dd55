/**
 * Centralized error handling for Groundwork.
 * Every failure that leaves a service carries one of the kinds below so the
 * whole-answer path can raise it and the streaming path can report it.
 */

import logger from './logger.js';

// ============================================================================
// Error kinds
// ============================================================================

export const ERROR_KINDS = [
  'invalid_parameters',
  'embedding_unavailable',
  'index_unavailable',
  'generation_backend_failure',
  'quota_exceeded',
  'not_found',
  'configuration_error',
  'session_cancelled',
  'timeout',
  'internal',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface GroundworkErrorOptions {
  statusCode?: number;
  cause?: unknown;
  context?: Record<string, unknown>;
}

// ============================================================================
// Custom Error Classes
// ============================================================================

/**
 * Base error class for all Groundwork errors
 */
export class GroundworkError extends Error {
  public readonly code: ErrorKind;
  public readonly statusCode: number;
  public readonly cause?: unknown;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorKind = 'internal', options: GroundworkErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = options.statusCode ?? 500;
    this.cause = options.cause;
    this.context = options.context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON-serializable object
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      cause: this.cause === undefined ? undefined : getErrorMessage(this.cause),
    };
  }
}

/**
 * Caller supplied bad input. Never retried.
 */
export class InvalidParametersError extends GroundworkError {
  constructor(message: string, options: GroundworkErrorOptions = {}) {
    super(message, 'invalid_parameters', { ...options, statusCode: 400 });
  }
}

/**
 * The embedding backend failed or timed out after its bounded retry.
 */
export class EmbeddingUnavailableError extends GroundworkError {
  constructor(message: string, options: GroundworkErrorOptions = {}) {
    super(message, 'embedding_unavailable', { ...options, statusCode: 503 });
  }
}

/**
 * The configured vector index cannot reach its backing store.
 */
export class IndexUnavailableError extends GroundworkError {
  constructor(message: string, options: GroundworkErrorOptions = {}) {
    super(message, 'index_unavailable', { ...options, statusCode: 503 });
  }
}

/**
 * A generation backend failed: unreachable, malformed response or timeout.
 * When raised by the fallback chain, `failures` lists every variant tried.
 */
export class GenerationBackendError extends GroundworkError {
  public readonly backend?: string;
  public readonly failures: ReadonlyArray<{ backend: string; message: string }>;

  constructor(
    message: string,
    options: GroundworkErrorOptions & {
      backend?: string;
      failures?: ReadonlyArray<{ backend: string; message: string }>;
    } = {}
  ) {
    super(message, 'generation_backend_failure', { ...options, statusCode: 502 });
    this.backend = options.backend;
    this.failures = options.failures ?? [];
  }
}

export class QuotaExceededError extends GroundworkError {
  constructor(message: string, options: GroundworkErrorOptions = {}) {
    super(message, 'quota_exceeded', { ...options, statusCode: 429 });
  }
}

export class NotFoundError extends GroundworkError {
  constructor(message: string, options: GroundworkErrorOptions = {}) {
    super(message, 'not_found', { ...options, statusCode: 404 });
  }
}

export class ConfigurationError extends GroundworkError {
  constructor(message: string, options: GroundworkErrorOptions = {}) {
    super(message, 'configuration_error', { ...options, statusCode: 500 });
  }
}

/**
 * A session or call was cancelled by its consumer. A normal terminal state,
 * never reported to the consumer as an error.
 */
export class SessionCancelledError extends GroundworkError {
  constructor(message = 'Session cancelled', options: GroundworkErrorOptions = {}) {
    super(message, 'session_cancelled', { ...options, statusCode: 499 });
  }
}

/**
 * Error thrown when an operation times out
 */
export class TimeoutError extends GroundworkError {
  constructor(message: string, options: GroundworkErrorOptions = {}) {
    super(message, 'timeout', { ...options, statusCode: 408 });
  }
}

// ============================================================================
// Error Handling Utilities
// ============================================================================

export function isGroundworkError(error: unknown): error is GroundworkError {
  return error instanceof GroundworkError;
}

/**
 * Convert unknown error to Error object
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  return new Error(getErrorMessage(error));
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }

  return String(error);
}

/**
 * Machine-readable kind of any thrown value
 */
export function errorKind(error: unknown): ErrorKind {
  return isGroundworkError(error) ? error.code : 'internal';
}

/**
 * True when the value is an abort raised by an AbortSignal or our own
 * cancellation error.
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (error instanceof SessionCancelledError) return true;
  if (signal?.aborted) return true;
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Throws SessionCancelledError when the signal has been aborted.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new SessionCancelledError();
  }
}

/**
 * Log error with appropriate context
 */
export function logError(
  error: unknown,
  context?: string,
  additionalData?: Record<string, unknown>
): void {
  const err = toError(error);
  const errorData: Record<string, unknown> = {
    ...additionalData,
    context,
    kind: errorKind(err),
    stack: err.stack,
  };

  if (isGroundworkError(err)) {
    errorData.errorContext = err.context;
  }

  logger.error(errorData, err.message);
}

/**
 * Retry an async operation with exponential backoff
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: {
    maxAttempts?: number;
    delay?: number;
    backoff?: number;
    shouldRetry?: (error: unknown) => boolean;
    onError?: (error: unknown, attempt: number) => void;
  }
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const delay = options?.delay ?? 1000;
  const backoff = options?.backoff ?? 2;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (options?.onError) {
        options.onError(error, attempt);
      }

      if (options?.shouldRetry && !options.shouldRetry(error)) {
        break;
      }

      if (attempt < maxAttempts) {
        const waitTime = delay * Math.pow(backoff, attempt - 1);
        await new Promise(resolve => setTimeout(resolve, waitTime));
      }
    }
  }

  throw lastError;
}

/**
 * Reject with TimeoutError when the promise does not settle within `ms`.
 * The timer is always cleared so it never keeps the process alive.
 */
export function timeout<T>(
  promise: Promise<T>,
  ms: number,
  message = `Operation timed out after ${ms}ms`
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message)), ms);
  });

  return Promise.race([promise, expiry]).finally(() => clearTimeout(timer));
}
