/**
 * Gateway error utilities.
 *
 * Provides a consistent error type for all public API surfaces and
 * helpers to convert lower-level backend errors into GatewayError
 * instances that callers can reason about.
 */

import type { ZodError } from 'zod';
import type { BatchErrorType } from '../types/batches.js';

/**
 * Gateway error codes surfaced to API consumers.
 */
export type GatewayErrorCode =
  | 'PoolExhausted'
  | 'SessionNotFound'
  | 'BackendUnavailable'
  | 'BackendTimeout'
  | 'BackendRejected'
  | 'BatchNotFound'
  | 'ModelNotFound'
  | 'Canceled'
  | 'InvalidParams'
  | 'InvalidState'
  | 'InternalError';

/**
 * Plain error shape (for JSON responses and log records).
 */
export interface GatewayErrorShape {
  code: GatewayErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Anthropic error envelope returned to HTTP callers.
 */
export interface AnthropicErrorBody {
  type: 'error';
  error: { type: BatchErrorType; message: string };
}

const ANTHROPIC_ERROR_TYPE: Readonly<Record<GatewayErrorCode, BatchErrorType>> = {
  PoolExhausted: 'overloaded_error',
  SessionNotFound: 'not_found_error',
  BackendUnavailable: 'overloaded_error',
  BackendTimeout: 'timeout_error',
  BackendRejected: 'invalid_request_error',
  BatchNotFound: 'not_found_error',
  ModelNotFound: 'not_found_error',
  Canceled: 'api_error',
  InvalidParams: 'invalid_request_error',
  InvalidState: 'invalid_request_error',
  InternalError: 'api_error',
};

const HTTP_STATUS: Readonly<Record<GatewayErrorCode, number>> = {
  PoolExhausted: 529,
  SessionNotFound: 404,
  BackendUnavailable: 503,
  BackendTimeout: 504,
  BackendRejected: 400,
  BatchNotFound: 404,
  ModelNotFound: 404,
  Canceled: 499,
  InvalidParams: 400,
  InvalidState: 409,
  InternalError: 500,
};

/**
 * Error implementation returned by the gateway.
 */
export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: GatewayErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    this.details = details;
  }

  /**
   * HTTP status a front end should answer with.
   */
  public get status(): number {
    return HTTP_STATUS[this.code];
  }

  public get anthropicType(): BatchErrorType {
    return ANTHROPIC_ERROR_TYPE[this.code];
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): GatewayErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }

  public toAnthropicError(): AnthropicErrorBody {
    return {
      type: 'error',
      error: { type: this.anthropicType, message: this.message },
    };
  }
}

/**
 * Map unknown errors into GatewayError instances.
 *
 * @param error - Error thrown by the backend or a collaborator
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toGatewayError(
  error: unknown,
  fallbackCode: GatewayErrorCode = 'InternalError'
): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new GatewayError('Canceled', error.message || 'Operation aborted by caller');
    }

    if (error.name === 'TimeoutError' || /timed? ?out/i.test(error.message)) {
      return new GatewayError('BackendTimeout', error.message);
    }

    return new GatewayError(fallbackCode, error.message, { errorType: error.name });
  }

  return new GatewayError(fallbackCode, typeof error === 'string' ? error : 'Unknown gateway error');
}

/**
 * Convenience helper for cancellation observed at a suspension point.
 */
export function createCanceledError(operation: string, requestId?: string): GatewayError {
  return new GatewayError(
    'Canceled',
    `Operation canceled: ${operation}${requestId ? ` (id: ${requestId})` : ''}`,
    requestId ? { operation, requestId } : { operation }
  );
}

/**
 * Convenience helper to create timeout errors
 */
export function createTimeoutError(
  operation: string,
  timeoutMs: number,
  requestId?: string
): GatewayError {
  const message = `Request timed out after ${timeoutMs}ms: ${operation}${requestId ? ` (id: ${requestId})` : ''}`;
  return new GatewayError('BackendTimeout', message, { operation, timeoutMs, requestId });
}

/**
 * Short `Name: message` description used in log records.
 */
export function describeError(error: unknown): string {
  if (error instanceof GatewayError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Convert Zod validation error to GatewayError
 *
 * @example
 * ```typescript
 * const result = MessagesRequestSchema.safeParse({ model: '' });
 * if (!result.success) {
 *   throw zodErrorToGatewayError(result.error);
 * }
 * // Throws: "Validation error on field 'model': Cannot be empty"
 * ```
 */
export function zodErrorToGatewayError(error: ZodError): GatewayError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'Invalid input'}`;

  return new GatewayError('InvalidParams', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
