/**
 * Base Error
 * @module errors/base
 *
 * Every error the drift service raises or returns carries a code from
 * `ErrorCodes`; the HTTP status is derived from that code.
 */

import { type ErrorCode, ErrorCodes, getHttpStatusForCode } from './codes.js';

// ============================================================================
// Types
// ============================================================================

export interface ErrorContext {
  cause?: Error;
  /** Structured fields surfaced in non-production error bodies */
  details?: Record<string, unknown>;
  scope?: string;
  operation?: string;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  statusCode: number;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BaseError
// ============================================================================

export abstract class BaseError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly context: ErrorContext;
  /** False for errors that indicate a bug rather than bad input or a failed dependency */
  public readonly isOperational: boolean;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}, isOperational = true) {
    super(message, context.cause ? { cause: context.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = getHttpStatusForCode(code);
    this.context = context;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SerializedError {
    const details = {
      ...(this.context.scope === undefined ? {} : { scope: this.context.scope }),
      ...(this.context.operation === undefined ? {} : { operation: this.context.operation }),
      ...this.context.details,
    };
    return {
      name: this.name,
      code: this.code,
      statusCode: this.statusCode,
      message: this.message,
      ...(Object.keys(details).length > 0 ? { details } : {}),
    };
  }
}

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}

// ============================================================================
// Wrapping
// ============================================================================

class UnexpectedError extends BaseError {
  constructor(message: string, code: ErrorCode, context: ErrorContext) {
    super(message, code, context, false);
  }
}

/**
 * Convert anything thrown into a BaseError. BaseErrors pass through
 * untouched; everything else becomes a non-operational error.
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = ErrorCodes.INTERNAL_ERROR
): BaseError {
  if (isBaseError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new UnexpectedError(message ?? error.message, code, { cause: error });
  }
  return new UnexpectedError(message ?? String(error), code, { details: { thrown: String(error) } });
}
