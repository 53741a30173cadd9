/**
 * Domain-Specific Error Classes
 * @module errors/domain
 *
 * Errors raised by the comparison engine, the operation registry,
 * the snapshot store and the dashboard client.
 */

import { BaseError, type ErrorContext } from './base.js';
import { ErrorCodes } from './codes.js';

// ============================================================================
// Comparison Errors
// ============================================================================

/**
 * A differ received a root that is neither a map nor a sequence,
 * or a caller passed an argument the service cannot act on.
 */
export class InvalidInputError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCodes.INVALID_INPUT, context);
  }
}

/**
 * The requested comparison method has no registered engine
 */
export class UnsupportedEngineError extends BaseError {
  public readonly method: string;

  constructor(method: string, context: ErrorContext = {}) {
    super(`Unsupported comparison method: ${method}`, ErrorCodes.UNSUPPORTED_ENGINE, {
      ...context,
      details: { ...context.details, method },
    });
    this.method = method;
  }
}

/**
 * Fetching the live snapshot of one entity failed
 */
export class FetchFailureError extends BaseError {
  public readonly entityId: string;

  constructor(entityId: string, message: string, context: ErrorContext = {}) {
    super(message, ErrorCodes.FETCH_FAILURE, {
      ...context,
      details: { ...context.details, entityId },
    });
    this.entityId = entityId;
  }
}

// ============================================================================
// Registry Errors
// ============================================================================

export class UnknownOperationError extends BaseError {
  constructor(scope: string, operation?: string) {
    super(
      operation === undefined
        ? `Unknown scope: ${scope}`
        : `Unknown operation '${operation}' for scope '${scope}'`,
      operation === undefined ? ErrorCodes.UNKNOWN_SCOPE : ErrorCodes.UNKNOWN_OPERATION,
      { scope, operation }
    );
  }
}

// ============================================================================
// Storage Errors
// ============================================================================

export class SnapshotNotFoundError extends BaseError {
  public readonly location: string;

  constructor(location: string, context: ErrorContext = {}) {
    super(`Snapshot not found: ${location}`, ErrorCodes.SNAPSHOT_NOT_FOUND, context);
    this.location = location;
  }
}

export class SnapshotStoreError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCodes.SNAPSHOT_STORE_ERROR, context);
  }
}

// ============================================================================
// Dashboard API Errors
// ============================================================================

/**
 * Non-2xx response (or transport failure) from the dashboard API
 */
export class DashboardApiError extends BaseError {
  public readonly httpStatus: number | undefined;

  constructor(message: string, httpStatus?: number, context: ErrorContext = {}) {
    super(
      message,
      httpStatus === 429 ? ErrorCodes.DASHBOARD_RATE_LIMITED : ErrorCodes.DASHBOARD_API_ERROR,
      { ...context, details: { ...context.details, httpStatus } }
    );
    this.httpStatus = httpStatus;
  }
}

export class DashboardTimeoutError extends BaseError {
  constructor(url: string, timeoutMs: number) {
    super(`Dashboard request timed out after ${timeoutMs}ms`, ErrorCodes.DASHBOARD_TIMEOUT, {
      details: { url, timeoutMs },
    });
  }
}
