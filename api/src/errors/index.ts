/**
 * Errors Module Exports
 * @module errors
 */

export {
  HttpErrorCodes,
  ComparisonErrorCodes,
  RegistryErrorCodes,
  StorageErrorCodes,
  DashboardErrorCodes,
  ErrorCodes,
  errorCodeToHttpStatus,
  getHttpStatusForCode,
  isErrorCode,
} from './codes.js';
export type { ErrorCode } from './codes.js';

export {
  BaseError,
  isBaseError,
  getErrorMessage,
  wrapError,
} from './base.js';
export type { ErrorContext, SerializedError } from './base.js';

export {
  InvalidInputError,
  UnsupportedEngineError,
  FetchFailureError,
  UnknownOperationError,
  SnapshotNotFoundError,
  SnapshotStoreError,
  DashboardApiError,
  DashboardTimeoutError,
} from './domain.js';
