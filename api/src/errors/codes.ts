/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the drift comparison service.
 * Every BaseError carries one of these codes; the HTTP layer maps them to status codes.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * HTTP/API Error Codes
 */
export const HttpErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/**
 * Comparison Engine Error Codes
 */
export const ComparisonErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  UNSUPPORTED_ENGINE: 'UNSUPPORTED_ENGINE',
  FETCH_FAILURE: 'FETCH_FAILURE',
} as const;

/**
 * Operation Registry Error Codes
 */
export const RegistryErrorCodes = {
  UNKNOWN_SCOPE: 'UNKNOWN_SCOPE',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
} as const;

/**
 * Snapshot Storage Error Codes
 */
export const StorageErrorCodes = {
  SNAPSHOT_NOT_FOUND: 'SNAPSHOT_NOT_FOUND',
  SNAPSHOT_STORE_ERROR: 'SNAPSHOT_STORE_ERROR',
} as const;

/**
 * External Dashboard API Error Codes
 */
export const DashboardErrorCodes = {
  DASHBOARD_API_ERROR: 'DASHBOARD_API_ERROR',
  DASHBOARD_TIMEOUT: 'DASHBOARD_TIMEOUT',
  DASHBOARD_RATE_LIMITED: 'DASHBOARD_RATE_LIMITED',
} as const;

// ============================================================================
// Combined Error Codes
// ============================================================================

export const ErrorCodes = {
  ...HttpErrorCodes,
  ...ComparisonErrorCodes,
  ...RegistryErrorCodes,
  ...StorageErrorCodes,
  ...DashboardErrorCodes,
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// HTTP Status Mapping
// ============================================================================

export const errorCodeToHttpStatus: Record<ErrorCode, number> = {
  [ErrorCodes.BAD_REQUEST]: 400,
  [ErrorCodes.VALIDATION_ERROR]: 400,
  [ErrorCodes.INVALID_INPUT]: 400,
  [ErrorCodes.UNSUPPORTED_ENGINE]: 400,
  [ErrorCodes.NOT_FOUND]: 404,
  [ErrorCodes.UNKNOWN_SCOPE]: 404,
  [ErrorCodes.UNKNOWN_OPERATION]: 404,
  [ErrorCodes.SNAPSHOT_NOT_FOUND]: 404,
  [ErrorCodes.INTERNAL_ERROR]: 500,
  [ErrorCodes.SNAPSHOT_STORE_ERROR]: 500,
  [ErrorCodes.FETCH_FAILURE]: 502,
  [ErrorCodes.DASHBOARD_API_ERROR]: 502,
  [ErrorCodes.DASHBOARD_RATE_LIMITED]: 503,
  [ErrorCodes.DASHBOARD_TIMEOUT]: 504,
};

/**
 * Get HTTP status code for an error code
 */
export function getHttpStatusForCode(code: string): number {
  return isErrorCode(code) ? errorCodeToHttpStatus[code] : 500;
}

/**
 * Check if a string is a known error code
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(errorCodeToHttpStatus, code);
}
