/**
 * Error Codes
 *
 * Central definition of the registry's error codes with both string identifiers
 * and numeric status codes. The numeric codes follow HTTP semantics so a
 * transport layer can forward them unchanged.
 *
 * Status Code Ranges:
 * - 400-499: Caller errors (malformed rows, bad config, unknown metrics)
 * - 500-599: Internal errors (storage inconsistencies)
 */

/**
 * Error code definition with string identifier and numeric status
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'NOT_FOUND') */
  code: string
  /** Numeric status code (e.g., 404) */
  status: number
  /** Default message */
  message: string
}

export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // 4xx - Caller Errors
  // ─────────────────────────────────────────────────────────────

  /** Invalid argument provided (malformed rows, bad environment) */
  INVALID_ARGUMENT: {
    code: 'INVALID_ARGUMENT',
    status: 400,
    message: 'Invalid argument',
  },

  /** Validation failed (metric config did not match its schema) */
  VALIDATION_ERROR: {
    code: 'VALIDATION_ERROR',
    status: 400,
    message: 'Validation failed',
  },

  /** Metric not produced by any collector, or not registered yet */
  NOT_FOUND: {
    code: 'NOT_FOUND',
    status: 404,
    message: 'Not found',
  },

  /** A registry row with the same identity already exists */
  ALREADY_EXISTS: {
    code: 'ALREADY_EXISTS',
    status: 409,
    message: 'Already exists',
  },

  /** Operation needs state the metric does not have (e.g. an id) */
  FAILED_PRECONDITION: {
    code: 'FAILED_PRECONDITION',
    status: 412,
    message: 'Precondition failed',
  },

  /**
   * Metric value does not have the label shape its definition declares
   *
   * Raised while iterating a metric during export.
   */
  UNPROCESSABLE_ENTITY: {
    code: 'UNPROCESSABLE_ENTITY',
    status: 422,
    message: 'Unprocessable entity',
  },

  // ─────────────────────────────────────────────────────────────
  // 5xx - Internal Errors
  // ─────────────────────────────────────────────────────────────

  /** Internal error */
  INTERNAL_ERROR: {
    code: 'INTERNAL_ERROR',
    status: 500,
    message: 'Internal error',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

function isKnownCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isKnownCode(code)) {
    return ErrorCodes[code]
  }

  // Return unknown for unrecognized codes
  return {
    code,
    status: 500,
    message: code,
  }
}

/**
 * Get numeric status for a string code
 */
export function getStatusForCode(code: string): number {
  return getErrorCode(code).status
}

/**
 * Check if status code is a client error (4xx)
 */
export function isClientError(status: number): boolean {
  return status >= 400 && status < 500
}

/**
 * Check if status code is a server error (5xx)
 */
export function isServerError(status: number): boolean {
  return status >= 500 && status < 600
}
