/**
 * Monitoring Error
 */

import { getStatusForCode } from './codes.js'

/**
 * Error raised by the registry, the store drivers and metric iteration.
 *
 * Carries a string code and an HTTP-compatible status so the transport that
 * exposes the registry can map it without inspecting messages.
 */
export class MonitoringError extends Error {
  /**
   * Numeric status code (HTTP-compatible)
   *
   * - 400-499: Caller errors
   * - 500-599: Internal errors
   */
  public readonly status: number

  constructor(
    /** String error code (e.g., 'NOT_FOUND', 'VALIDATION_ERROR') */
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    /** Optional explicit status override */
    status?: number
  ) {
    super(message)
    this.name = 'MonitoringError'
    this.status = status ?? getStatusForCode(code)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; status: number; message: string; details?: unknown } {
    return {
      code: this.code,
      status: this.status,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

export function isMonitoringError(error: unknown): error is MonitoringError {
  return error instanceof MonitoringError
}
