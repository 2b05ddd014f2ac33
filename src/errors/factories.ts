/**
 * Error Factories
 *
 * Pre-built error helpers for the failure modes of the registry.
 * Each factory creates a MonitoringError with both string code and numeric status.
 */

import { MonitoringError } from './monitoring-error.js'
import type { Labels } from '../metrics/types.js'

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.notFound('Metric', 'tool_monitoring_users_online')
 * // Creates: { code: 'NOT_FOUND', status: 404, message: "Metric 'tool_monitoring_users_online' not found" }
 *
 * throw Errors.labelNotAllowed({ task_type: 'other' })
 * // Creates: { code: 'UNPROCESSABLE_ENTITY', status: 422, message: 'Label not allowed: {"task_type":"other"}' }
 * ```
 */
export const Errors = {
  /**
   * Resource not found
   * @param resource - Name of the resource (e.g., 'Metric')
   * @param id - Optional resource identifier
   */
  notFound(resource: string, id?: string | number): MonitoringError {
    const message = id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`
    return new MonitoringError('NOT_FOUND', message, { resource, id })
  },

  /**
   * Validation error
   * @param field - Field name that failed validation
   * @param reason - Why validation failed
   * @param value - Optional offending value
   */
  validation(field: string, reason: string, value?: unknown): MonitoringError {
    return new MonitoringError('VALIDATION_ERROR', `${field}: ${reason}`, {
      field,
      reason,
      value,
    })
  },

  /**
   * A persisted registry row lacks a field needed to rebuild the metric
   * @param field - Missing or mistyped field
   */
  malformedRow(field: string, reason = 'is required'): MonitoringError {
    return new MonitoringError(
      'INVALID_ARGUMENT',
      `Cannot instantiate metric: \`${field}\` ${reason}`,
      { field, reason }
    )
  },

  /**
   * A config string is not a serialized JSON object
   * @param reason - What was wrong with it
   */
  malformedConfig(reason: string, value?: unknown): MonitoringError {
    return new MonitoringError(
      'INVALID_ARGUMENT',
      `The provided \`config\` is not a valid JSON object: ${reason}`,
      { reason, value }
    )
  },

  /**
   * Value carries a label set the definition does not allow
   */
  labelNotAllowed(labels: Labels): MonitoringError {
    return new MonitoringError(
      'UNPROCESSABLE_ENTITY',
      `Label not allowed: ${JSON.stringify(labels)}`,
      { labels }
    )
  },

  /**
   * Value's label names differ from the declared set
   */
  invalidLabelNames(labels: Labels, expected: readonly string[]): MonitoringError {
    return new MonitoringError(
      'UNPROCESSABLE_ENTITY',
      `Invalid label names: ${JSON.stringify(labels)}`,
      { labels, expected }
    )
  },

  /**
   * Storage already holds a row with this identity
   */
  alreadyExists(resource: string, id: string): MonitoringError {
    return new MonitoringError('ALREADY_EXISTS', `${resource} '${id}' already exists`, {
      resource,
      id,
    })
  },

  /**
   * Mutation requested on a metric that has no registry row yet
   */
  notPersisted(qualifiedName: string): MonitoringError {
    return new MonitoringError(
      'FAILED_PRECONDITION',
      `Cannot update metric '${qualifiedName}' without \`id\``,
      { qualifiedName }
    )
  },

  /**
   * Internal error
   * @param message - Error message
   * @param details - Optional additional details
   */
  internal(message?: string, details?: unknown): MonitoringError {
    return new MonitoringError(
      'INTERNAL_ERROR',
      message || 'An internal error occurred',
      details
    )
  },
}
