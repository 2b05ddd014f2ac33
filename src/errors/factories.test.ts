/**
 * Error Factories Tests
 */

import { describe, it, expect } from 'vitest'
import { Errors } from './factories.js'
import {
  ErrorCodes,
  getErrorCode,
  getStatusForCode,
  isClientError,
  isServerError,
} from './codes.js'
import { MonitoringError, isMonitoringError } from './monitoring-error.js'

describe('ErrorCodes', () => {
  it('should have consistent code and key', () => {
    for (const [key, def] of Object.entries(ErrorCodes)) {
      expect(def.code).toBe(key)
    }
  })

  it('should map codes to statuses', () => {
    expect(getStatusForCode('NOT_FOUND')).toBe(404)
    expect(getStatusForCode('ALREADY_EXISTS')).toBe(409)
    expect(getStatusForCode('UNPROCESSABLE_ENTITY')).toBe(422)
    expect(getStatusForCode('INTERNAL_ERROR')).toBe(500)
  })

  it('should return unknown definition for unrecognized codes', () => {
    const def = getErrorCode('CUSTOM_CODE')
    expect(def).toEqual({ code: 'CUSTOM_CODE', status: 500, message: 'CUSTOM_CODE' })
  })

  it('should only define codes the registry raises', () => {
    expect(Object.keys(ErrorCodes)).not.toContain('UNAVAILABLE')
    expect(getStatusForCode('UNAVAILABLE')).toBe(500)
  })

  it('should classify status ranges', () => {
    expect(isClientError(404)).toBe(true)
    expect(isClientError(500)).toBe(false)
    expect(isServerError(503)).toBe(true)
    expect(isServerError(422)).toBe(false)
  })
})

describe('Errors', () => {
  it('notFound should include resource and id', () => {
    const error = Errors.notFound('Metric', 'tool_monitoring_foo')
    expect(error).toBeInstanceOf(MonitoringError)
    expect(error.code).toBe('NOT_FOUND')
    expect(error.status).toBe(404)
    expect(error.message).toBe("Metric 'tool_monitoring_foo' not found")
    expect(error.details).toEqual({ resource: 'Metric', id: 'tool_monitoring_foo' })
  })

  it('notFound should work without id', () => {
    expect(Errors.notFound('Metric').message).toBe('Metric not found')
  })

  it('malformedRow should name the field', () => {
    const error = Errors.malformedRow('component')
    expect(error.code).toBe('INVALID_ARGUMENT')
    expect(error.message).toBe('Cannot instantiate metric: `component` is required')
  })

  it('labelNotAllowed should serialize the label map', () => {
    const error = Errors.labelNotAllowed({ task_type: 'other' })
    expect(error.status).toBe(422)
    expect(error.message).toBe('Label not allowed: {"task_type":"other"}')
  })

  it('invalidLabelNames should carry the expected names', () => {
    const error = Errors.invalidLabelNames({ a: '1' }, ['b'])
    expect(error.message).toBe('Invalid label names: {"a":"1"}')
    expect(error.details).toEqual({ labels: { a: '1' }, expected: ['b'] })
  })

  it('notPersisted should be a precondition failure', () => {
    const error = Errors.notPersisted('tool_x_foo')
    expect(error.status).toBe(412)
    expect(error.message).toBe("Cannot update metric 'tool_x_foo' without `id`")
  })

  it('internal should fall back to a default message', () => {
    expect(Errors.internal().message).toBe('An internal error occurred')
  })
})

describe('MonitoringError', () => {
  it('should serialize to JSON without undefined details', () => {
    const error = new MonitoringError('NOT_FOUND', 'gone')
    expect(error.toJSON()).toEqual({ code: 'NOT_FOUND', status: 404, message: 'gone' })
  })

  it('should honor an explicit status', () => {
    const error = new MonitoringError('INTERNAL_ERROR', 'down', { retry: true }, 503)
    expect(error.status).toBe(503)
    expect(error.toJSON().details).toEqual({ retry: true })
  })

  it('isMonitoringError should narrow', () => {
    expect(isMonitoringError(Errors.internal())).toBe(true)
    expect(isMonitoringError(new Error('plain'))).toBe(false)
  })
})
