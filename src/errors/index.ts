/**
 * Error Module
 *
 * Error class, pre-built factories, and error code definitions.
 */

export { Errors } from './factories.js'
export { MonitoringError, isMonitoringError } from './monitoring-error.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  getStatusForCode,
  isClientError,
  isServerError,
} from './codes.js'
