/**
 * Config Codec
 *
 * Serialized form of a metric configuration as stored in the registry row.
 */

import { Errors } from '../errors/factories.js'
import type { MetricConfig } from '../metrics/types.js'

function isPlainObject(value: unknown): value is MetricConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Serialize a config object for storage
 */
export function serializeConfig(config: MetricConfig): string {
  return JSON.stringify(config)
}

/**
 * Decode a stored config. Anything but a JSON object is rejected.
 *
 * @example
 * deserializeConfig('{"windows":[300,3600]}') // { windows: [300, 3600] }
 * deserializeConfig('[1,2]')                  // throws INVALID_ARGUMENT
 */
export function deserializeConfig(raw: string): MetricConfig {
  let decoded: unknown
  try {
    decoded = JSON.parse(raw)
  } catch (error) {
    throw Errors.malformedConfig(error instanceof Error ? error.message : String(error))
  }
  if (!isPlainObject(decoded)) {
    throw Errors.malformedConfig(`expected an object, got ${describe(decoded)}`)
  }
  return decoded
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}
