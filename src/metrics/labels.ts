/**
 * Label Validation
 *
 * Strategies a metric definition can use to reject values with an unexpected
 * label shape while they are being exported.
 */

import { Errors } from '../errors/factories.js'
import type { LabelShape, Labels, MetricValue } from './types.js'

/**
 * Compare two label maps ignoring key order
 */
export function sameLabels(a: Readonly<Labels>, b: Readonly<Labels>): boolean {
  const aKeys = Object.keys(a)
  if (aKeys.length !== Object.keys(b).length) return false
  return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key])
}

/**
 * Exact label-set matching: every value's labels must equal one of `allowed`.
 *
 * @example
 * ```typescript
 * const validate = strictLabels([{ task_type: 'adhoc' }, { task_type: 'scheduled' }])
 * validate(metricValue(4, { task_type: 'adhoc' })) // ok
 * validate(metricValue(4, { task_type: 'other' })) // throws
 * ```
 */
export function strictLabels(allowed: readonly Labels[]): (value: MetricValue) => MetricValue {
  return (value) => {
    if (!allowed.some((labels) => sameLabels(labels, value.labels))) {
      throw Errors.labelNotAllowed(value.labels)
    }
    return value
  }
}

/**
 * Exact label-name matching: every value's labels must have exactly `names`
 * as keys, with arbitrary values.
 */
export function strictLabelNames(names: readonly string[]): (value: MetricValue) => MetricValue {
  const expected = new Set(names)
  return (value) => {
    const keys = Object.keys(value.labels)
    if (keys.length !== expected.size || !keys.every((key) => expected.has(key))) {
      throw Errors.invalidLabelNames(value.labels, names)
    }
    return value
  }
}

/**
 * Build the validator for a declared label shape
 */
export function labelValidator(shape: LabelShape): (value: MetricValue) => MetricValue {
  return 'exact' in shape ? strictLabels(shape.exact) : strictLabelNames(shape.names)
}
