/**
 * Metric Values
 */

import type { Labels, MetricValue } from './types.js'

/**
 * Create an immutable metric value.
 *
 * @example
 * ```typescript
 * metricValue(12)
 * metricValue(3, { visible: 'false' })
 * ```
 */
export function metricValue(value: number, labels: Labels = {}): MetricValue {
  return Object.freeze({
    value,
    labels: Object.freeze({ ...labels }),
  })
}

/**
 * Check whether `calculate` returned a single value rather than a collection
 */
export function isMetricValue(candidate: unknown): candidate is MetricValue {
  return (
    candidate !== null &&
    typeof candidate === 'object' &&
    'value' in candidate &&
    'labels' in candidate &&
    typeof candidate.value === 'number' &&
    candidate.labels !== null &&
    typeof candidate.labels === 'object'
  )
}
