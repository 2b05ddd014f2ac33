/**
 * Built-in Collectors
 */

import type { MetricCollector } from '../metrics/collection.js'
import type { MetricStore } from '../store/types.js'
import { memoryUsageMetric, UptimeSeconds } from './process.js'
import { registryStateMetric } from './registry-state.js'

export { registryStateMetric } from './registry-state.js'
export { UptimeSeconds, memoryUsageMetric, MEMORY_KINDS } from './process.js'
export type { MemoryKind, MemoryUsageConfig } from './process.js'

/**
 * Collectors contributing the built-in metrics
 */
export function builtinCollectors(store: MetricStore): MetricCollector[] {
  return [
    (collection) => collection.add(registryStateMetric(store)),
    (collection) => {
      collection.add(new UptimeSeconds())
      collection.add(memoryUsageMetric)
    },
  ]
}
