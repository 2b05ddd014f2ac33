/**
 * Registry State Metric
 *
 * Number of registered metrics, split by enabled flag.
 */

import { defineMetric } from '../metrics/definition.js'
import { metricValue } from '../metrics/value.js'
import type { MetricDefinition } from '../metrics/types.js'
import type { MetricStore } from '../store/types.js'

export function registryStateMetric(store: MetricStore): MetricDefinition {
  return defineMetric({
    component: 'metric_registry',
    name: 'registered_metrics',
    type: 'gauge',
    description: 'Number of metrics in the registry by enabled flag',
    labels: { exact: [{ enabled: 'true' }, { enabled: 'false' }] },
    async calculate() {
      const rows = await store.findAll()
      const enabled = rows.filter((row) => row.enabled).length
      return [
        metricValue(enabled, { enabled: 'true' }),
        metricValue(rows.length - enabled, { enabled: 'false' }),
      ]
    },
  })
}
