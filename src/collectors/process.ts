/**
 * Process Metrics
 *
 * Uptime and memory usage of the running Node.js process.
 */

import { z } from 'zod'
import { BaseMetric, defineMetric } from '../metrics/definition.js'
import { metricValue } from '../metrics/value.js'
import type { CalculateResult } from '../metrics/types.js'

/**
 * Seconds since the process started (`node_process_uptime_seconds`)
 */
export class UptimeSeconds extends BaseMetric {
  readonly component = 'node_process'
  readonly type = 'counter'
  readonly description = 'Seconds since the process started'

  calculate(): CalculateResult {
    return metricValue(Math.floor(process.uptime()))
  }
}

export const MEMORY_KINDS = ['rss', 'heapTotal', 'heapUsed', 'external', 'arrayBuffers'] as const

export type MemoryKind = (typeof MEMORY_KINDS)[number]

const memoryConfigSchema = z.object({
  kinds: z.array(z.enum(MEMORY_KINDS)).min(1),
})

export type MemoryUsageConfig = z.infer<typeof memoryConfigSchema>

/**
 * Memory figures of `process.memoryUsage()` in bytes, one value per
 * configured kind
 */
export const memoryUsageMetric = defineMetric<MemoryUsageConfig>({
  component: 'node_process',
  name: 'memory_bytes',
  type: 'gauge',
  description: 'Memory used by the process in bytes',
  labels: { names: ['kind'] },
  config: {
    schema: memoryConfigSchema,
    defaults: { kinds: ['rss', 'heapUsed'] },
    fields: [
      {
        name: 'kinds',
        type: 'string[]',
        default: ['rss', 'heapUsed'],
        label: 'Memory figures to report',
      },
    ],
  },
  calculate({ kinds }) {
    const usage = process.memoryUsage()
    return kinds.map((kind) => metricValue(usage[kind], { kind }))
  },
})
