/**
 * Built-in Collectors Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { collectMetrics } from '../metrics/collection.js'
import { qualifiedName } from '../metrics/definition.js'
import { MemoryStore } from '../store/drivers/memory.js'
import type { MetricRow } from '../store/types.js'
import { createMetricsManager } from '../registry/manager.js'
import { builtinCollectors, memoryUsageMetric, registryStateMetric, UptimeSeconds } from './index.js'

function seedRow(id: number, name: string, enabled: boolean): MetricRow {
  return {
    id,
    component: 'tool_x',
    name,
    enabled,
    config: null,
    timecreated: 1700000000,
    timemodified: 1700000000,
    usermodified: 'seed-user',
  }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('builtinCollectors', () => {
  it('should contribute the built-in metrics', () => {
    const collection = collectMetrics(builtinCollectors(new MemoryStore()))

    expect(Array.from(collection, (d) => qualifiedName(d.component, d.name))).toEqual([
      'metric_registry_registered_metrics',
      'node_process_uptime_seconds',
      'node_process_memory_bytes',
    ])
  })

  it('should export through a manager', async () => {
    const store = new MemoryStore()
    const manager = createMetricsManager({
      store,
      collectors: builtinCollectors(store),
      actor: 'test-user',
    })
    await manager.sync()
    await manager.enable('metric_registry_registered_metrics')

    expect(await manager.export()).toBe(
      [
        '# HELP metric_registry_registered_metrics Number of metrics in the registry by enabled flag',
        '# TYPE metric_registry_registered_metrics gauge',
        'metric_registry_registered_metrics{enabled="true"} 1',
        'metric_registry_registered_metrics{enabled="false"} 2',
      ].join('\n')
    )
  })
})

describe('registryStateMetric', () => {
  it('should count rows by enabled flag', async () => {
    const store = new MemoryStore({
      seed: [seedRow(1, 'a', true), seedRow(2, 'b', true), seedRow(3, 'c', false)],
    })
    const metric = registryStateMetric(store)

    expect(await metric.calculate({})).toEqual([
      { value: 2, labels: { enabled: 'true' } },
      { value: 1, labels: { enabled: 'false' } },
    ])
    expect(metric.type).toBe('gauge')
  })
})

describe('UptimeSeconds', () => {
  it('should derive its name from the class', () => {
    const metric = new UptimeSeconds()
    expect(metric.name).toBe('uptime_seconds')
    expect(metric.type).toBe('counter')
  })

  it('should report whole seconds', () => {
    vi.spyOn(process, 'uptime').mockReturnValue(12.7)
    expect(new UptimeSeconds().calculate()).toEqual({ value: 12, labels: {} })
  })
})

describe('memoryUsageMetric', () => {
  function mockUsage(): void {
    vi.spyOn(process, 'memoryUsage').mockReturnValue({
      rss: 100,
      heapTotal: 80,
      heapUsed: 50,
      external: 5,
      arrayBuffers: 1,
    })
  }

  it('should report the default kinds', async () => {
    mockUsage()
    const config = memoryUsageMetric.defaultConfig?.() ?? {}

    expect(await memoryUsageMetric.calculate(config)).toEqual([
      { value: 100, labels: { kind: 'rss' } },
      { value: 50, labels: { kind: 'heapUsed' } },
    ])
  })

  it('should report the configured kinds', async () => {
    mockUsage()
    expect(await memoryUsageMetric.calculate({ kinds: ['external', 'heapTotal'] })).toEqual([
      { value: 5, labels: { kind: 'external' } },
      { value: 80, labels: { kind: 'heapTotal' } },
    ])
  })

  it('should reject unknown kinds', () => {
    expect(() => memoryUsageMetric.parseConfig?.({ kinds: ['swap'] })).toThrow(/^kinds\.0: /)
  })

  it('should describe its config field', () => {
    expect(memoryUsageMetric.configFields).toEqual([
      { name: 'kinds', type: 'string[]', default: ['rss', 'heapUsed'], label: 'Memory figures to report' },
    ])
  })
})
