/**
 * Registry Reconciliation Tests
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { MetricCollection } from '../metrics/collection.js'
import { defineMetric } from '../metrics/definition.js'
import { metricValue } from '../metrics/value.js'
import { MemoryStore } from '../store/drivers/memory.js'
import type { MetricRow, NewMetricRow } from '../store/types.js'
import type { MetricDefinition } from '../metrics/types.js'
import type { RegistryContext } from './registered-metric.js'
import { syncMetrics } from './sync.js'

const NOW = 1700000100

function simple(name: string, component = 'tool_x'): MetricDefinition {
  return defineMetric({
    component,
    name,
    type: 'gauge',
    description: name,
    calculate: () => metricValue(1),
  })
}

const configurable = defineMetric<{ limit: number }>({
  component: 'tool_x',
  name: 'limited',
  type: 'gauge',
  description: 'Limited',
  config: { schema: z.object({ limit: z.number() }), defaults: { limit: 10 } },
  calculate: ({ limit }) => metricValue(limit),
})

function collectionOf(...definitions: MetricDefinition[]): MetricCollection {
  const collection = new MetricCollection()
  for (const definition of definitions) collection.add(definition)
  return collection
}

function seedRow(id: number, name: string, overrides: Partial<MetricRow> = {}): MetricRow {
  return {
    id,
    component: 'tool_x',
    name,
    enabled: false,
    config: null,
    timecreated: 1700000000,
    timemodified: 1700000000,
    usermodified: 'seed-user',
    ...overrides,
  }
}

function contextFor(store: MemoryStore): RegistryContext {
  return { store, actor: 'test-user', clock: () => NOW }
}

async function storedNames(store: MemoryStore): Promise<string[]> {
  return (await store.findAll()).map((row) => `${row.component}_${row.name}`).sort()
}

describe('syncMetrics', () => {
  describe('with existing rows', () => {
    function setup(): MemoryStore {
      return new MemoryStore({
        seed: [
          seedRow(1, 'foo', { enabled: true, config: '{"a":1}', usermodified: 'admin' }),
          seedRow(2, 'bar'),
        ],
      })
    }

    const collection = collectionOf(simple('foo'), simple('baz'), simple('qux'))

    it('should keep matched state, create new rows and delete orphans', async () => {
      const store = setup()
      const result = await syncMetrics(collection, contextFor(store), { delete: true })

      expect(Array.from(result.metrics.keys())).toEqual(['tool_x_foo', 'tool_x_baz', 'tool_x_qux'])
      expect(result.created).toEqual(['tool_x_baz', 'tool_x_qux'])
      expect(result.deleted).toEqual(['tool_x_bar'])
      expect(result.diagnostics).toEqual([])

      const foo = result.metrics.get('tool_x_foo')
      expect(foo?.enabled).toBe(true)
      expect(foo?.rawConfig).toBe('{"a":1}')
      expect(foo?.usermodified).toBe('admin')
      expect(foo?.id).toBe(1)

      const baz = result.metrics.get('tool_x_baz')
      expect(baz?.id).toBe(3)
      expect(baz?.enabled).toBe(false)
      expect(baz?.timecreated).toBe(NOW)
      expect(baz?.usermodified).toBe('test-user')
      expect(result.metrics.get('tool_x_qux')?.id).toBe(4)

      expect(await storedNames(store)).toEqual(['tool_x_baz', 'tool_x_foo', 'tool_x_qux'])
    })

    it('should insert individually below the bulk threshold', async () => {
      const store = setup()
      await syncMetrics(collection, contextFor(store), { delete: true })

      // findAll + (delete + two inserts)
      expect(store.stats()).toMatchObject({ reads: 1, writes: 3, commits: 1 })
    })

    it('should leave orphans alone unless asked to delete', async () => {
      const store = setup()
      const result = await syncMetrics(collection, contextFor(store))

      expect(result.deleted).toEqual([])
      expect(result.metrics.has('tool_x_bar')).toBe(false)
      expect(await storedNames(store)).toEqual(['tool_x_bar', 'tool_x_baz', 'tool_x_foo', 'tool_x_qux'])
    })
  })

  it('should register a duplicated name once and report it once', async () => {
    const store = new MemoryStore()
    const first = simple('foo')
    const result = await syncMetrics(
      collectionOf(first, simple('foo'), simple('foo')),
      contextFor(store)
    )

    expect(Array.from(result.metrics.keys())).toEqual(['tool_x_foo'])
    expect(result.metrics.get('tool_x_foo')?.definition).toBe(first)
    expect(result.diagnostics).toEqual([
      {
        code: 'DUPLICATE_METRIC',
        qualifiedName: 'tool_x_foo',
        message: 'Collected more than one metric with the qualified name tool_x_foo',
      },
    ])
    expect(await storedNames(store)).toEqual(['tool_x_foo'])
  })

  it('should store the default config of new configurable metrics', async () => {
    const store = new MemoryStore()
    await syncMetrics(collectionOf(configurable), contextFor(store))

    const [row] = await store.findAll()
    expect(row).toEqual({
      id: 1,
      component: 'tool_x',
      name: 'limited',
      enabled: false,
      config: '{"limit":10}',
      timecreated: NOW,
      timemodified: NOW,
      usermodified: 'test-user',
    })
  })

  describe('bulk path', () => {
    it('should insert in one statement and assign ids by lookup', async () => {
      const store = new MemoryStore({ seed: [seedRow(7, 'old')] })
      const result = await syncMetrics(
        collectionOf(simple('old'), simple('a'), simple('b'), simple('c', 'tool_y')),
        contextFor(store)
      )

      // findAll + findCreatedSince; one insertMany
      expect(store.stats()).toMatchObject({ reads: 2, writes: 1, commits: 1 })
      expect(result.created).toEqual(['tool_x_a', 'tool_x_b', 'tool_y_c'])
      expect(result.metrics.get('tool_x_old')?.id).toBe(7)
      expect(result.metrics.get('tool_x_a')?.id).toBe(8)
      expect(result.metrics.get('tool_x_b')?.id).toBe(9)
      expect(result.metrics.get('tool_y_c')?.id).toBe(10)
    })

    it('should honor a custom threshold', async () => {
      const store = new MemoryStore()
      await syncMetrics(collectionOf(simple('a'), simple('b')), contextFor(store), {
        bulkInsertThreshold: 1,
      })
      expect(store.stats()).toMatchObject({ reads: 2, writes: 1 })
    })

    it('should fail when an inserted row cannot be found again', async () => {
      class ForgetfulStore extends MemoryStore {
        override async findCreatedSince(): Promise<[]> {
          return []
        }
      }
      const store = new ForgetfulStore()

      await expect(
        syncMetrics(collectionOf(simple('a'), simple('b'), simple('c')), contextFor(store))
      ).rejects.toMatchObject({
        code: 'INTERNAL_ERROR',
        message: "No id was assigned to metric 'tool_x_a' after insert",
      })
      expect(store.stats()).toMatchObject({ rollbacks: 1, totalRows: 0 })
    })
  })

  it('should be idempotent', async () => {
    const store = new MemoryStore({ seed: [seedRow(1, 'gone')] })
    const collection = collectionOf(simple('a'), simple('b'), simple('c'), configurable)
    await syncMetrics(collection, contextFor(store), { delete: true })
    const before = await store.findAll()
    const writes = store.stats().writes

    const again = await syncMetrics(collection, contextFor(store), { delete: true })

    expect(again.created).toEqual([])
    expect(again.deleted).toEqual([])
    expect(store.stats().writes).toBe(writes)
    expect(await store.findAll()).toEqual(before)
  })

  it('should mirror the collection exactly after deleting orphans', async () => {
    const store = new MemoryStore({
      seed: [seedRow(1, 'a'), seedRow(2, 'orphan'), seedRow(3, 'x', { component: 'tool_y' })],
    })
    const collection = collectionOf(simple('a'), simple('x', 'tool_y'), simple('new'), simple('a'))

    await syncMetrics(collection, contextFor(store), { delete: true })

    expect(await storedNames(store)).toEqual(['tool_x_a', 'tool_x_new', 'tool_y_x'])
  })

  it('should roll everything back when a write fails', async () => {
    class FlakyStore extends MemoryStore {
      private inserts = 0
      override async insert(row: NewMetricRow): Promise<number> {
        this.inserts++
        if (this.inserts === 2) throw new Error('connection lost')
        return super.insert(row)
      }
    }
    const store = new FlakyStore({ seed: [seedRow(1, 'orphan')] })

    await expect(
      syncMetrics(collectionOf(simple('a'), simple('b')), contextFor(store), { delete: true })
    ).rejects.toThrow('connection lost')

    expect(await storedNames(store)).toEqual(['tool_x_orphan'])
    expect(store.stats().rollbacks).toBe(1)
  })

  it('should fail the pass that loses a concurrent insert', async () => {
    class StaleStore extends MemoryStore {
      override async findAll(): Promise<MetricRow[]> {
        // Snapshot taken before another pass inserted the row
        return []
      }
    }
    const store = new StaleStore({ seed: [seedRow(1, 'a')] })

    await expect(syncMetrics(collectionOf(simple('a')), contextFor(store))).rejects.toMatchObject({
      code: 'ALREADY_EXISTS',
    })
    expect(store.stats().totalRows).toBe(1)
  })

  it('should reject a malformed stored config', async () => {
    const store = new MemoryStore({ seed: [seedRow(1, 'limited', { config: 'not json' })] })

    await expect(syncMetrics(collectionOf(configurable), contextFor(store))).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
    })
  })
})
