/**
 * Metric Collection Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { MetricCollection, collectMetrics } from './collection.js'
import { defineMetric } from './definition.js'
import { metricValue } from './value.js'

function simple(component: string, name: string) {
  return defineMetric({
    component,
    name,
    type: 'gauge',
    description: name,
    calculate: () => metricValue(0),
  })
}

describe('MetricCollection', () => {
  it('should keep insertion order and duplicates', () => {
    const collection = new MetricCollection()
    const a = simple('tool_x', 'a')
    const b = simple('tool_x', 'b')
    collection.add(a)
    collection.add(b)
    collection.add(a)

    expect(collection.size).toBe(3)
    expect(Array.from(collection)).toEqual([a, b, a])
  })

  it('should be iterable more than once', () => {
    const collection = new MetricCollection()
    collection.add(simple('tool_x', 'a'))

    expect(Array.from(collection)).toHaveLength(1)
    expect(Array.from(collection)).toHaveLength(1)
  })
})

describe('collectMetrics', () => {
  it('should call every collector once on the same collection', () => {
    const first = vi.fn((collection: MetricCollection) => collection.add(simple('tool_x', 'a')))
    const second = vi.fn((collection: MetricCollection) => {
      collection.add(simple('tool_y', 'b'))
      collection.add(simple('tool_y', 'c'))
    })
    const silent = vi.fn()

    const collection = collectMetrics([first, second, silent])

    expect(first).toHaveBeenCalledTimes(1)
    expect(second).toHaveBeenCalledTimes(1)
    expect(silent).toHaveBeenCalledWith(collection)
    expect(Array.from(collection, (d) => d.name)).toEqual(['a', 'b', 'c'])
  })
})
