/**
 * Metric Collection
 *
 * Append-only, order-preserving set of definitions assembled once per logical
 * operation by asking every collector to contribute.
 */

import type { MetricDefinition } from './types.js'

/**
 * Callback contributing definitions to a collection pass
 */
export type MetricCollector = (collection: MetricCollection) => void

export class MetricCollection implements Iterable<MetricDefinition> {
  private readonly definitions: MetricDefinition[] = []

  /**
   * Append a definition. Duplicates are kept; consumers decide what to do
   * with them.
   */
  add(definition: MetricDefinition): void {
    this.definitions.push(definition)
  }

  get size(): number {
    return this.definitions.length
  }

  /** Definitions in insertion order; each call starts a fresh iteration */
  [Symbol.iterator](): Iterator<MetricDefinition> {
    return this.definitions[Symbol.iterator]()
  }
}

/**
 * Build a collection by invoking every collector exactly once.
 *
 * @example
 * ```typescript
 * const collection = collectMetrics([
 *   (c) => c.add(coursesMetric),
 *   (c) => { c.add(usersOnline); c.add(quizAttempts) },
 * ])
 * ```
 */
export function collectMetrics(collectors: Iterable<MetricCollector>): MetricCollection {
  const collection = new MetricCollection()
  for (const collector of collectors) {
    collector(collection)
  }
  return collection
}
