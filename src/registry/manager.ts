/**
 * Metrics Manager
 *
 * Per-operation facade over the registry. One instance serves one logical
 * operation (a request, a CLI run, a test case): the collection is gathered
 * once per instance and every collaborator is passed in explicitly.
 */

import { Errors } from '../errors/factories.js'
import { MetricCollection, collectMetrics, type MetricCollector } from '../metrics/collection.js'
import { qualifiedName } from '../metrics/definition.js'
import { exportMetrics, type ExportFormat } from '../metrics/exporters.js'
import type { MetricConfig, MetricType } from '../metrics/types.js'
import type { MetricStore } from '../store/types.js'
import type { Logger } from '../utils/logger.js'
import type { MetricEventEmitter, MetricEventType } from './events.js'
import { fetchMetrics, type FetchResult } from './fetch.js'
import { RegisteredMetric, type MetricChanges, type RegistryContext } from './registered-metric.js'
import { syncMetrics, type SyncResult } from './sync.js'
import type { TagResolver } from './tags.js'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MetricsManagerOptions {
  store: MetricStore
  /** Callbacks contributing definitions; each runs once per manager */
  collectors: Iterable<MetricCollector>
  /**
   * Actor recorded on writes
   * @default 'system'
   */
  actor?: string
  /** Current Unix time in seconds */
  clock?: () => number
  events?: MetricEventEmitter
  tagResolver?: TagResolver
  bulkInsertThreshold?: number
  logger?: Logger
}

export type MetricLookup =
  | { status: 'found'; metric: RegisteredMetric }
  | {
      status: 'not_found'
      qualifiedName: string
      /** `unknown`: no collector produces it; `unregistered`: no row (or filtered out) */
      reason: 'unknown' | 'unregistered'
    }

export interface ReadOptions {
  /** true = only enabled, false = only disabled, null/undefined = all */
  enabled?: boolean | null
  tags?: readonly string[]
}

export interface ExportOptions {
  tags?: readonly string[]
  /** @default 'prometheus' */
  format?: ExportFormat
}

/**
 * Plain registry entry for display
 */
export interface MetricStateEntry {
  id: number | null
  qualifiedName: string
  component: string
  name: string
  type: MetricType
  description: string
  enabled: boolean
  configurable: boolean
  config: MetricConfig | null
  timecreated: number | null
  timemodified: number | null
  usermodified: string | null
}

// ─────────────────────────────────────────────────────────────────────────────
// Metrics Manager Class
// ─────────────────────────────────────────────────────────────────────────────

export class MetricsManager {
  private collection: MetricCollection | null = null
  private readonly collectors: MetricCollector[]
  readonly context: RegistryContext

  constructor(private readonly options: MetricsManagerOptions) {
    this.collectors = Array.from(options.collectors)
    this.context = {
      store: options.store,
      actor: options.actor ?? 'system',
      clock: options.clock,
      events: options.events,
      logger: options.logger,
    }
  }

  /**
   * Definitions contributed by the collectors, gathered on first use
   */
  getCollection(): MetricCollection {
    if (!this.collection) {
      this.collection = collectMetrics(this.collectors)
    }
    return this.collection
  }

  /**
   * Reconcile the registry with the collection
   */
  sync(options: { delete?: boolean } = {}): Promise<SyncResult> {
    return syncMetrics(this.getCollection(), this.context, {
      delete: options.delete,
      bulkInsertThreshold: this.options.bulkInsertThreshold,
    })
  }

  /**
   * Read registered metrics without side effects
   */
  fetch(options: ReadOptions = {}): Promise<FetchResult> {
    return fetchMetrics(this.getCollection(), this.context, {
      enabled: options.enabled,
      tags: options.tags,
      tagResolver: this.options.tagResolver,
    })
  }

  /**
   * Find one registered metric by qualified name
   */
  async lookup(name: string): Promise<MetricLookup> {
    const definition = Array.from(this.getCollection()).find(
      (candidate) => qualifiedName(candidate.component, candidate.name) === name
    )
    if (!definition) {
      return { status: 'not_found', qualifiedName: name, reason: 'unknown' }
    }

    const single = new MetricCollection()
    single.add(definition)
    const { metrics } = await fetchMetrics(single, this.context)
    const metric = metrics.get(name)
    if (!metric) {
      return { status: 'not_found', qualifiedName: name, reason: 'unregistered' }
    }
    return { status: 'found', metric }
  }

  /**
   * Like `lookup`, but throws NOT_FOUND
   */
  async require(name: string): Promise<RegisteredMetric> {
    const result = await this.lookup(name)
    if (result.status === 'not_found') {
      throw Errors.notFound('Metric', name)
    }
    return result.metric
  }

  /**
   * Enable a metric by qualified name
   */
  async enable(name: string): Promise<boolean> {
    const metric = await this.require(name)
    return metric.enable()
  }

  /**
   * Disable a metric by qualified name
   */
  async disable(name: string): Promise<boolean> {
    const metric = await this.require(name)
    return metric.disable()
  }

  /**
   * Apply changes to a metric by qualified name
   */
  async configure(name: string, changes: MetricChanges): Promise<MetricEventType[]> {
    const metric = await this.require(name)
    return metric.applyChanges(changes)
  }

  /**
   * Exportable text of the enabled metrics
   */
  async export(options: ExportOptions = {}): Promise<string> {
    const { metrics } = await this.fetch({ enabled: true, tags: options.tags })
    return exportMetrics(metrics.values(), options.format ?? 'prometheus')
  }

  /**
   * Current registry state as plain entries
   */
  async state(options: ReadOptions = {}): Promise<MetricStateEntry[]> {
    const { metrics } = await this.fetch(options)
    return Array.from(metrics.values(), toStateEntry)
  }
}

function toStateEntry(metric: RegisteredMetric): MetricStateEntry {
  return {
    id: metric.id,
    qualifiedName: metric.qualifiedName,
    component: metric.component,
    name: metric.name,
    type: metric.type,
    description: metric.description,
    enabled: metric.enabled,
    configurable: metric.configurable,
    config: metric.config,
    timecreated: metric.timecreated,
    timemodified: metric.timemodified,
    usermodified: metric.usermodified,
  }
}

/**
 * Create a metrics manager for one logical operation
 *
 * @example
 * ```typescript
 * const manager = createMetricsManager({
 *   store,
 *   collectors: builtinCollectors(store),
 *   actor: 'admin',
 * })
 * await manager.sync({ delete: true })
 * const text = await manager.export()
 * ```
 */
export function createMetricsManager(options: MetricsManagerOptions): MetricsManager {
  return new MetricsManager(options)
}
