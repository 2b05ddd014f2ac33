/**
 * Registry
 *
 * Persisted registration of metrics: reconciliation, reading, the
 * enable/disable/configure lifecycle and notifications.
 */

export { serializeConfig, deserializeConfig } from './config-codec.js'
export { MetricEventEmitter, createMetricEventEmitter } from './events.js'
export { duplicateMetric, indexDefinitions } from './diagnostics.js'
export { RegisteredMetric, unixNow } from './registered-metric.js'
export { syncMetrics, DEFAULT_BULK_INSERT_THRESHOLD } from './sync.js'
export { fetchMetrics } from './fetch.js'
export { createStaticTagResolver, hasAllTags } from './tags.js'
export { MetricsManager, createMetricsManager } from './manager.js'

export type {
  MetricEventType,
  MetricEventData,
  MetricEventListener,
  MetricEventEmitterOptions,
  MetricEventStats,
} from './events.js'
export type { MetricDiagnostic, MetricDiagnosticCode } from './diagnostics.js'
export type {
  RegistryContext,
  RegisteredMetricState,
  MetricChanges,
} from './registered-metric.js'
export type { SyncOptions, SyncResult } from './sync.js'
export type { FetchOptions, FetchResult } from './fetch.js'
export type { TagResolver } from './tags.js'
export type {
  MetricsManagerOptions,
  MetricLookup,
  ReadOptions,
  ExportOptions,
  MetricStateEntry,
} from './manager.js'
