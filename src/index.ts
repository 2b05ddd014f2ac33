/**
 * Metric Registry
 *
 * Component-declared metrics, a persisted registry kept in sync with them,
 * and Prometheus-style export.
 */

// === Metrics ===
export {
  metricValue,
  isMetricValue,
  qualifiedName,
  toSnakeCase,
  parseWithSchema,
  defineMetric,
  BaseMetric,
  sameLabels,
  strictLabels,
  strictLabelNames,
  labelValidator,
  MetricCollection,
  collectMetrics,
  exportPrometheus,
  exportJson,
  exportMetrics,
} from './metrics/index.js'
export type {
  MetricType,
  Labels,
  MetricValue,
  MetricConfig,
  CalculateResult,
  ConfigField,
  MetricDefinition,
  LabelShape,
  MetricConfigOptions,
  SimpleMetricOptions,
  ConfigurableMetricOptions,
  MetricCollector,
  ExportableMetric,
  ExportFormat,
  JsonMetricSnapshot,
} from './metrics/index.js'

// === Registry ===
export {
  serializeConfig,
  deserializeConfig,
  MetricEventEmitter,
  createMetricEventEmitter,
  duplicateMetric,
  RegisteredMetric,
  unixNow,
  syncMetrics,
  DEFAULT_BULK_INSERT_THRESHOLD,
  fetchMetrics,
  createStaticTagResolver,
  hasAllTags,
  MetricsManager,
  createMetricsManager,
} from './registry/index.js'
export type {
  MetricEventType,
  MetricEventData,
  MetricEventListener,
  MetricEventEmitterOptions,
  MetricEventStats,
  MetricDiagnostic,
  MetricDiagnosticCode,
  RegistryContext,
  RegisteredMetricState,
  MetricChanges,
  SyncOptions,
  SyncResult,
  FetchOptions,
  FetchResult,
  TagResolver,
  MetricsManagerOptions,
  MetricLookup,
  ReadOptions,
  ExportOptions,
  MetricStateEntry,
} from './registry/index.js'

// === Store ===
export {
  createStore,
  createStoreFromConfig,
  STORE_TYPES,
  isValidStoreType,
  assertStoreType,
  MemoryStore,
  createMemoryStore,
  monitoringMetrics,
} from './store/index.js'
export type {
  MetricRow,
  NewMetricRow,
  MetricRowUpdate,
  MetricIdentity,
  CreatedMetricRow,
  RowFilter,
  MetricStoreSession,
  MetricStore,
  StoreStats,
  MemoryStoreOptions,
  PostgresStoreOptions,
  MetricStoreType,
  MetricStoreConfig,
} from './store/index.js'

// === Collectors ===
export {
  builtinCollectors,
  registryStateMetric,
  UptimeSeconds,
  memoryUsageMetric,
  MEMORY_KINDS,
} from './collectors/index.js'
export type { MemoryKind, MemoryUsageConfig } from './collectors/index.js'

// === Config ===
export { loadConfig } from './config/index.js'
export type { MonitoringConfig } from './config/index.js'

// === Errors ===
export {
  MonitoringError,
  isMonitoringError,
  Errors,
  ErrorCodes,
  getErrorCode,
  getStatusForCode,
  isClientError,
  isServerError,
} from './errors/index.js'

// === Utils ===
export { createLogger, getLogger } from './utils/index.js'
export type { Logger } from './utils/index.js'
