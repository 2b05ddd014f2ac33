/**
 * Store Module
 *
 * Persisted metric registry with pluggable drivers.
 *
 * Available drivers:
 * - `memory`: in-process registry (tests, development, single process)
 * - `postgres`: PostgreSQL through drizzle-orm, unique `(component, name)` index
 *
 * @example
 * ```typescript
 * import { createStore } from 'metric-registry'
 *
 * const store = await createStore('memory')
 * await store.transaction(async (session) => {
 *   const rows = await session.findAll()
 *   // ...
 * })
 * ```
 */

// Types
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
} from './types.js'

// Factory
export {
  createStore,
  createStoreFromConfig,
  STORE_TYPES,
  isValidStoreType,
  assertStoreType,
} from './factory.js'

// Drivers (memory only; the postgres driver is loaded through the factory)
export { MemoryStore, createMemoryStore } from './drivers/memory.js'

// Schema
export { monitoringMetrics } from './schema.js'
export type { MonitoringMetricRecord, NewMonitoringMetricRecord } from './schema.js'
