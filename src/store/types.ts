/**
 * Metric Store Types
 *
 * Storage abstraction for the persisted registry with pluggable drivers.
 * One row per qualified name; `(component, name)` is unique.
 */

import type { Pool } from 'pg'

/**
 * Persisted registry row
 */
export interface MetricRow {
  /** Storage-assigned surrogate key */
  id: number
  component: string
  name: string
  /** Whether the metric is calculated and exported */
  enabled: boolean
  /** Serialized JSON object; null when the metric has no config */
  config: string | null
  /** Unix timestamp (seconds) of the insert */
  timecreated: number
  /** Unix timestamp (seconds) of the last mutation */
  timemodified: number
  /** Actor that last mutated the row */
  usermodified: string
}

/**
 * Row as inserted; the id is assigned by the store
 */
export type NewMetricRow = Omit<MetricRow, 'id'>

/**
 * Fields a mutation may change
 */
export type MetricRowUpdate = Partial<
  Pick<MetricRow, 'enabled' | 'config' | 'timemodified' | 'usermodified'>
>

/**
 * Composite identity of a row
 */
export interface MetricIdentity {
  component: string
  name: string
}

/**
 * Identity plus id, as returned after a bulk insert
 */
export interface CreatedMetricRow extends MetricIdentity {
  id: number
}

/**
 * Filter applied when reading rows by identity
 */
export interface RowFilter {
  /** true = only enabled, false = only disabled, null/undefined = no filter */
  enabled?: boolean | null
}

/**
 * Statements available inside and outside a transaction.
 *
 * Every method is one round-trip to the backend.
 */
export interface MetricStoreSession {
  /** Every row in the registry */
  findAll(): Promise<MetricRow[]>

  /** Rows matching any of the identities, optionally filtered by `enabled` */
  findByIdentities(identities: readonly MetricIdentity[], filter?: RowFilter): Promise<MetricRow[]>

  /** Insert one row and return its id */
  insert(row: NewMetricRow): Promise<number>

  /** Insert several rows in one statement */
  insertMany(rows: readonly NewMetricRow[]): Promise<void>

  /** Identities and ids of rows whose id is not in `existingIds` */
  findCreatedSince(existingIds: readonly number[]): Promise<CreatedMetricRow[]>

  /** Update the given fields of one row; resolves to the number of rows changed */
  update(id: number, fields: MetricRowUpdate): Promise<number>

  /** Delete rows by id in one statement */
  deleteByIds(ids: readonly number[]): Promise<void>
}

/**
 * Store driver interface
 */
export interface MetricStore extends MetricStoreSession {
  /** Driver name for identification */
  readonly name: string

  /**
   * Run `fn` atomically. The transaction commits when `fn` resolves and rolls
   * back, re-throwing the error, when it rejects.
   */
  transaction<T>(fn: (session: MetricStoreSession) => Promise<T>): Promise<T>

  /**
   * Get driver statistics
   */
  stats?(): StoreStats

  /**
   * Shutdown the driver (close pools, etc.)
   */
  shutdown?(): Promise<void>
}

/**
 * Store statistics
 */
export interface StoreStats {
  /** Read statements issued */
  reads: number
  /** Write statements issued */
  writes: number
  /** Transactions committed */
  commits: number
  /** Transactions rolled back */
  rollbacks: number
  /** Rows currently stored (if tracked) */
  totalRows?: number
}

/**
 * Memory driver options
 */
export interface MemoryStoreOptions {
  /** Rows present before the first statement; they do not count in stats */
  seed?: ReadonlyArray<NewMetricRow & { id?: number }>
}

/**
 * Postgres driver options
 */
export interface PostgresStoreOptions {
  /** Connection string; a pool is created and owned by the driver */
  connectionString?: string
  /** Existing pg pool; left open on shutdown */
  pool?: Pool
  /** Maximum pool size when the driver creates the pool */
  maxConnections?: number
}

/**
 * Available driver types
 */
export type MetricStoreType = 'memory' | 'postgres'

/**
 * Driver configuration for factory
 */
export type MetricStoreConfig =
  | { driver: 'memory'; options?: MemoryStoreOptions }
  | { driver: 'postgres'; options: PostgresStoreOptions }
