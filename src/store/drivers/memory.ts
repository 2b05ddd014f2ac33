/**
 * Memory Store Driver
 *
 * In-process registry for tests, development and single-process deployments.
 *
 * Features:
 * - Enforces the `(component, name)` uniqueness of the real table
 * - Snapshot/restore transactions, run one at a time
 * - Statement counting (reads, writes, commits, rollbacks)
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import { Errors } from '../../errors/factories.js'
import { qualifiedName } from '../../metrics/definition.js'
import type {
  CreatedMetricRow,
  MemoryStoreOptions,
  MetricIdentity,
  MetricRow,
  MetricRowUpdate,
  MetricStore,
  MetricStoreSession,
  NewMetricRow,
  RowFilter,
  StoreStats,
} from '../types.js'

function identityKey(identity: MetricIdentity): string {
  return `${identity.component}\u0000${identity.name}`
}

/**
 * Memory Store Driver
 *
 * @example
 * ```typescript
 * const store = new MemoryStore({
 *   seed: [{ component: 'tool_monitoring', name: 'foo', enabled: false, config: '{"a":1}',
 *            timecreated: 1700000000, timemodified: 1700000000, usermodified: 'admin' }],
 * })
 * const rows = await store.findAll()
 * ```
 */
export class MemoryStore implements MetricStore {
  readonly name = 'memory'

  private rows = new Map<number, MetricRow>()
  private nextId = 1
  /** Set inside the call chain of an open transaction */
  private readonly active = new AsyncLocalStorage<true>()
  /** Settles when the last queued transaction has finished */
  private queue: Promise<unknown> = Promise.resolve()

  private _stats = {
    reads: 0,
    writes: 0,
    commits: 0,
    rollbacks: 0,
  }

  constructor(options: MemoryStoreOptions = {}) {
    for (const seed of options.seed ?? []) {
      const id = seed.id ?? this.nextId
      this.assertUnique(seed)
      this.rows.set(id, { ...seed, id })
      this.nextId = Math.max(this.nextId, id + 1)
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────

  async findAll(): Promise<MetricRow[]> {
    this._stats.reads++
    return Array.from(this.rows.values(), (row) => ({ ...row }))
  }

  async findByIdentities(
    identities: readonly MetricIdentity[],
    filter: RowFilter = {}
  ): Promise<MetricRow[]> {
    this._stats.reads++
    const wanted = new Set(identities.map(identityKey))
    const enabled = filter.enabled ?? null
    const result: MetricRow[] = []
    for (const row of this.rows.values()) {
      if (!wanted.has(identityKey(row))) continue
      if (enabled !== null && row.enabled !== enabled) continue
      result.push({ ...row })
    }
    return result
  }

  async findCreatedSince(existingIds: readonly number[]): Promise<CreatedMetricRow[]> {
    this._stats.reads++
    const known = new Set(existingIds)
    const result: CreatedMetricRow[] = []
    for (const row of this.rows.values()) {
      if (known.has(row.id)) continue
      result.push({ id: row.id, component: row.component, name: row.name })
    }
    return result
  }

  // ─────────────────────────────────────────────────────────────
  // Writes
  // ─────────────────────────────────────────────────────────────

  async insert(row: NewMetricRow): Promise<number> {
    this._stats.writes++
    return this.put(row)
  }

  async insertMany(rows: readonly NewMetricRow[]): Promise<void> {
    if (rows.length === 0) return
    this._stats.writes++
    // One statement: validate every row before storing any
    const keys = new Set<string>()
    for (const row of rows) {
      const key = identityKey(row)
      if (keys.has(key)) {
        throw Errors.alreadyExists('Metric', qualifiedName(row.component, row.name))
      }
      keys.add(key)
      this.assertUnique(row)
    }
    for (const row of rows) {
      this.put(row)
    }
  }

  async update(id: number, fields: MetricRowUpdate): Promise<number> {
    this._stats.writes++
    const row = this.rows.get(id)
    if (!row) return 0
    this.rows.set(id, { ...row, ...fields })
    return 1
  }

  async deleteByIds(ids: readonly number[]): Promise<void> {
    if (ids.length === 0) return
    this._stats.writes++
    for (const id of ids) {
      this.rows.delete(id)
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Transactions
  // ─────────────────────────────────────────────────────────────

  async transaction<T>(fn: (session: MetricStoreSession) => Promise<T>): Promise<T> {
    // A transaction opened from inside another one joins it
    if (this.active.getStore()) {
      return fn(this)
    }

    const run = this.queue.then(() => this.active.run(true, () => this.runIsolated(fn)))
    this.queue = run.catch(() => undefined)
    return run
  }

  stats(): StoreStats {
    return {
      ...this._stats,
      totalRows: this.rows.size,
    }
  }

  async shutdown(): Promise<void> {
    this.rows.clear()
  }

  // ─────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────

  private async runIsolated<T>(fn: (session: MetricStoreSession) => Promise<T>): Promise<T> {
    const snapshot = new Map(this.rows)
    const nextId = this.nextId
    try {
      const result = await fn(this)
      this._stats.commits++
      return result
    } catch (error) {
      this.rows = snapshot
      this.nextId = nextId
      this._stats.rollbacks++
      throw error
    }
  }

  private put(row: NewMetricRow): number {
    this.assertUnique(row)
    const id = this.nextId++
    this.rows.set(id, { ...row, id })
    return id
  }

  private assertUnique(identity: MetricIdentity): void {
    const key = identityKey(identity)
    for (const row of this.rows.values()) {
      if (identityKey(row) === key) {
        throw Errors.alreadyExists('Metric', qualifiedName(identity.component, identity.name))
      }
    }
  }
}

/**
 * Create a memory store
 */
export function createMemoryStore(options?: MemoryStoreOptions): MemoryStore {
  return new MemoryStore(options)
}
