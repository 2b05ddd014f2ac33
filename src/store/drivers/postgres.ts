/**
 * Postgres Store Driver
 *
 * Persisted registry on PostgreSQL through drizzle-orm and node-postgres.
 * Requires: npm install drizzle-orm pg
 */

import { Pool } from 'pg'
import { and, eq, inArray, notInArray, or } from 'drizzle-orm'
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres'
import type { PgDatabase } from 'drizzle-orm/pg-core'
import { Errors } from '../../errors/factories.js'
import * as schema from '../schema.js'
import { monitoringMetrics } from '../schema.js'
import type {
  CreatedMetricRow,
  MetricIdentity,
  MetricRow,
  MetricRowUpdate,
  MetricStore,
  MetricStoreSession,
  NewMetricRow,
  PostgresStoreOptions,
  RowFilter,
  StoreStats,
} from '../types.js'

type RegistrySchema = typeof schema
type RegistryDatabase = PgDatabase<NodePgQueryResultHKT, RegistrySchema>

interface Counters {
  reads: number
  writes: number
  commits: number
  rollbacks: number
}

/**
 * Statements bound to a database handle or an open transaction
 */
class PostgresSession implements MetricStoreSession {
  constructor(
    private readonly db: RegistryDatabase,
    private readonly counters: Counters
  ) {}

  async findAll(): Promise<MetricRow[]> {
    this.counters.reads++
    return this.db.select().from(monitoringMetrics)
  }

  async findByIdentities(
    identities: readonly MetricIdentity[],
    filter: RowFilter = {}
  ): Promise<MetricRow[]> {
    this.counters.reads++
    const matchIdentity = or(
      ...identities.map((identity) =>
        and(
          eq(monitoringMetrics.component, identity.component),
          eq(monitoringMetrics.name, identity.name)
        )
      )
    )
    // or() of nothing is undefined, and an undefined filter selects every row
    if (!matchIdentity) return []

    const enabled = filter.enabled ?? null
    const where =
      enabled === null ? matchIdentity : and(matchIdentity, eq(monitoringMetrics.enabled, enabled))
    return this.db.select().from(monitoringMetrics).where(where)
  }

  async insert(row: NewMetricRow): Promise<number> {
    this.counters.writes++
    const [created] = await this.db
      .insert(monitoringMetrics)
      .values(row)
      .returning({ id: monitoringMetrics.id })
    if (!created) {
      throw Errors.internal('Insert returned no id', { component: row.component, name: row.name })
    }
    return created.id
  }

  async insertMany(rows: readonly NewMetricRow[]): Promise<void> {
    if (rows.length === 0) return
    this.counters.writes++
    await this.db.insert(monitoringMetrics).values([...rows])
  }

  async findCreatedSince(existingIds: readonly number[]): Promise<CreatedMetricRow[]> {
    this.counters.reads++
    const query = this.db
      .select({
        id: monitoringMetrics.id,
        component: monitoringMetrics.component,
        name: monitoringMetrics.name,
      })
      .from(monitoringMetrics)
    if (existingIds.length === 0) return query
    return query.where(notInArray(monitoringMetrics.id, [...existingIds]))
  }

  async update(id: number, fields: MetricRowUpdate): Promise<number> {
    this.counters.writes++
    const updated = await this.db
      .update(monitoringMetrics)
      .set(fields)
      .where(eq(monitoringMetrics.id, id))
      .returning({ id: monitoringMetrics.id })
    return updated.length
  }

  async deleteByIds(ids: readonly number[]): Promise<void> {
    if (ids.length === 0) return
    this.counters.writes++
    await this.db.delete(monitoringMetrics).where(inArray(monitoringMetrics.id, [...ids]))
  }
}

/**
 * Postgres Store Driver
 *
 * @example
 * ```typescript
 * const store = new PostgresStore({ connectionString: process.env.MONITORING_DATABASE_URL })
 * const rows = await store.findAll()
 * await store.shutdown()
 * ```
 */
export class PostgresStore implements MetricStore {
  readonly name = 'postgres'

  private readonly pool: Pool
  private readonly ownsPool: boolean
  private readonly db: NodePgDatabase<RegistrySchema>
  private readonly session: PostgresSession
  private readonly counters: Counters = { reads: 0, writes: 0, commits: 0, rollbacks: 0 }

  constructor(options: PostgresStoreOptions) {
    if (options.pool) {
      this.pool = options.pool
      this.ownsPool = false
    } else if (options.connectionString) {
      this.pool = new Pool({
        connectionString: options.connectionString,
        max: options.maxConnections ?? 10,
      })
      this.ownsPool = true
    } else {
      throw Errors.validation('connectionString', 'is required when no pool is given')
    }

    this.db = drizzle(this.pool, { schema })
    this.session = new PostgresSession(this.db, this.counters)
  }

  findAll(): Promise<MetricRow[]> {
    return this.session.findAll()
  }

  findByIdentities(identities: readonly MetricIdentity[], filter?: RowFilter): Promise<MetricRow[]> {
    return this.session.findByIdentities(identities, filter)
  }

  insert(row: NewMetricRow): Promise<number> {
    return this.session.insert(row)
  }

  insertMany(rows: readonly NewMetricRow[]): Promise<void> {
    return this.session.insertMany(rows)
  }

  findCreatedSince(existingIds: readonly number[]): Promise<CreatedMetricRow[]> {
    return this.session.findCreatedSince(existingIds)
  }

  update(id: number, fields: MetricRowUpdate): Promise<number> {
    return this.session.update(id, fields)
  }

  deleteByIds(ids: readonly number[]): Promise<void> {
    return this.session.deleteByIds(ids)
  }

  async transaction<T>(fn: (session: MetricStoreSession) => Promise<T>): Promise<T> {
    try {
      const result = await this.db.transaction((tx) => fn(new PostgresSession(tx, this.counters)))
      this.counters.commits++
      return result
    } catch (error) {
      this.counters.rollbacks++
      throw error
    }
  }

  stats(): StoreStats {
    return { ...this.counters }
  }

  async shutdown(): Promise<void> {
    if (this.ownsPool) {
      await this.pool.end()
    }
  }
}

/**
 * Create a postgres store
 */
export function createPostgresStore(options: PostgresStoreOptions): PostgresStore {
  return new PostgresStore(options)
}
