/**
 * Registry Reconciliation
 *
 * Makes the persisted registry mirror the qualified names of a collection,
 * keeping the enabled flag, config and audit fields of rows that already
 * exist. Runs as one transaction.
 */

import { Errors } from '../errors/factories.js'
import type { MetricCollection } from '../metrics/collection.js'
import { qualifiedName } from '../metrics/definition.js'
import type { MetricRow, MetricStoreSession, NewMetricRow } from '../store/types.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { indexDefinitions, type MetricDiagnostic } from './diagnostics.js'
import { RegisteredMetric, unixNow, type RegistryContext } from './registered-metric.js'

const defaultLogger = createLogger('registry-sync')

/**
 * Up to this many new rows are inserted one by one; more go through one
 * bulk insert and one id lookup.
 */
export const DEFAULT_BULK_INSERT_THRESHOLD = 2

export interface SyncOptions {
  /**
   * Delete rows no definition produces anymore
   * @default false
   */
  delete?: boolean

  /**
   * Largest number of creations inserted individually
   * @default 2
   */
  bulkInsertThreshold?: number
}

export interface SyncResult {
  /** Every non-duplicate definition, matched or created, in collection order */
  metrics: Map<string, RegisteredMetric>
  /** Qualified names inserted by this pass */
  created: string[]
  /** Qualified names of orphaned rows removed by this pass */
  deleted: string[]
  diagnostics: MetricDiagnostic[]
}

/**
 * Reconcile the registry with a collection.
 *
 * Any failure rolls the whole pass back and is re-thrown; duplicate
 * qualified names are skipped and reported as diagnostics.
 *
 * @example
 * ```typescript
 * const { metrics, created } = await syncMetrics(collection, { store, actor: 'admin' }, { delete: true })
 * ```
 */
export async function syncMetrics(
  collection: MetricCollection,
  context: RegistryContext,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const { delete: deleteOrphans = false, bulkInsertThreshold = DEFAULT_BULK_INSERT_THRESHOLD } =
    options
  const logger = context.logger ?? defaultLogger
  const { definitions, diagnostics } = indexDefinitions(collection, logger)

  return context.store.transaction(async (session) => {
    const rows = await session.findAll()
    const existing = new Map<string, MetricRow>()
    for (const row of rows) {
      existing.set(qualifiedName(row.component, row.name), row)
    }
    const existingIds = rows.map((row) => row.id)

    const timestamp = (context.clock ?? unixNow)()
    const metrics = new Map<string, RegisteredMetric>()
    const pending: RegisteredMetric[] = []

    for (const [name, definition] of definitions) {
      const row = existing.get(name)
      if (row) {
        metrics.set(name, RegisteredMetric.fromRow(definition, row, context))
        existing.delete(name)
        continue
      }
      const metric = RegisteredMetric.fromDefinition(definition, context, {
        timecreated: timestamp,
        timemodified: timestamp,
        usermodified: context.actor,
      })
      metrics.set(name, metric)
      pending.push(metric)
    }

    const orphans = Array.from(existing.entries())
    const deleted: string[] = []
    if (deleteOrphans && orphans.length > 0) {
      await session.deleteByIds(orphans.map(([, row]) => row.id))
      deleted.push(...orphans.map(([name]) => name))
    }

    if (pending.length > bulkInsertThreshold) {
      await insertInBulk(session, pending, existingIds)
    } else {
      await insertIndividually(session, pending)
    }

    logger.debug(
      {
        matched: metrics.size - pending.length,
        created: pending.length,
        orphaned: orphans.length,
        deleted: deleted.length,
        duplicates: diagnostics.length,
      },
      'Registry synchronized'
    )

    return {
      metrics,
      created: pending.map((metric) => metric.qualifiedName),
      deleted,
      diagnostics,
    }
  })
}

async function insertIndividually(
  session: MetricStoreSession,
  pending: readonly RegisteredMetric[]
): Promise<void> {
  for (const metric of pending) {
    const row = metric.toRow()
    const id = await session.insert(row)
    metric.markPersisted(id, row)
  }
}

async function insertInBulk(
  session: MetricStoreSession,
  pending: readonly RegisteredMetric[],
  existingIds: readonly number[]
): Promise<void> {
  const rows = new Map<string, NewMetricRow>()
  for (const metric of pending) {
    rows.set(metric.qualifiedName, metric.toRow())
  }
  await session.insertMany(Array.from(rows.values()))

  const ids = new Map<string, number>()
  for (const created of await session.findCreatedSince(existingIds)) {
    ids.set(qualifiedName(created.component, created.name), created.id)
  }

  for (const metric of pending) {
    const id = ids.get(metric.qualifiedName)
    const row = rows.get(metric.qualifiedName)
    if (id === undefined || row === undefined) {
      throw Errors.internal(`No id was assigned to metric '${metric.qualifiedName}' after insert`, {
        metric: metric.qualifiedName,
      })
    }
    metric.markPersisted(id, row)
  }
}
