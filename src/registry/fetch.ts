/**
 * Registry Reader
 *
 * Side-effect-free projection of the persisted registry onto a collection.
 * Issues exactly one read and no writes.
 */

import { Errors } from '../errors/factories.js'
import type { MetricCollection } from '../metrics/collection.js'
import { qualifiedName } from '../metrics/definition.js'
import { createLogger } from '../utils/logger.js'
import { indexDefinitions, type MetricDiagnostic } from './diagnostics.js'
import { RegisteredMetric, type RegistryContext } from './registered-metric.js'
import { hasAllTags, type TagResolver } from './tags.js'

const defaultLogger = createLogger('registry-fetch')

export interface FetchOptions {
  /** true = only enabled, false = only disabled, null/undefined = all */
  enabled?: boolean | null
  /** Keep only metrics carrying every one of these tags */
  tags?: readonly string[]
  /** Required when `tags` is non-empty */
  tagResolver?: TagResolver
}

export interface FetchResult {
  /** Registered metrics in collection order */
  metrics: Map<string, RegisteredMetric>
  diagnostics: MetricDiagnostic[]
}

/**
 * Read the registered metrics of a collection.
 *
 * Rows whose definition is not in the collection are left out silently.
 *
 * @example
 * ```typescript
 * const { metrics } = await fetchMetrics(collection, context, { enabled: true })
 * ```
 */
export async function fetchMetrics(
  collection: MetricCollection,
  context: RegistryContext,
  options: FetchOptions = {}
): Promise<FetchResult> {
  const tags = options.tags ?? []
  const tagResolver = options.tagResolver
  if (tags.length > 0 && !tagResolver) {
    throw Errors.validation('tags', 'filtering by tag requires a tag resolver')
  }

  const logger = context.logger ?? defaultLogger
  const { definitions, diagnostics } = indexDefinitions(collection, logger)

  const identities = Array.from(definitions.values(), (definition) => ({
    component: definition.component,
    name: definition.name,
  }))
  const rows = await context.store.findByIdentities(identities, { enabled: options.enabled ?? null })

  const found = new Map<string, RegisteredMetric>()
  for (const row of rows) {
    const name = qualifiedName(row.component, row.name)
    const definition = definitions.get(name)
    if (!definition) continue
    found.set(name, RegisteredMetric.fromRow(definition, row, context))
  }

  const metrics = new Map<string, RegisteredMetric>()
  for (const name of definitions.keys()) {
    const metric = found.get(name)
    if (!metric) continue
    if (tagResolver && !hasAllTags(tagResolver, name, tags)) continue
    metrics.set(name, metric)
  }

  return { metrics, diagnostics }
}
