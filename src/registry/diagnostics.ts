/**
 * Collection Diagnostics
 *
 * Non-fatal findings of a registry pass. Duplicate qualified names are
 * reported here instead of being thrown.
 */

import { qualifiedName } from '../metrics/definition.js'
import type { MetricCollection } from '../metrics/collection.js'
import type { MetricDefinition } from '../metrics/types.js'
import type { Logger } from '../utils/logger.js'

export type MetricDiagnosticCode = 'DUPLICATE_METRIC'

export interface MetricDiagnostic {
  code: MetricDiagnosticCode
  /** Qualified name the diagnostic is about */
  qualifiedName: string
  message: string
}

/**
 * Diagnostic for a qualified name collected more than once
 */
export function duplicateMetric(name: string): MetricDiagnostic {
  return {
    code: 'DUPLICATE_METRIC',
    qualifiedName: name,
    message: `Collected more than one metric with the qualified name ${name}`,
  }
}

/**
 * Index a collection by qualified name; the first occurrence wins.
 * One diagnostic is produced per duplicated name, however often it repeats.
 */
export function indexDefinitions(
  collection: MetricCollection,
  logger: Logger
): { definitions: Map<string, MetricDefinition>; diagnostics: MetricDiagnostic[] } {
  const definitions = new Map<string, MetricDefinition>()
  const duplicated = new Set<string>()
  const diagnostics: MetricDiagnostic[] = []

  for (const definition of collection) {
    const name = qualifiedName(definition.component, definition.name)
    if (!definitions.has(name)) {
      definitions.set(name, definition)
      continue
    }
    if (duplicated.has(name)) continue
    duplicated.add(name)
    const diagnostic = duplicateMetric(name)
    diagnostics.push(diagnostic)
    logger.warn({ metric: name }, diagnostic.message)
  }

  return { definitions, diagnostics }
}
