/**
 * Metrics
 *
 * Values, definitions, collections, label validation and exporters.
 */

export { metricValue, isMetricValue } from './value.js'
export {
  qualifiedName,
  toSnakeCase,
  parseWithSchema,
  defineMetric,
  BaseMetric,
} from './definition.js'
export { sameLabels, strictLabels, strictLabelNames, labelValidator } from './labels.js'
export { MetricCollection, collectMetrics } from './collection.js'
export { exportPrometheus, exportJson, exportMetrics } from './exporters.js'

export type {
  MetricType,
  Labels,
  MetricValue,
  MetricConfig,
  CalculateResult,
  ConfigField,
  MetricDefinition,
  LabelShape,
} from './types.js'
export type {
  MetricConfigOptions,
  SimpleMetricOptions,
  ConfigurableMetricOptions,
} from './definition.js'
export type { MetricCollector } from './collection.js'
export type { ExportableMetric, ExportFormat, JsonMetricSnapshot } from './exporters.js'
