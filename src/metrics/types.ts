/**
 * Metrics Types
 *
 * Values, labels and the definition contract every component-provided metric
 * implements.
 */

/** Metric types supported. A counter is a gauge that never decreases. */
export type MetricType = 'gauge' | 'counter'

/** Label key-value pairs; insertion order is the output order */
export type Labels = Record<string, string>

/** One numeric sample with its labels */
export interface MetricValue {
  readonly value: number
  readonly labels: Readonly<Labels>
}

/** Opaque, metric-specific configuration (a JSON object) */
export type MetricConfig = Record<string, unknown>

/** What `calculate` may produce */
export type CalculateResult = MetricValue | Iterable<MetricValue>

/**
 * Explicit description of one editable config field, consumed by whatever
 * renders a configuration form.
 */
export interface ConfigField {
  name: string
  type: 'string' | 'number' | 'boolean' | 'string[]' | 'number[]'
  default: unknown
  label: string
}

/**
 * Registry-facing metric contract.
 *
 * `component` + `name` form the identity; everything downstream keys on the
 * qualified name derived from them.
 */
export interface MetricDefinition {
  /** Owner namespace, stable across deployments */
  readonly component: string
  /** Unique within `component` */
  readonly name: string
  readonly type: MetricType
  /** Human-readable text, used as the HELP line */
  readonly description: string
  /** Editable fields of the config, if the metric is configurable */
  readonly configFields?: readonly ConfigField[]

  /** Produce the current value(s) for the given config */
  calculate(config: MetricConfig): CalculateResult | Promise<CalculateResult>

  /** Config stored when the metric is registered for the first time */
  defaultConfig?(): MetricConfig

  /**
   * Check a config before it is stored or used. Throws on invalid input and
   * returns the normalized config otherwise.
   */
  parseConfig?(config: MetricConfig): MetricConfig

  /** Reject values whose labels do not have the declared shape */
  validateValue?(value: MetricValue): MetricValue
}

/** Label validation strategies a definition can opt into */
export type LabelShape =
  /** Every value's labels must equal one of these maps */
  | { exact: readonly Labels[] }
  /** Every value's labels must have exactly these keys */
  | { names: readonly string[] }
