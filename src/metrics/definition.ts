/**
 * Metric Definitions
 *
 * Helpers for authoring metrics: an object-style `defineMetric` and a
 * class-style `BaseMetric` whose name derives from the subclass.
 */

import type { z } from 'zod'
import { Errors } from '../errors/factories.js'
import { labelValidator } from './labels.js'
import type {
  CalculateResult,
  ConfigField,
  LabelShape,
  MetricConfig,
  MetricDefinition,
  MetricType,
  MetricValue,
} from './types.js'

/**
 * Global identity of a metric
 */
export function qualifiedName(component: string, name: string): string {
  return `${component}_${name}`
}

/**
 * Convert a class name to snake_case (`UsersOnline` -> `users_online`)
 */
export function toSnakeCase(identifier: string): string {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase()
}

/**
 * Config declaration of a configurable metric
 */
export interface MetricConfigOptions<TConfig extends MetricConfig> {
  /** Zod schema the stored JSON object must satisfy */
  schema: z.ZodType<TConfig, z.ZodTypeDef, unknown>
  /** Config stored on first registration */
  defaults: TConfig
  /** Form field descriptors */
  fields?: readonly ConfigField[]
}

interface MetricOptionsBase {
  component: string
  name: string
  type: MetricType
  description: string
  /** Opt into one of the label validation strategies */
  labels?: LabelShape
  /** Custom validation; runs after the label shape check */
  validateValue?(value: MetricValue): MetricValue
}

export interface SimpleMetricOptions extends MetricOptionsBase {
  config?: undefined
  calculate(): CalculateResult | Promise<CalculateResult>
}

export interface ConfigurableMetricOptions<TConfig extends MetricConfig> extends MetricOptionsBase {
  config: MetricConfigOptions<TConfig>
  calculate(config: TConfig): CalculateResult | Promise<CalculateResult>
}

/**
 * Parse a config against a schema, turning zod issues into a validation error
 */
export function parseWithSchema<TConfig extends MetricConfig>(
  schema: z.ZodType<TConfig, z.ZodTypeDef, unknown>,
  config: unknown
): TConfig {
  const result = schema.safeParse(config)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : 'config'
    throw Errors.validation(field, issue?.message ?? 'invalid config', config)
  }
  return result.data
}

function composeValidators(
  labels: LabelShape | undefined,
  custom: ((value: MetricValue) => MetricValue) | undefined
): ((value: MetricValue) => MetricValue) | undefined {
  const shape = labels ? labelValidator(labels) : undefined
  if (shape && custom) return (value) => custom(shape(value))
  return shape ?? custom
}

/**
 * Define a metric from a plain object.
 *
 * @example Simple gauge
 * ```typescript
 * const courses = defineMetric({
 *   component: 'tool_monitoring',
 *   name: 'courses',
 *   type: 'gauge',
 *   description: 'Current number of courses',
 *   labels: { exact: [{ visible: 'true' }, { visible: 'false' }] },
 *   async calculate() {
 *     const { visible, hidden } = await countCourses()
 *     return [metricValue(visible, { visible: 'true' }), metricValue(hidden, { visible: 'false' })]
 *   },
 * })
 * ```
 *
 * @example Configurable gauge
 * ```typescript
 * const online = defineMetric({
 *   component: 'tool_monitoring',
 *   name: 'users_online',
 *   type: 'gauge',
 *   description: 'Users online per time window',
 *   labels: { names: ['time_window'] },
 *   config: {
 *     schema: z.object({ timewindows: z.array(z.number().positive()).min(1) }),
 *     defaults: { timewindows: [60, 300] },
 *   },
 *   calculate: ({ timewindows }) => timewindows.map((w) => metricValue(count(w), { time_window: `${w}s` })),
 * })
 * ```
 */
export function defineMetric(options: SimpleMetricOptions): MetricDefinition
export function defineMetric<TConfig extends MetricConfig>(
  options: ConfigurableMetricOptions<TConfig>
): MetricDefinition
export function defineMetric<TConfig extends MetricConfig>(
  options: SimpleMetricOptions | ConfigurableMetricOptions<TConfig>
): MetricDefinition {
  const base = {
    component: options.component,
    name: options.name,
    type: options.type,
    description: options.description,
    validateValue: composeValidators(options.labels, options.validateValue),
  }

  if (options.config === undefined) {
    const calculate = options.calculate
    return {
      ...base,
      calculate: () => calculate(),
    }
  }

  const { schema, defaults, fields } = options.config
  const calculate = options.calculate
  return {
    ...base,
    configFields: fields,
    defaultConfig: () => structuredClone(defaults),
    parseConfig: (config) => parseWithSchema(schema, config),
    calculate: (config) => calculate(parseWithSchema(schema, config)),
  }
}

/**
 * Class-style metric. The name defaults to the snake_case class name and can
 * be overridden with a getter.
 *
 * @example
 * ```typescript
 * class UsersOnline extends BaseMetric {
 *   readonly component = 'tool_monitoring'
 *   readonly type = 'gauge'
 *   readonly description = 'Users online'
 *   calculate() { return metricValue(42) }
 * }
 * new UsersOnline().name // 'users_online'
 * ```
 */
export abstract class BaseMetric implements MetricDefinition {
  abstract readonly component: string
  abstract readonly type: MetricType
  abstract readonly description: string

  get name(): string {
    return toSnakeCase(this.constructor.name)
  }

  abstract calculate(config: MetricConfig): CalculateResult | Promise<CalculateResult>
}
