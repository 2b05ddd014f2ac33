/**
 * Registered Metric
 *
 * A metric definition together with its persisted registry state: enabled
 * flag, serialized config, audit fields and row id. Iterating an instance
 * calculates and validates the current values.
 */

import { z } from 'zod'
import { Errors } from '../errors/factories.js'
import { qualifiedName } from '../metrics/definition.js'
import { isMetricValue } from '../metrics/value.js'
import type {
  ConfigField,
  MetricConfig,
  MetricDefinition,
  MetricType,
  MetricValue,
} from '../metrics/types.js'
import type { MetricRowUpdate, MetricStore, NewMetricRow } from '../store/types.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { deserializeConfig, serializeConfig } from './config-codec.js'
import type { MetricEventEmitter, MetricEventType } from './events.js'

const defaultLogger = createLogger('registered-metric')

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Collaborators of one logical operation. Passed explicitly; nothing is
 * read from ambient state.
 */
export interface RegistryContext {
  store: MetricStore
  /** Recorded in `usermodified` on every write */
  actor: string
  /** Current Unix time in seconds */
  clock?: () => number
  /** Receives notifications after commit */
  events?: MetricEventEmitter
  logger?: Logger
}

/**
 * Persisted state of a registered metric; nullable fields are unset until
 * the row exists.
 */
export interface RegisteredMetricState {
  id: number | null
  enabled: boolean
  config: string | null
  timecreated: number | null
  timemodified: number | null
  usermodified: string | null
}

/**
 * Changes applied by `applyChanges`; omitted fields are left alone
 */
export interface MetricChanges {
  enabled?: boolean
  config?: MetricConfig
}

/**
 * Current Unix time in seconds
 */
export function unixNow(): number {
  return Math.floor(Date.now() / 1000)
}

const rowSchema = z.object({
  id: z.number().int().nullable().default(null),
  component: z.string().min(1),
  name: z.string().min(1),
  enabled: z.boolean().default(false),
  config: z.string().nullable().default(null),
  timecreated: z.number().int().nullable().default(null),
  timemodified: z.number().int().nullable().default(null),
  usermodified: z.string().nullable().default(null),
})

// ─────────────────────────────────────────────────────────────────────────────
// Registered Metric Class
// ─────────────────────────────────────────────────────────────────────────────

export class RegisteredMetric implements AsyncIterable<MetricValue> {
  private state: RegisteredMetricState

  private constructor(
    readonly definition: MetricDefinition,
    private readonly context: RegistryContext,
    state: RegisteredMetricState
  ) {
    this.state = state
  }

  /**
   * Rebuild a registered metric from a stored row.
   *
   * Rows are validated: `component` and `name` are required, and `config`
   * must decode to a JSON object.
   *
   * @example
   * ```typescript
   * const metric = RegisteredMetric.fromRow(coursesMetric, row, { store, actor: 'admin' })
   * ```
   */
  static fromRow(definition: MetricDefinition, row: unknown, context: RegistryContext): RegisteredMetric {
    const parsed = rowSchema.safeParse(row)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const field = issue?.path.map(String).join('.') || 'row'
      const missing = issue?.code === 'invalid_type' && issue.received === 'undefined'
      throw Errors.malformedRow(field, missing ? 'is required' : `is invalid: ${issue?.message}`)
    }

    const data = parsed.data
    const expected = qualifiedName(definition.component, definition.name)
    const actual = qualifiedName(data.component, data.name)
    if (actual !== expected) {
      throw Errors.malformedRow('name', `does not match the definition '${expected}' (got '${actual}')`)
    }
    if (data.config !== null) {
      deserializeConfig(data.config)
    }

    return new RegisteredMetric(definition, context, {
      id: data.id,
      enabled: data.enabled,
      config: data.config,
      timecreated: data.timecreated,
      timemodified: data.timemodified,
      usermodified: data.usermodified,
    })
  }

  /**
   * Wrap a definition that has no row yet. Without an explicit `config`
   * the definition's default config is stored.
   */
  static fromDefinition(
    definition: MetricDefinition,
    context: RegistryContext,
    overrides: Partial<RegisteredMetricState> = {}
  ): RegisteredMetric {
    const defaults = definition.defaultConfig?.()
    return new RegisteredMetric(definition, context, {
      id: null,
      enabled: false,
      timecreated: null,
      timemodified: null,
      usermodified: null,
      ...overrides,
      config:
        overrides.config !== undefined
          ? overrides.config
          : defaults !== undefined
            ? serializeConfig(defaults)
            : null,
    })
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Accessors
  // ───────────────────────────────────────────────────────────────────────────

  get qualifiedName(): string {
    return qualifiedName(this.definition.component, this.definition.name)
  }

  get component(): string {
    return this.definition.component
  }

  get name(): string {
    return this.definition.name
  }

  get type(): MetricType {
    return this.definition.type
  }

  get description(): string {
    return this.definition.description
  }

  get configFields(): readonly ConfigField[] {
    return this.definition.configFields ?? []
  }

  get configurable(): boolean {
    return this.definition.parseConfig !== undefined
  }

  get id(): number | null {
    return this.state.id
  }

  get enabled(): boolean {
    return this.state.enabled
  }

  /** Serialized config as stored */
  get rawConfig(): string | null {
    return this.state.config
  }

  /** Decoded config; null when the metric has none */
  get config(): MetricConfig | null {
    return this.state.config === null ? null : deserializeConfig(this.state.config)
  }

  get timecreated(): number | null {
    return this.state.timecreated
  }

  get timemodified(): number | null {
    return this.state.timemodified
  }

  get usermodified(): string | null {
    return this.state.usermodified
  }

  /**
   * Insertable row. Unset audit fields are filled from the context.
   */
  toRow(): NewMetricRow {
    const now = this.now()
    return {
      component: this.component,
      name: this.name,
      enabled: this.state.enabled,
      config: this.state.config,
      timecreated: this.state.timecreated ?? now,
      timemodified: this.state.timemodified ?? now,
      usermodified: this.state.usermodified ?? this.context.actor,
    }
  }

  /**
   * Record the id and audit fields of the row that was just inserted.
   * @internal Used by reconciliation.
   */
  markPersisted(id: number, row: NewMetricRow): void {
    this.state = {
      ...this.state,
      id,
      timecreated: row.timecreated,
      timemodified: row.timemodified,
      usermodified: row.usermodified,
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Enable the metric. No-op when it is already enabled.
   */
  async enable(): Promise<boolean> {
    const applied = await this.applyChanges({ enabled: true })
    return applied.length > 0
  }

  /**
   * Disable the metric. No-op when it is already disabled.
   */
  async disable(): Promise<boolean> {
    const applied = await this.applyChanges({ enabled: false })
    return applied.length > 0
  }

  /**
   * Replace the config. No-op when the normalized config is unchanged.
   */
  async updateConfig(config: MetricConfig): Promise<boolean> {
    const applied = await this.applyChanges({ config })
    return applied.length > 0
  }

  /**
   * Apply several changes in one transaction. Only fields that differ from
   * the current state are written, and one notification per change fires
   * after commit. Returns the notifications that were emitted.
   *
   * @example
   * ```typescript
   * await metric.applyChanges({ enabled: true, config: { timewindows: [60] } })
   * // ['enabled', 'config_updated']
   * ```
   */
  async applyChanges(changes: MetricChanges): Promise<MetricEventType[]> {
    const fields: MetricRowUpdate = {}
    const events: MetricEventType[] = []

    if (changes.enabled !== undefined && changes.enabled !== this.state.enabled) {
      fields.enabled = changes.enabled
      events.push(changes.enabled ? 'enabled' : 'disabled')
    }

    if (changes.config !== undefined) {
      const parse = this.definition.parseConfig
      if (!parse) {
        throw Errors.validation('config', `metric '${this.qualifiedName}' is not configurable`)
      }
      const serialized = serializeConfig(parse(changes.config))
      if (serialized !== this.state.config) {
        fields.config = serialized
        events.push('config_updated')
      }
    }

    if (events.length === 0) return []

    const id = this.state.id
    if (id === null) {
      throw Errors.notPersisted(this.qualifiedName)
    }

    const timestamp = this.now()
    const actor = this.context.actor
    fields.timemodified = timestamp
    fields.usermodified = actor

    await this.context.store.transaction(async (session) => {
      const updated = await session.update(id, fields)
      if (updated === 0) {
        throw Errors.notFound('Metric', this.qualifiedName)
      }
    })
    this.state = { ...this.state, ...fields }

    const logger = this.context.logger ?? defaultLogger
    logger.info({ metric: this.qualifiedName, actor, changes: events }, 'Metric updated')

    // Listener failures are reported by the emitter; the write stays committed
    for (const type of events) {
      this.context.events?.emitMetric(type, {
        metric: this.qualifiedName,
        objectId: id,
        actor,
        timestamp,
      })
    }
    return events
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Values
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Calculate the current values, validating each one as it is produced
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<MetricValue, void, undefined> {
    const config = this.config ?? this.definition.defaultConfig?.() ?? {}
    const result = await this.definition.calculate(config)
    const values = isMetricValue(result) ? [result] : result
    for (const value of values) {
      yield this.definition.validateValue ? this.definition.validateValue(value) : value
    }
  }

  /**
   * Collect every current value
   */
  async values(): Promise<MetricValue[]> {
    const values: MetricValue[] = []
    for await (const value of this) {
      values.push(value)
    }
    return values
  }

  private now(): number {
    return (this.context.clock ?? unixNow)()
  }
}
