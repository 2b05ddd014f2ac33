/**
 * Metric Event Emitter
 *
 * EventEmitter with wildcard pattern support for registry notifications.
 * Events are named `metric:<type>` and fire only after the mutating
 * transaction has committed.
 *
 * @example
 * const events = new MetricEventEmitter()
 *
 * events.onMetric('enabled', (data) => audit.write(data))
 * events.onMetric('*', (data) => console.log(data.type, data.metric))
 */

import { EventEmitter } from 'node:events'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('metric-events')

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type MetricEventType = 'enabled' | 'disabled' | 'config_updated'

/**
 * Notification payload
 */
export interface MetricEventData {
  type: MetricEventType
  /** Qualified name of the metric */
  metric: string
  /** Registry row id */
  objectId: number
  /** Actor that performed the change */
  actor: string
  /** Unix timestamp (seconds) written to `timemodified` */
  timestamp: number
}

export type MetricEventListener = (data: MetricEventData) => void

/**
 * Event emitter options
 */
export interface MetricEventEmitterOptions {
  /**
   * Maximum number of listeners per event
   * @default 100
   */
  maxListeners?: number
}

/**
 * Event statistics
 */
export interface MetricEventStats {
  totalEvents: number
  eventCounts: Record<string, number>
}

// ─────────────────────────────────────────────────────────────────────────────
// Metric Event Emitter Class
// ─────────────────────────────────────────────────────────────────────────────

export class MetricEventEmitter extends EventEmitter {
  private wildcardListeners = new Set<MetricEventListener>()
  private eventCounts = new Map<string, number>()

  constructor(options: MetricEventEmitterOptions = {}) {
    super()
    this.setMaxListeners(options.maxListeners ?? 100)
  }

  /**
   * Listen to one notification type, or to all of them with `'*'`
   */
  onMetric(type: MetricEventType | '*', listener: MetricEventListener): this {
    if (type === '*') {
      this.wildcardListeners.add(listener)
      return this
    }
    return this.on(`metric:${type}`, listener)
  }

  /**
   * Remove a listener registered with `onMetric`
   */
  offMetric(type: MetricEventType | '*', listener: MetricEventListener): this {
    if (type === '*') {
      this.wildcardListeners.delete(listener)
      return this
    }
    return this.off(`metric:${type}`, listener)
  }

  /**
   * Emit a notification to exact and wildcard listeners. A listener that
   * throws is reported through `error`, or logged, and the rest still run.
   */
  emitMetric(type: MetricEventType, data: Omit<MetricEventData, 'type'>): boolean {
    const eventName = `metric:${type}`
    const payload: MetricEventData = { ...data, type }

    this.eventCounts.set(eventName, (this.eventCounts.get(eventName) ?? 0) + 1)

    const listeners = this.rawListeners(eventName)
    for (const listener of listeners) {
      try {
        listener.call(this, payload)
      } catch (err) {
        this.reportListenerError(eventName, err)
      }
    }

    for (const listener of this.wildcardListeners) {
      try {
        listener(payload)
      } catch (err) {
        this.reportListenerError(eventName, err)
      }
    }

    return listeners.length > 0 || this.wildcardListeners.size > 0
  }

  /**
   * Get event statistics
   */
  getStats(): MetricEventStats {
    return {
      totalEvents: Array.from(this.eventCounts.values()).reduce((a, b) => a + b, 0),
      eventCounts: Object.fromEntries(this.eventCounts),
    }
  }

  /**
   * Reset event counters
   */
  resetStats(): void {
    this.eventCounts.clear()
  }

  /**
   * Remove all listeners including wildcard listeners
   */
  override removeAllListeners(event?: string | symbol): this {
    if (event === undefined) {
      this.wildcardListeners.clear()
    }
    return super.removeAllListeners(event)
  }

  private reportListenerError(eventName: string, err: unknown): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', err)
      return
    }
    logger.warn({ err, event: eventName }, 'Metric event listener failed')
  }
}

/**
 * Create a new metric event emitter
 */
export function createMetricEventEmitter(options?: MetricEventEmitterOptions): MetricEventEmitter {
  return new MetricEventEmitter(options)
}
