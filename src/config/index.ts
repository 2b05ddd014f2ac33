/**
 * Configuration
 *
 * Environment-driven settings, validated with zod at startup.
 *
 * | Variable                           | Default  |
 * |------------------------------------|----------|
 * | MONITORING_STORE                   | memory   |
 * | MONITORING_DATABASE_URL            | (none)   |
 * | MONITORING_BULK_INSERT_THRESHOLD   | 2        |
 * | MONITORING_ACTOR                   | system   |
 * | LOG_LEVEL                          | (none)   |
 *
 * `LOG_LEVEL` is only validated here; the logger reads it when it loads.
 */

import { z } from 'zod'
import { MonitoringError } from '../errors/monitoring-error.js'
import type { MetricStoreConfig } from '../store/types.js'

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const envSchema = z
  .object({
    MONITORING_STORE: z.enum(['memory', 'postgres']).default('memory'),
    MONITORING_DATABASE_URL: z.string().url().optional(),
    MONITORING_BULK_INSERT_THRESHOLD: z.coerce.number().int().min(0).default(2),
    MONITORING_ACTOR: z.string().min(1).default('system'),
    LOG_LEVEL: z.enum(logLevels).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.MONITORING_STORE === 'postgres' && !env.MONITORING_DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MONITORING_DATABASE_URL'],
        message: 'is required when MONITORING_STORE is postgres',
      })
    }
  })

export interface MonitoringConfig {
  store: MetricStoreConfig
  bulkInsertThreshold: number
  actor: string
}

/**
 * Parse and validate configuration from environment variables
 *
 * @example
 * ```typescript
 * const config = loadConfig()
 * const store = await createStoreFromConfig(config.store)
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitoringConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const problems = result.error.issues.map((issue) => ({
      variable: issue.path.map(String).join('.') || 'env',
      message: issue.message,
    }))
    throw new MonitoringError(
      'INVALID_ARGUMENT',
      `Invalid configuration: ${problems.map((p) => `${p.variable} ${p.message}`).join('; ')}`,
      { problems }
    )
  }

  const parsed = result.data
  const store: MetricStoreConfig =
    parsed.MONITORING_STORE === 'postgres'
      ? { driver: 'postgres', options: { connectionString: parsed.MONITORING_DATABASE_URL } }
      : { driver: 'memory' }

  return {
    store,
    bulkInsertThreshold: parsed.MONITORING_BULK_INSERT_THRESHOLD,
    actor: parsed.MONITORING_ACTOR,
  }
}
