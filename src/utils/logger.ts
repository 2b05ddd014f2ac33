/**
 * Logger Utility
 *
 * Simple logger using pino with pretty-print in development.
 */

import pino from 'pino'

const env = process.env.NODE_ENV
const isDev = env !== 'production' && env !== 'test'

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL
  if (env === 'test') return 'silent'
  return isDev ? 'debug' : 'info'
}

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: resolveLevel(),
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
})

export type Logger = pino.Logger

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): Logger {
  return baseLogger
}
