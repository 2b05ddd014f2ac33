/**
 * Store Driver Factory
 *
 * Creates store drivers with lazy loading.
 * The postgres driver (and `pg`) is only imported when used.
 */

import { Errors } from '../errors/factories.js'
import type {
  MemoryStoreOptions,
  MetricStore,
  MetricStoreConfig,
  MetricStoreType,
  PostgresStoreOptions,
} from './types.js'

// Lazy-loaded driver constructors
let MemoryStoreClass: typeof import('./drivers/memory.js').MemoryStore | null = null
let PostgresStoreClass: typeof import('./drivers/postgres.js').PostgresStore | null = null

/**
 * Lazily load the Memory driver
 */
async function loadMemoryStore(): Promise<typeof import('./drivers/memory.js').MemoryStore> {
  if (!MemoryStoreClass) {
    const module = await import('./drivers/memory.js')
    MemoryStoreClass = module.MemoryStore
  }
  return MemoryStoreClass
}

/**
 * Lazily load the Postgres driver
 */
async function loadPostgresStore(): Promise<typeof import('./drivers/postgres.js').PostgresStore> {
  if (!PostgresStoreClass) {
    const module = await import('./drivers/postgres.js')
    PostgresStoreClass = module.PostgresStore
  }
  return PostgresStoreClass
}

type CreateStoreArgs =
  | [type: 'memory', options?: MemoryStoreOptions]
  | [type: 'postgres', options: PostgresStoreOptions]

/**
 * Create a store driver by type
 *
 * @example Memory driver (default)
 * ```typescript
 * const store = await createStore('memory')
 * ```
 *
 * @example Postgres driver
 * ```typescript
 * const store = await createStore('postgres', {
 *   connectionString: 'postgres://localhost:5432/monitoring',
 * })
 * ```
 */
export async function createStore(type: 'memory', options?: MemoryStoreOptions): Promise<MetricStore>
export async function createStore(
  type: 'postgres',
  options: PostgresStoreOptions
): Promise<MetricStore>
export async function createStore(...args: CreateStoreArgs): Promise<MetricStore> {
  switch (args[0]) {
    case 'memory': {
      const Store = await loadMemoryStore()
      return new Store(args[1])
    }
    case 'postgres': {
      const Store = await loadPostgresStore()
      return new Store(args[1])
    }
  }
}

/**
 * Create a store driver from a configuration object
 *
 * @example
 * ```typescript
 * const store = await createStoreFromConfig({
 *   driver: 'postgres',
 *   options: { connectionString: config.databaseUrl },
 * })
 * ```
 */
export async function createStoreFromConfig(config: MetricStoreConfig): Promise<MetricStore> {
  switch (config.driver) {
    case 'memory':
      return createStore('memory', config.options)
    case 'postgres':
      return createStore('postgres', config.options)
  }
}

/**
 * Available driver types
 */
export const STORE_TYPES: readonly MetricStoreType[] = ['memory', 'postgres']

/**
 * Check if a driver type is valid
 */
export function isValidStoreType(type: string): type is MetricStoreType {
  return STORE_TYPES.some((known) => known === type)
}

/**
 * Assert a driver type, throwing a validation error otherwise
 */
export function assertStoreType(type: string): MetricStoreType {
  if (!isValidStoreType(type)) {
    throw Errors.validation('driver', `unknown store driver '${type}'`)
  }
  return type
}
