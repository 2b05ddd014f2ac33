/**
 * Store Factory Tests
 */

import { describe, it, expect } from 'vitest'
import {
  assertStoreType,
  createStore,
  createStoreFromConfig,
  isValidStoreType,
  STORE_TYPES,
} from './factory.js'
import { MemoryStore } from './drivers/memory.js'

describe('createStore', () => {
  it('should create a memory store', async () => {
    const store = await createStore('memory')
    expect(store).toBeInstanceOf(MemoryStore)
    expect(store.name).toBe('memory')
  })

  it('should pass options to the driver', async () => {
    const store = await createStore('memory', {
      seed: [
        {
          component: 'tool_x',
          name: 'a',
          enabled: true,
          config: null,
          timecreated: 1,
          timemodified: 1,
          usermodified: 'test-user',
        },
      ],
    })
    expect(await store.findAll()).toHaveLength(1)
  })

  it('should require a connection for postgres', async () => {
    await expect(createStore('postgres', {})).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'connectionString: is required when no pool is given',
    })
  })
})

describe('createStoreFromConfig', () => {
  it('should create the configured driver', async () => {
    const store = await createStoreFromConfig({ driver: 'memory' })
    expect(store.name).toBe('memory')
  })
})

describe('store types', () => {
  it('should list the available drivers', () => {
    expect(STORE_TYPES).toEqual(['memory', 'postgres'])
  })

  it('should validate driver names', () => {
    expect(isValidStoreType('postgres')).toBe(true)
    expect(isValidStoreType('redis')).toBe(false)
    expect(assertStoreType('memory')).toBe('memory')
    expect(() => assertStoreType('redis')).toThrow("driver: unknown store driver 'redis'")
  })
})
