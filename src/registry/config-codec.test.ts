/**
 * Config Codec Tests
 */

import { describe, it, expect } from 'vitest'
import { deserializeConfig, serializeConfig } from './config-codec.js'

describe('config codec', () => {
  it('should round-trip config objects', () => {
    const configs = [
      {},
      { timewindows: [60, 300, 3600] },
      { label: 'weekly', nested: { enabled: true, ratio: 0.25 }, empty: null },
    ]
    for (const config of configs) {
      expect(deserializeConfig(serializeConfig(config))).toEqual(config)
    }
  })

  it('should reject invalid JSON', () => {
    expect(() => deserializeConfig('{not json')).toThrow(
      /^The provided `config` is not a valid JSON object: /
    )
  })

  it('should reject JSON that is not an object', () => {
    expect(() => deserializeConfig('[1,2]')).toThrow(
      'The provided `config` is not a valid JSON object: expected an object, got array'
    )
    expect(() => deserializeConfig('null')).toThrow('got null')
    expect(() => deserializeConfig('42')).toThrow('got number')
    expect(() => deserializeConfig('"text"')).toThrow('got string')
  })

  it('should raise an invalid argument error', () => {
    let caught: unknown
    try {
      deserializeConfig('[]')
    } catch (error) {
      caught = error
    }
    expect(caught).toMatchObject({ code: 'INVALID_ARGUMENT', status: 400 })
  })
})
