/**
 * Helper utility tests
 */

import { describe, it, expect } from 'vitest'
import { TimeoutError } from '../src/core/errors.js'
import {
  backoffDelay,
  clamp,
  errorMessage,
  generateId,
  isPlainObject,
  roundTo,
  sleep,
  withTimeout,
} from '../src/utils/helpers.js'

describe('generateId', () => {
  it('should include prefix when provided', () => {
    expect(generateId('sig').startsWith('sig-')).toBe(true)
  })

  it('should generate unique IDs', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId()))
    expect(ids.size).toBe(100)
  })
})

describe('withTimeout', () => {
  it('resolves with the promise value when it settles first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'fast op')).resolves.toBe('done')
  })

  it('rejects with TimeoutError when the timer wins', async () => {
    const slow = sleep(200).then(() => 'late')
    await expect(withTimeout(slow, 10, 'slow op')).rejects.toBeInstanceOf(TimeoutError)
  })

  it('propagates the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000, 'op')).rejects.toThrow('boom')
  })
})

describe('backoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    expect(backoffDelay(0, 100, 1000)).toBe(100)
    expect(backoffDelay(2, 100, 1000)).toBe(400)
    expect(backoffDelay(5, 100, 1000)).toBe(1000)
  })
})

describe('clamp and roundTo', () => {
  it('clamps into range', () => {
    expect(clamp(1.4, 0, 1)).toBe(1)
    expect(clamp(-0.2, 0, 1)).toBe(0)
    expect(clamp(0.5, 0, 1)).toBe(0.5)
  })

  it('rounds to the given decimals', () => {
    expect(roundTo(0.45454, 3)).toBe(0.455)
    expect(roundTo(2, 2)).toBe(2)
  })
})

describe('isPlainObject', () => {
  it('should return true for plain objects', () => {
    expect(isPlainObject({})).toBe(true)
    expect(isPlainObject(Object.create(null))).toBe(true)
  })

  it('should return false for non-plain-objects', () => {
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(null)).toBe(false)
    expect(isPlainObject('string')).toBe(false)
    expect(isPlainObject(new Date())).toBe(false)
  })
})

describe('errorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad')
    expect(errorMessage(42)).toBe('42')
  })
})
