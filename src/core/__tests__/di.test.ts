/**
 * Unit tests for ServiceRegistry.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { ServiceRegistry } from '../di.js'
import type { BaseService } from '../di.js'

/** Service that appends lifecycle calls to a shared log */
function trackedService(name: string, log: string[], failOn?: 'initialize' | 'shutdown'): BaseService {
  return {
    async initialize() {
      if (failOn === 'initialize') throw new Error(`${name} failed to start`)
      log.push(`init:${name}`)
    },
    async shutdown() {
      if (failOn === 'shutdown') throw new Error(`${name} failed to stop`)
      log.push(`stop:${name}`)
    },
  }
}

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry
  let log: string[]

  beforeEach(() => {
    registry = new ServiceRegistry()
    log = []
  })

  it('registers and retrieves services by name', () => {
    const db = trackedService('database', log)
    registry.register('database', db)

    expect(registry.get('database')).toBe(db)
    expect(registry.has('database')).toBe(true)
    expect(registry.has('patternStore')).toBe(false)
    expect(() => registry.get('patternStore')).toThrow('Service "patternStore" is not registered')
  })

  it('refuses a duplicate name', () => {
    registry.register('database', trackedService('database', log))
    expect(() => registry.register('database', trackedService('other', log))).toThrow(
      'Service "database" is already registered',
    )
  })

  it('initializes in registration order and shuts down in reverse', async () => {
    registry.register('a', trackedService('a', log))
    registry.register('b', trackedService('b', log))
    registry.register('c', trackedService('c', log))

    await registry.initializeAll()
    await registry.shutdownAll()

    expect(registry.serviceNames).toEqual(['a', 'b', 'c'])
    expect(log).toEqual(['init:a', 'init:b', 'init:c', 'stop:c', 'stop:b', 'stop:a'])
    expect(registry.initializedNames).toEqual([])
  })

  it('does not initialize a service twice', async () => {
    registry.register('a', trackedService('a', log))
    await registry.initializeAll()
    registry.register('b', trackedService('b', log))
    await registry.initializeAll()

    expect(log).toEqual(['init:a', 'init:b'])
  })

  it('unwinds only the services that started', async () => {
    registry.register('a', trackedService('a', log))
    registry.register('b', trackedService('b', log, 'initialize'))
    registry.register('c', trackedService('c', log))

    await expect(registry.initializeAll()).rejects.toThrow('b failed to start')
    expect(registry.initializedNames).toEqual(['a'])

    await registry.shutdownAll()
    expect(log).toEqual(['init:a', 'stop:a'])
  })

  it('shuts every service down and reports all failures together', async () => {
    registry.register('a', trackedService('a', log))
    registry.register('b', trackedService('b', log, 'shutdown'))
    registry.register('c', trackedService('c', log, 'shutdown'))
    await registry.initializeAll()

    const failure = await registry.shutdownAll().then(
      () => undefined,
      (err: unknown) => err,
    )

    expect(failure).toBeInstanceOf(AggregateError)
    if (failure instanceof AggregateError) {
      expect(failure.message).toBe('Shutdown failed for 2 service(s)')
      expect(failure.errors.map((e: Error) => e.message)).toEqual(['c failed to stop', 'b failed to stop'])
    }
    expect(log).toEqual(['init:a', 'stop:a'])
  })
})
