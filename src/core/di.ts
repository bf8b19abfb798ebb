/**
 * Service lifecycle registry used by the engine's composition root.
 *
 * Modules never construct each other; createEngine() builds them with
 * constructor injection and registers the ones that own resources (the
 * database connection, the pattern store's flush timer) here.
 */

import { errorMessage } from '../utils/helpers.js'

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/** A module that holds resources between initialize() and shutdown() */
export interface BaseService {
  initialize(): Promise<void>
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Named services, initialized in registration order and shut down in
 * reverse. Only services whose initialize() resolved are shut down, so a
 * failed start can be unwound with shutdownAll().
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('database', databaseService)
 * registry.register('patternStore', patternStore)
 * await registry.initializeAll()
 * // ...
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _initialized: string[] = []

  /**
   * @throws {Error} if the name is taken
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
  }

  /**
   * @throws {Error} if no service of that name is registered
   */
  get(name: string): BaseService {
    const service = this._services.get(name)
    if (service === undefined) {
      throw new Error(`Service "${name}" is not registered`)
    }
    return service
  }

  has(name: string): boolean {
    return this._services.has(name)
  }

  /** Registered names in registration order */
  get serviceNames(): string[] {
    return [...this._services.keys()]
  }

  /** Names of services currently initialized, in initialization order */
  get initializedNames(): string[] {
    return [...this._initialized]
  }

  /**
   * Initialize services not yet initialized, in registration order. Stops at
   * the first failure; services after it are left untouched.
   */
  async initializeAll(): Promise<void> {
    for (const [name, service] of this._services) {
      if (this._initialized.includes(name)) continue
      await service.initialize()
      this._initialized.push(name)
    }
  }

  /**
   * Shut down initialized services in reverse order. Every service gets its
   * turn; failures are rethrown together as one AggregateError at the end.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    while (this._initialized.length > 0) {
      const name = this._initialized.pop()
      const service = name === undefined ? undefined : this._services.get(name)
      if (service === undefined) continue
      try {
        await service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(errorMessage(err)))
      }
    }
    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown failed for ${String(errors.length)} service(s)`)
    }
  }
}
