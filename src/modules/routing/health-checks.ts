/**
 * Health probes for the external services worker variants depend on.
 */

import { errorMessage, withTimeout } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('routing:health')

/** Resolves when the service is healthy, rejects otherwise */
export interface HealthCheck {
  name: string
  check(): Promise<void>
}

export class HealthCheckRegistry {
  private readonly _checks = new Map<string, HealthCheck>()
  private readonly _timeoutMs: number

  constructor(timeoutMs: number) {
    this._timeoutMs = timeoutMs
  }

  register(check: HealthCheck): void {
    this._checks.set(check.name, check)
  }

  /**
   * Probe the named dependencies concurrently. A dependency with no
   * registered check, a failing check or one that exceeds the timeout is
   * reported unhealthy.
   */
  async probe(dependencies: readonly string[]): Promise<Map<string, boolean>> {
    const unique = [...new Set(dependencies)]
    const results = await Promise.all(
      unique.map(async (name): Promise<[string, boolean]> => {
        const check = this._checks.get(name)
        if (check === undefined) {
          logger.warn({ dependency: name }, 'No health check registered; treating as unhealthy')
          return [name, false]
        }
        try {
          await withTimeout(check.check(), this._timeoutMs, `health check ${name}`)
          return [name, true]
        } catch (err) {
          logger.warn({ dependency: name, reason: errorMessage(err) }, 'Health check failed')
          return [name, false]
        }
      }),
    )
    return new Map(results)
  }
}
