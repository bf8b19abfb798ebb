/**
 * WorkerSelector: picks the worker for a phase from the priority table,
 * falling back to a lower tier when a dependency is down.
 */

import type { Phase } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { CapabilityRegistry } from './capability-registry.js'
import type { HealthCheckRegistry } from './health-checks.js'
import type { SelectionDecision } from './types.js'
import { describeSelection, rankVariants, selectVariant } from './worker-selection.js'

const logger = createLogger('routing')

export interface WorkerSelectorOptions {
  registry: CapabilityRegistry
  health: HealthCheckRegistry
  tierOrder: readonly string[]
}

export class WorkerSelector {
  private readonly _registry: CapabilityRegistry
  private readonly _health: HealthCheckRegistry
  private readonly _tierOrder: readonly string[]

  constructor(options: WorkerSelectorOptions) {
    this._registry = options.registry
    this._health = options.health
    this._tierOrder = options.tierOrder
  }

  /**
   * Select the worker for `phase`.
   * @returns null when the phase has no capability or no variant is usable
   */
  async selectForPhase(phase: Phase): Promise<SelectionDecision | null> {
    const capability = this._registry.capabilityFor(phase)
    if (capability === undefined) {
      logger.error({ phase }, 'No capability is assigned to phase')
      return null
    }
    const variants = this._registry.variants(capability)
    const health = await this._health.probe(variants.flatMap((v) => v.dependencies))
    const selection = selectVariant(variants, health, this._tierOrder)
    if (selection === null) {
      logger.error({ phase, capability }, 'No healthy worker variant')
      return null
    }

    const ranked = rankVariants(variants, this._tierOrder)
    const chosenAt = ranked.indexOf(selection.variant)
    const decision: SelectionDecision = {
      phase,
      capability,
      workerName: selection.variant.name,
      tier: selection.variant.tier,
      rationale: describeSelection(selection),
      fallbackChain: ranked.slice(0, chosenAt + 1).map((v) => v.name),
    }
    if (selection.skipped.length > 0) {
      logger.warn({ phase, worker: decision.workerName, rationale: decision.rationale }, 'Fell back to a lower tier')
    }
    return decision
  }
}
