/**
 * CapabilityRegistry: capability → ordered worker variants.
 *
 * Registration order is the tie-break between variants of the same tier.
 */

import { isPhase, type Phase } from '../../core/types.js'
import type { WorkersConfig } from '../config/config-schema.js'
import type { WorkerVariant } from './types.js'

export class CapabilityRegistry {
  private readonly _variants = new Map<string, WorkerVariant[]>()
  private readonly _phaseCapabilities = new Map<Phase, string>()

  /**
   * Build a registry from the workers section of the configuration.
   */
  static fromConfig(config: Readonly<WorkersConfig>): CapabilityRegistry {
    const registry = new CapabilityRegistry()
    for (const [capability, variants] of Object.entries(config.capabilities)) {
      for (const variant of variants) {
        registry.register(capability, variant)
      }
    }
    for (const [phase, capability] of Object.entries(config.phase_capabilities)) {
      if (isPhase(phase) && capability !== undefined) {
        registry.assignPhase(phase, capability)
      }
    }
    return registry
  }

  /**
   * Add a variant to a capability. A variant with the same name replaces
   * the earlier registration in place.
   */
  register(capability: string, variant: WorkerVariant): void {
    const variants = this._variants.get(capability) ?? []
    const copy = { ...variant, dependencies: [...variant.dependencies] }
    const existing = variants.findIndex((v) => v.name === variant.name)
    if (existing >= 0) {
      variants[existing] = copy
    } else {
      variants.push(copy)
    }
    this._variants.set(capability, variants)
  }

  assignPhase(phase: Phase, capability: string): void {
    this._phaseCapabilities.set(phase, capability)
  }

  /** Variants of a capability in registration order (empty when unknown) */
  variants(capability: string): WorkerVariant[] {
    return [...(this._variants.get(capability) ?? [])]
  }

  capabilityFor(phase: Phase): string | undefined {
    return this._phaseCapabilities.get(phase)
  }

  get capabilities(): string[] {
    return [...this._variants.keys()]
  }

  /** Every dependency any variant declares */
  get dependencies(): string[] {
    const names = new Set<string>()
    for (const variants of this._variants.values()) {
      for (const v of variants) v.dependencies.forEach((d) => names.add(d))
    }
    return [...names]
  }
}
