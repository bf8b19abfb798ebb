/**
 * Routing module: barrel export.
 *
 * Public API for the routing module:
 *  - CapabilityRegistry: the worker priority table
 *  - HealthCheckRegistry: dependency probes with a timeout
 *  - WorkerSelector and the pure ranking helpers behind it
 */

export { CapabilityRegistry } from './capability-registry.js'

export type { HealthCheck } from './health-checks.js'
export { HealthCheckRegistry } from './health-checks.js'

export type { WorkerSelectorOptions } from './worker-selector.js'
export { WorkerSelector } from './worker-selector.js'

export { rankVariants, selectVariant, describeSelection } from './worker-selection.js'

export type {
  WorkerVariant,
  HealthSnapshot,
  SkippedVariant,
  VariantSelection,
  SelectionDecision,
} from './types.js'
