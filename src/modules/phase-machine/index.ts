/**
 * Phase machine module: public exports.
 */

export type { PhaseMachine } from './phase-machine.js'
export type {
  AdvanceChecks,
  AdvanceResult,
  PhaseHistoryEntry,
  ProjectStatusSnapshot,
  RollbackResult,
} from './types.js'
export { PhaseMachineImpl, createPhaseMachine } from './phase-machine-impl.js'
export type { PhaseMachineOptions } from './phase-machine-impl.js'
