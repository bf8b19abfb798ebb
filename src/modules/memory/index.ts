/**
 * Memory orchestrator module: public exports.
 */

export type { MemoryOrchestrator } from './memory-orchestrator.js'
export type {
  BoostedPattern,
  EnhanceContext,
  MemoryBoost,
  TaskOutcome,
  ViewpointCalibration,
  ViewpointOutcome,
} from './types.js'
export { MemoryOrchestratorImpl, createMemoryOrchestrator, recencyDecay, workerTag } from './memory-orchestrator-impl.js'
export type { MemoryOrchestratorOptions } from './memory-orchestrator-impl.js'
