/**
 * Public API re-exports for the dispatch module.
 */

export type { ContinuationDispatcher } from './continuation-dispatcher.js'
export {
  ContinuationDispatcherImpl,
  createContinuationDispatcher,
} from './continuation-dispatcher-impl.js'
export type { ContinuationDispatcherOptions } from './continuation-dispatcher-impl.js'
export { NamespaceQueue } from './namespace-queue.js'
export { buildInstructionContext, priorArtifacts, successCriteria } from './instruction-builder.js'
export type {
  DispatchOutcome,
  DispatchOutcomeKind,
  InstructionContext,
  InstructionKind,
  InstructionRequest,
  InstructionSink,
} from './types.js'
