/**
 * EngineEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "phase:advanced", "gate:failed")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { Namespace, Phase } from './types.js'

// ---------------------------------------------------------------------------
// EngineEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the engine event bus.
 * Use `keyof EngineEvents` to constrain event keys.
 */
export interface EngineEvents {
  // -------------------------------------------------------------------------
  // Engine lifecycle events
  // -------------------------------------------------------------------------

  /** Every service is initialized and the dispatcher accepts work */
  'engine:ready': Record<string, never>

  /** Shutdown started */
  'engine:shutdown': { reason: string }

  // -------------------------------------------------------------------------
  // Project lifecycle events
  // -------------------------------------------------------------------------

  /** A project was created from a first goal submission */
  'project:created': { namespace: Namespace; goal: string }

  /** The documentation phase passed; the project is terminal */
  'project:completed': { namespace: Namespace }

  /** An operator cancelled the project */
  'project:cancelled': { namespace: Namespace; previousPhase: Phase }

  // -------------------------------------------------------------------------
  // Phase events
  // -------------------------------------------------------------------------

  /** The project moved forward one phase */
  'phase:advanced': { namespace: Namespace; from: Phase; to: Phase }

  /** An operator moved the project back to an earlier phase */
  'phase:rolled-back': { namespace: Namespace; from: Phase; to: Phase; tasksReset: number }

  // -------------------------------------------------------------------------
  // Completion signal events
  // -------------------------------------------------------------------------

  /** A completion signal passed deduplication and staleness checks */
  'signal:accepted': { namespace: Namespace; signalId: string; phase: Phase }

  /** A completion signal was delivered again and ignored */
  'signal:duplicate': { namespace: Namespace; signalId: string }

  /** A completion signal referred to a superseded phase and was dropped */
  'signal:stale': {
    namespace: Namespace
    signalId: string
    signalPhase: Phase
    currentPhase: Phase | null
    reason: string
  }

  // -------------------------------------------------------------------------
  // Review events
  // -------------------------------------------------------------------------

  /** Triangulation produced a consensus for an artifact */
  'triangulation:complete': {
    artifactRef: string
    phase: Phase
    consensusScore: number
    unresolvedConflicts: number
  }

  /** A quality gate passed */
  'gate:passed': { namespace: Namespace; phase: Phase; gateName: string; score: number }

  /** A quality gate failed */
  'gate:failed': {
    namespace: Namespace
    phase: Phase
    gateName: string
    score: number
    retryCount: number
    issues: string[]
  }

  /** The review chain asked the executor to fix an artifact */
  'review:remediation-requested': {
    namespace: Namespace
    phase: Phase
    gateName: string
    artifactRef: string
    issues: string[]
  }

  // -------------------------------------------------------------------------
  // Escalation events
  // -------------------------------------------------------------------------

  /** Retries are exhausted or an intent conflict needs an operator */
  'escalation:required': {
    escalationId: string
    namespace: Namespace
    phase: Phase
    kind: 'gate' | 'intent'
    reason: string
  }

  /** An operator approved or rejected an escalation */
  'escalation:resolved': {
    escalationId: string
    namespace: Namespace
    decision: 'approved' | 'rejected'
  }

  // -------------------------------------------------------------------------
  // Intent events
  // -------------------------------------------------------------------------

  /** A proposed action conflicted with an anti-goal or constraint */
  'intent:conflict': { namespace: Namespace; action: string; reason: string }

  // -------------------------------------------------------------------------
  // Dispatch events
  // -------------------------------------------------------------------------

  /** An instruction request was handed to the external executor */
  'instruction:enqueued': {
    instructionId: string
    namespace: Namespace
    phase: Phase
    workerName: string
    kind: 'work' | 'remediation'
  }

  // -------------------------------------------------------------------------
  // Memory events
  // -------------------------------------------------------------------------

  /** A pattern store write was diverted to the local fallback queue */
  'memory:fallback': { key: string; reason: string }

  /** Queued fallback writes reached the primary store */
  'memory:flushed': { count: number }

  /** The retention policy removed records */
  'memory:pruned': { removed: number }
}
