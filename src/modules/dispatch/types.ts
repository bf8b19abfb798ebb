/**
 * Types for the continuation dispatcher.
 */

import type { Phase } from '../../core/types.js'
import type { InstructionKind } from '../../persistence/queries/instructions.js'
import type { MemoryBoost } from '../memory/types.js'

export type { InstructionKind }

/** What the worker needs to know to do the phase's work */
export interface InstructionContext {
  goal: string
  intent: {
    goals: string[]
    antiGoals: string[]
    constraints: string[]
  }
  /** Artifacts accepted in earlier phases */
  priorArtifacts: string[]
  memoryBoost: MemoryBoost
  /** What the review chain will check */
  successCriteria: string[]
  /** Issues to fix; empty for fresh work */
  fixIssues: string[]
}

/** Handed to the external executor through the outbox */
export interface InstructionRequest {
  id: string
  namespace: string
  phase: Phase
  workerName: string
  tier: string
  kind: InstructionKind
  taskId: string
  context: InstructionContext
  createdAt: string
}

export type DispatchOutcomeKind =
  | 'enqueued'
  | 'duplicate'
  | 'stale'
  | 'remediation'
  | 'escalated'
  | 'intent-stop'
  | 'waiting'
  | 'completed'
  | 'rejected'

/** What happened to a signal or operator action, and why */
export interface DispatchOutcome {
  kind: DispatchOutcomeKind
  namespace: string | null
  phase: Phase | null
  reasons: string[]
  instruction?: InstructionRequest
  escalationId?: string
}

/**
 * Delivers an instruction to the executor. The outbox row is written first;
 * a sink failure leaves the row queued.
 */
export type InstructionSink = (instruction: InstructionRequest) => Promise<void>
