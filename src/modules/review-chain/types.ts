/**
 * Types for the sequential review chain.
 */

import type { Phase } from '../../core/types.js'
import type { ReviewProgress } from '../../persistence/queries/review.js'
import type { TriangulationResult } from '../triangulation/types.js'

export type { ReviewProgress }

/** Outcome of one gate in one pass */
export interface ReviewGateResult {
  gateName: string
  artifactRef: string
  passed: boolean
  /** Consensus score of the gate's triangulation */
  score: number
  issues: string[]
  /** Failed attempts on this gate so far, including this one */
  retryCount: number
  triangulation: TriangulationResult
}

/** What the executor is asked to fix after a failed gate */
export interface FixInstruction {
  gateName: string
  artifactRef: string
  phase: Phase
  issues: string[]
  /** Failed attempts so far */
  attempt: number
  /** Failures left before the gate escalates */
  remainingAttempts: number
}

/** Raised the one time a gate exhausts its retries */
export interface ReviewEscalation {
  escalationId: string
  gateName: string
  reason: string
}

export type ReviewStatus = 'passed' | 'remediation' | 'escalated'

export interface ReviewChainOutcome {
  status: ReviewStatus
  /** Gate results of this pass, in gate order */
  results: ReviewGateResult[]
  fixInstruction?: FixInstruction
  /** Set only on the pass that exhausted a gate's retries */
  escalation?: ReviewEscalation
  progress: ReviewProgress
}

export interface ReviewContext {
  namespace: string
  goal?: string
  /** Starting position; loaded from the database when omitted */
  progress?: ReviewProgress
  /**
   * The artifact answers a fix instruction. Keeps the gate position even
   * when the remediated artifact has a new reference.
   */
  remediation?: boolean
}

/**
 * Fixes an artifact. Resolves to the reference of the fixed artifact, or to
 * nothing when it was fixed in place.
 */
export type RemediateFn = (instruction: FixInstruction) => Promise<string | void>
