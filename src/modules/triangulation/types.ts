/**
 * Types for the viewpoint triangulation engine.
 */

import type { Phase } from '../../core/types.js'

/** What one viewpoint evaluator reports */
export interface ViewpointEvaluation {
  /** Quality score in [0, 1] */
  score: number
  issues: string[]
}

/** Everything an evaluator gets to look at */
export interface EvaluationInput {
  viewpoint: string
  artifactRef: string
  phase: Phase
  /** Resolved artifact content */
  content: string
  /** Project goal, when known */
  goal?: string
}

/**
 * An independent, domain-specific evaluator. Implementations must not share
 * state; they run concurrently.
 */
export type ViewpointEvaluator = (input: EvaluationInput) => Promise<ViewpointEvaluation>

/** One viewpoint's contribution to a triangulation */
export interface ViewpointResult {
  viewpoint: string
  score: number
  issues: string[]
  /** Effective weight: domain weight × calibration (× timeout factor) */
  weight: number
  /** score >= pass threshold */
  passed: boolean
  /** True when the evaluator timed out or failed and the neutral score was used */
  timedOut: boolean
}

/** Two viewpoints that disagree on pass/fail by more than the conflict threshold */
export interface ViewpointConflict {
  viewpoints: [string, string]
  scoreGap: number
  /** True when weighting settles the disagreement */
  resolved: boolean
  reason: string
}

export interface TriangulationResult {
  /** Audit row id, when the result was persisted */
  id: string | null
  artifactRef: string
  phase: Phase
  viewpoints: ViewpointResult[]
  consensusScore: number
  conflicts: ViewpointConflict[]
  unresolvedConflicts: ViewpointConflict[]
  passed: boolean
}

export interface TriangulateOptions {
  /** Viewpoints to run (default: every registered evaluator) */
  viewpoints?: string[]
  /** Namespace for audit persistence */
  namespace?: string
  goal?: string
  /** Consensus needed to pass (default: review.pass_threshold) */
  passThreshold?: number
}
