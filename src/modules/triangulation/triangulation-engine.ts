/**
 * TriangulationEngine interface definition.
 *
 * Evaluates an artifact from several independent viewpoints in parallel and
 * synthesises a weighted consensus.
 */

import type { Phase } from '../../core/types.js'
import type { TriangulateOptions, TriangulationResult } from './types.js'

export interface TriangulationEngine {
  /**
   * Run the viewpoint evaluators against an artifact.
   *
   * - consensus = Σ(score·weight) / Σ(weight), rounded to 4 decimals
   * - a timed-out evaluator contributes the neutral score at reduced weight
   * - an unresolved conflict fails the result regardless of the consensus
   */
  triangulate(artifactRef: string, phase: Phase, options?: TriangulateOptions): Promise<TriangulationResult>

  /** Names of the viewpoints that have an evaluator */
  readonly viewpoints: string[]
}
