/**
 * ReviewChain interface definition.
 *
 * Runs an artifact through the configured quality gates in order. A gate
 * is a triangulation over its own viewpoint set; a failed gate stops the
 * pass so later gates never see an unremediated artifact.
 */

import type { Phase } from '../../core/types.js'
import type { RemediateFn, ReviewChainOutcome, ReviewContext } from './types.js'

export interface ReviewChain {
  /**
   * Run the gates from the current position.
   *
   * A failure below `max_retries` returns `remediation` with a fix
   * instruction and leaves the position on the failed gate. The failure that
   * reaches `max_retries` returns `escalated` and raises the escalation; a
   * later review of an exhausted gate returns `escalated` without re-running.
   */
  review(artifactRef: string, phase: Phase, context: ReviewContext): Promise<ReviewChainOutcome>

  /**
   * Review, remediate and review again until the chain passes or escalates.
   * Results of every pass are concatenated in the returned outcome.
   */
  reviewUntilSettled(
    artifactRef: string,
    phase: Phase,
    context: ReviewContext,
    remediate: RemediateFn,
  ): Promise<ReviewChainOutcome>

  /** Gate names in review order */
  readonly gateNames: string[]
}
