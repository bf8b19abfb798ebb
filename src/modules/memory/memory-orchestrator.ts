/**
 * MemoryOrchestrator interface: turns stored patterns into memory boosts
 * and learns from task outcomes.
 */

import type { Phase } from '../../core/types.js'
import type { EnhanceContext, MemoryBoost, TaskOutcome, ViewpointCalibration, ViewpointOutcome } from './types.js'

export interface MemoryOrchestrator {
  /**
   * Ranked patterns relevant to a task. Always resolves within the enhance
   * timeout; an unreachable store yields an empty, degraded boost.
   */
  enhance(workerName: string, taskType: string, context: EnhanceContext): Promise<MemoryBoost>

  /** Fold a task outcome into the pattern store. Never throws. */
  record(outcome: TaskOutcome): Promise<void>

  /**
   * Weight multiplier per viewpoint for a phase, from how often each
   * viewpoint agreed with final verdicts. Unknown viewpoints get 1.
   */
  viewpointCalibration(phase: Phase, viewpoints: string[]): Promise<ViewpointCalibration>

  /** Record whether a viewpoint agreed with a final verdict. Never throws. */
  recordViewpointOutcome(outcome: ViewpointOutcome): Promise<void>

  /**
   * Apply the configured retention policy.
   * @returns number of records removed
   */
  prune(): Promise<number>
}
