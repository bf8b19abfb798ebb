/**
 * Types for the phase state machine.
 */

import type { Phase, Project } from '../../core/types.js'
import type { PhaseHistoryEntry } from '../../persistence/queries/projects.js'
import type { AlignmentDecision } from '../intent/types.js'

export type { PhaseHistoryEntry }

/** Outcomes of the checks `advance` depends on */
export interface AdvanceChecks {
  /** The review chain passed for the phase's artifact */
  reviewPassed: boolean
  intentDecision: AlignmentDecision
  /**
   * Operator approval: skips the review and intent checks. Tasks must still
   * be complete.
   */
  override?: boolean
}

export interface AdvanceResult {
  advanced: boolean
  from: Phase
  /** Phase entered; null when the project completed or did not move */
  to: Phase | null
  /** True when this advance finished the documentation phase */
  completed: boolean
  /** Why the project did not advance (empty on success) */
  reasons: string[]
}

export interface RollbackResult {
  from: Phase
  to: Phase
  tasksReset: number
  escalationsClosed: number
}

export interface ProjectStatusSnapshot {
  project: Project
  history: PhaseHistoryEntry[]
}
