/**
 * PhaseMachine interface definition.
 *
 * Owns a project's position in the phase sequence:
 *   goal-clarification → … → documentation → completed
 * with cancel reachable from every non-terminal state and operator
 * rollback to any earlier phase.
 */

import type { Phase, Project, ProjectStatus } from '../../core/types.js'
import type { AdvanceChecks, AdvanceResult, ProjectStatusSnapshot, RollbackResult } from './types.js'

export interface PhaseMachine {
  /**
   * Register a project in `goal-clarification`.
   * @throws {InvalidTransitionError} when the namespace is taken
   */
  createProject(namespace: string, goal: string): Project

  /** Remove a project whose start did not complete */
  discardProject(namespace: string): void

  getProject(namespace: string): Project | undefined

  /** Project plus its phase history */
  status(namespace: string): ProjectStatusSnapshot

  /**
   * Move to the next phase when the current phase's tasks are all
   * completed, the review passed and intent said PROCEED. Never throws for
   * an unmet condition; the reasons say what is missing.
   */
  advance(namespace: string, checks: AdvanceChecks): AdvanceResult

  /**
   * Move strictly backward, resetting later-phase tasks to pending.
   * @throws {InvalidTransitionError} for a non-backward target or a terminal project
   */
  rollback(namespace: string, targetPhase: Phase): RollbackResult

  /**
   * @throws {InvalidTransitionError} when the project is already terminal
   */
  cancel(namespace: string): Project

  listProjects(status?: ProjectStatus): Project[]
}
