/**
 * PhaseMachineImpl: phase transitions over the projects table.
 *
 * Every transition runs in one SQLite transaction so the project row, its
 * tasks, review progress and escalations never disagree. Events are emitted
 * after the transaction commits.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { InvalidTransitionError, ProjectNotFoundError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { PHASE_SEQUENCE, nextPhase, phaseIndex, type Phase, type Project, type ProjectStatus } from '../../core/types.js'
import { closeOpenEscalations } from '../../persistence/queries/escalations.js'
import {
  createProject,
  deleteProject,
  getPhaseHistory,
  getProject,
  listProjects,
  updateProjectPhase,
  updateProjectStatus,
} from '../../persistence/queries/projects.js'
import { resetReviewProgress } from '../../persistence/queries/review.js'
import { failOpenTasks, getTasksForPhase, resetTasksAfterPhase } from '../../persistence/queries/tasks.js'
import { createLogger } from '../../utils/logger.js'
import type { PhaseMachine } from './phase-machine.js'
import type { AdvanceChecks, AdvanceResult, ProjectStatusSnapshot, RollbackResult } from './types.js'

const logger = createLogger('phase-machine')

const FIRST_PHASE: Phase = 'goal-clarification'

function isTerminal(status: ProjectStatus): boolean {
  return status === 'completed' || status === 'cancelled'
}

export interface PhaseMachineOptions {
  db: BetterSqlite3Database
  eventBus?: TypedEventBus
}

// ---------------------------------------------------------------------------
// PhaseMachineImpl
// ---------------------------------------------------------------------------

export class PhaseMachineImpl implements PhaseMachine {
  private readonly _db: BetterSqlite3Database
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: PhaseMachineOptions) {
    this._db = options.db
    this._eventBus = options.eventBus
  }

  createProject(namespace: string, goal: string): Project {
    if (getProject(this._db, namespace) !== undefined) {
      throw new InvalidTransitionError(`Project ${namespace} already exists`, { namespace })
    }
    const project = createProject(this._db, { namespace, goal }, FIRST_PHASE)
    logger.info({ namespace }, 'Project created')
    this._eventBus?.emit('project:created', { namespace, goal: project.goal })
    return project
  }

  discardProject(namespace: string): void {
    deleteProject(this._db, namespace)
    logger.info({ namespace }, 'Project discarded')
  }

  getProject(namespace: string): Project | undefined {
    return getProject(this._db, namespace)
  }

  status(namespace: string): ProjectStatusSnapshot {
    return { project: this._require(namespace), history: getPhaseHistory(this._db, namespace) }
  }

  advance(namespace: string, checks: AdvanceChecks): AdvanceResult {
    const project = this._require(namespace)
    const from = project.currentPhase
    const reasons = this._unmetConditions(project, checks)
    if (reasons.length > 0) {
      logger.debug({ namespace, phase: from, reasons }, 'Phase not advanced')
      return { advanced: false, from, to: null, completed: false, reasons }
    }

    const to = nextPhase(from)
    if (to === null) {
      updateProjectStatus(this._db, namespace, 'completed')
      logger.info({ namespace }, 'Project completed')
      this._eventBus?.emit('project:completed', { namespace })
      return { advanced: true, from, to: null, completed: true, reasons: [] }
    }

    updateProjectPhase(this._db, namespace, to, checks.override === true ? 'approved' : 'advanced')
    logger.info({ namespace, from, to }, 'Phase advanced')
    this._eventBus?.emit('phase:advanced', { namespace, from, to })
    return { advanced: true, from, to, completed: false, reasons: [] }
  }

  rollback(namespace: string, targetPhase: Phase): RollbackResult {
    const project = this._require(namespace)
    if (isTerminal(project.status)) {
      throw new InvalidTransitionError(`Project ${namespace} is ${project.status} and cannot be rolled back`, {
        namespace,
        status: project.status,
      })
    }
    const from = project.currentPhase
    if (phaseIndex(targetPhase) >= phaseIndex(from)) {
      throw new InvalidTransitionError(`Rollback target ${targetPhase} is not before ${from}`, {
        namespace,
        from,
        targetPhase,
      })
    }

    const result = this._db.transaction((): RollbackResult => {
      updateProjectPhase(this._db, namespace, targetPhase, 'rolled-back')
      const tasksReset = resetTasksAfterPhase(this._db, namespace, targetPhase)
      for (const phase of PHASE_SEQUENCE.slice(phaseIndex(targetPhase))) {
        resetReviewProgress(this._db, namespace, phase)
      }
      const escalationsClosed = closeOpenEscalations(this._db, namespace, `Rolled back to ${targetPhase}`)
      return { from, to: targetPhase, tasksReset, escalationsClosed }
    })()

    logger.info({ namespace, ...result }, 'Project rolled back')
    this._eventBus?.emit('phase:rolled-back', { namespace, from, to: targetPhase, tasksReset: result.tasksReset })
    return result
  }

  cancel(namespace: string): Project {
    const project = this._require(namespace)
    if (isTerminal(project.status)) {
      throw new InvalidTransitionError(`Project ${namespace} is already ${project.status}`, {
        namespace,
        status: project.status,
      })
    }

    this._db.transaction(() => {
      failOpenTasks(this._db, namespace)
      closeOpenEscalations(this._db, namespace, 'Project cancelled')
      updateProjectStatus(this._db, namespace, 'cancelled')
    })()

    logger.info({ namespace, phase: project.currentPhase }, 'Project cancelled')
    this._eventBus?.emit('project:cancelled', { namespace, previousPhase: project.currentPhase })
    return this._require(namespace)
  }

  listProjects(status?: ProjectStatus): Project[] {
    return listProjects(this._db, status)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _require(namespace: string): Project {
    const project = getProject(this._db, namespace)
    if (project === undefined) throw new ProjectNotFoundError(namespace)
    return project
  }

  private _unmetConditions(project: Project, checks: AdvanceChecks): string[] {
    if (project.status !== 'active') {
      return [`Project is ${project.status}`]
    }
    const reasons: string[] = []
    for (const task of getTasksForPhase(this._db, project.namespace, project.currentPhase)) {
      if (task.status !== 'completed') {
        reasons.push(`Task ${task.id} (${task.workerName}) is ${task.status}`)
      }
    }
    if (checks.override !== true) {
      if (!checks.reviewPassed) {
        reasons.push(`Review chain has not passed for ${project.currentPhase}`)
      }
      if (checks.intentDecision !== 'PROCEED') {
        reasons.push(`Intent check returned ${checks.intentDecision}`)
      }
    }
    return reasons
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createPhaseMachine(options: PhaseMachineOptions): PhaseMachine {
  return new PhaseMachineImpl(options)
}
