/**
 * Project query functions for the SQLite persistence layer.
 *
 * All functions accept a raw BetterSqlite3 database instance and use
 * prepared statements: no string interpolation, no ORM.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Phase, Project, ProjectStatus } from '../../core/types.js'
import {
  CreateProjectInputSchema,
  PhaseEnum,
  ProjectStatusEnum,
  type CreateProjectInput,
} from '../schemas/records.js'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

interface ProjectRow {
  namespace: string
  goal: string
  current_phase: string
  status: string
  phase_history_json: string
  created_at: string
  updated_at: string
}

/** One entry of a project's phase history */
export interface PhaseHistoryEntry {
  phase: Phase
  enteredAt: string
  /** How the project got here: created, advanced, rolled-back, approved */
  via: 'created' | 'advanced' | 'rolled-back' | 'approved'
}

function toProject(row: ProjectRow): Project {
  return {
    namespace: row.namespace,
    goal: row.goal,
    currentPhase: PhaseEnum.parse(row.current_phase),
    status: ProjectStatusEnum.parse(row.status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Insert a new project in the first phase.
 */
export function createProject(
  db: BetterSqlite3Database,
  input: CreateProjectInput,
  firstPhase: Phase,
  now: string = new Date().toISOString(),
): Project {
  const validated = CreateProjectInputSchema.parse(input)
  const history: PhaseHistoryEntry[] = [{ phase: firstPhase, enteredAt: now, via: 'created' }]
  db.prepare(
    `INSERT INTO projects (namespace, goal, current_phase, status, phase_history_json, created_at, updated_at)
     VALUES (?, ?, ?, 'active', ?, ?, ?)`,
  ).run(validated.namespace, validated.goal, firstPhase, JSON.stringify(history), now, now)

  const project = getProject(db, validated.namespace)
  if (project === undefined) {
    throw new Error(`Project ${validated.namespace} was not persisted`)
  }
  return project
}

export function getProject(db: BetterSqlite3Database, namespace: string): Project | undefined {
  const row = db.prepare('SELECT * FROM projects WHERE namespace = ?').get(namespace) as
    | ProjectRow
    | undefined
  return row === undefined ? undefined : toProject(row)
}

export function listProjects(db: BetterSqlite3Database, status?: ProjectStatus): Project[] {
  const rows = (
    status === undefined
      ? db.prepare('SELECT * FROM projects ORDER BY created_at ASC, namespace ASC').all()
      : db.prepare('SELECT * FROM projects WHERE status = ? ORDER BY created_at ASC, namespace ASC').all(status)
  ) as ProjectRow[]
  return rows.map(toProject)
}

/**
 * Move a project to `phase`, appending to its phase history.
 */
export function updateProjectPhase(
  db: BetterSqlite3Database,
  namespace: string,
  phase: Phase,
  via: PhaseHistoryEntry['via'],
  now: string = new Date().toISOString(),
): void {
  const history = getPhaseHistory(db, namespace)
  history.push({ phase, enteredAt: now, via })
  db.prepare(
    'UPDATE projects SET current_phase = ?, phase_history_json = ?, updated_at = ? WHERE namespace = ?',
  ).run(phase, JSON.stringify(history), now, namespace)
}

export function updateProjectStatus(
  db: BetterSqlite3Database,
  namespace: string,
  status: ProjectStatus,
  now: string = new Date().toISOString(),
): void {
  db.prepare('UPDATE projects SET status = ?, updated_at = ? WHERE namespace = ?').run(
    ProjectStatusEnum.parse(status),
    now,
    namespace,
  )
}

/**
 * Remove a project together with the rows its start wrote: intent entries,
 * tasks and queued instructions.
 */
export function deleteProject(db: BetterSqlite3Database, namespace: string): void {
  const remove = db.transaction(() => {
    db.prepare('DELETE FROM instructions WHERE namespace = ?').run(namespace)
    db.prepare('DELETE FROM tasks WHERE namespace = ?').run(namespace)
    db.prepare('DELETE FROM intent_entries WHERE namespace = ?').run(namespace)
    db.prepare('DELETE FROM projects WHERE namespace = ?').run(namespace)
  })
  remove()
}

/**
 * Parsed phase history for a project. Returns an empty array if the project
 * does not exist or the stored JSON is unreadable.
 */
export function getPhaseHistory(db: BetterSqlite3Database, namespace: string): PhaseHistoryEntry[] {
  const row = db.prepare('SELECT phase_history_json FROM projects WHERE namespace = ?').get(namespace) as
    | { phase_history_json: string }
    | undefined
  if (row === undefined) return []
  try {
    const parsed: unknown = JSON.parse(row.phase_history_json)
    return Array.isArray(parsed) ? parsed.filter(isHistoryEntry) : []
  } catch {
    return []
  }
}

function isHistoryEntry(value: unknown): value is PhaseHistoryEntry {
  if (typeof value !== 'object' || value === null) return false
  const phase: unknown = Reflect.get(value, 'phase')
  return typeof phase === 'string' && PhaseEnum.safeParse(phase).success
}
