/**
 * Task query functions for the SQLite persistence layer.
 *
 * All functions accept a raw BetterSqlite3 database instance and use
 * prepared statements: no string interpolation, no ORM.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { randomUUID } from 'crypto'
import type { Phase, Task, TaskStatus } from '../../core/types.js'
import {
  CreateTaskInputSchema,
  PhaseEnum,
  TaskStatusEnum,
  type CreateTaskInput,
} from '../schemas/records.js'
import { PHASE_SEQUENCE, phaseIndex } from '../../core/types.js'

interface TaskRow {
  id: string
  namespace: string
  phase: string
  worker_name: string
  status: string
  dependencies_json: string
  created_at: string
  updated_at: string
}

function parseDependencies(json: string): string[] {
  try {
    const parsed: unknown = JSON.parse(json)
    return Array.isArray(parsed) ? parsed.filter((d): d is string => typeof d === 'string') : []
  } catch {
    return []
  }
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    namespace: row.namespace,
    phase: PhaseEnum.parse(row.phase),
    workerName: row.worker_name,
    status: TaskStatusEnum.parse(row.status),
    dependencies: parseDependencies(row.dependencies_json),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Insert a task with a generated id.
 */
export function createTask(
  db: BetterSqlite3Database,
  input: CreateTaskInput,
  now: string = new Date().toISOString(),
): Task {
  const validated = CreateTaskInputSchema.parse(input)
  const id = randomUUID()
  db.prepare(
    `INSERT INTO tasks (id, namespace, phase, worker_name, status, dependencies_json, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    validated.namespace,
    validated.phase,
    validated.workerName,
    validated.status,
    JSON.stringify(validated.dependencies),
    now,
    now,
  )
  const task = getTask(db, id)
  if (task === undefined) {
    throw new Error(`Task ${id} was not persisted`)
  }
  return task
}

export function getTask(db: BetterSqlite3Database, id: string): Task | undefined {
  const row = db.prepare('SELECT * FROM tasks WHERE id = ?').get(id) as TaskRow | undefined
  return row === undefined ? undefined : toTask(row)
}

/** All tasks of a namespace in one phase, oldest first */
export function getTasksForPhase(db: BetterSqlite3Database, namespace: string, phase: Phase): Task[] {
  const rows = db
    .prepare('SELECT * FROM tasks WHERE namespace = ? AND phase = ? ORDER BY created_at ASC, rowid ASC')
    .all(namespace, phase) as TaskRow[]
  return rows.map(toTask)
}

export function getTasksForNamespace(db: BetterSqlite3Database, namespace: string): Task[] {
  const rows = db
    .prepare('SELECT * FROM tasks WHERE namespace = ? ORDER BY created_at ASC, rowid ASC')
    .all(namespace) as TaskRow[]
  return rows.map(toTask)
}

export function updateTaskStatus(
  db: BetterSqlite3Database,
  id: string,
  status: TaskStatus,
  now: string = new Date().toISOString(),
): void {
  db.prepare('UPDATE tasks SET status = ?, updated_at = ? WHERE id = ?').run(
    TaskStatusEnum.parse(status),
    now,
    id,
  )
}

/**
 * Whether every dependency of `task` has completed. Unknown dependency ids
 * count as unmet.
 */
export function dependenciesMet(db: BetterSqlite3Database, task: Task): boolean {
  return task.dependencies.every((depId) => getTask(db, depId)?.status === 'completed')
}

/**
 * Reset every task of phases after `phase` back to pending.
 * @returns number of tasks reset
 */
export function resetTasksAfterPhase(
  db: BetterSqlite3Database,
  namespace: string,
  phase: Phase,
  now: string = new Date().toISOString(),
): number {
  const later = PHASE_SEQUENCE.slice(phaseIndex(phase) + 1)
  if (later.length === 0) return 0
  const placeholders = later.map(() => '?').join(', ')
  const result = db
    .prepare(
      `UPDATE tasks SET status = 'pending', updated_at = ?
       WHERE namespace = ? AND phase IN (${placeholders}) AND status != 'pending'`,
    )
    .run(now, namespace, ...later)
  return result.changes
}

/**
 * Fail every pending or in-progress task of a namespace (used on cancel).
 * @returns number of tasks failed
 */
export function failOpenTasks(
  db: BetterSqlite3Database,
  namespace: string,
  now: string = new Date().toISOString(),
): number {
  const result = db
    .prepare(
      `UPDATE tasks SET status = 'failed', updated_at = ?
       WHERE namespace = ? AND status IN ('pending', 'in-progress')`,
    )
    .run(now, namespace)
  return result.changes
}
