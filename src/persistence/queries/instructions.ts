/**
 * Instruction outbox query functions.
 *
 * The outbox is how instruction requests reach the external executor: the
 * dispatcher writes a row, the executor (or `cadence instructions`) reads the
 * queued rows and marks them delivered.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Phase } from '../../core/types.js'
import { InstructionKindEnum, PhaseEnum } from '../schemas/records.js'
import type { z } from 'zod'

export type InstructionKind = z.infer<typeof InstructionKindEnum>
export type InstructionStatus = 'queued' | 'delivered'

export interface OutboxInstruction {
  id: string
  namespace: string
  phase: Phase
  workerName: string
  tier: string
  kind: InstructionKind
  taskId: string | null
  /** Full instruction request as written by the dispatcher */
  payload: unknown
  status: InstructionStatus
  createdAt: string
}

interface InstructionRow {
  id: string
  namespace: string
  phase: string
  worker_name: string
  tier: string
  kind: string
  task_id: string | null
  payload_json: string
  status: string
  created_at: string
}

function toInstruction(row: InstructionRow): OutboxInstruction {
  return {
    id: row.id,
    namespace: row.namespace,
    phase: PhaseEnum.parse(row.phase),
    workerName: row.worker_name,
    tier: row.tier,
    kind: InstructionKindEnum.parse(row.kind),
    taskId: row.task_id,
    payload: JSON.parse(row.payload_json),
    status: row.status === 'delivered' ? 'delivered' : 'queued',
    createdAt: row.created_at,
  }
}

export function insertInstruction(
  db: BetterSqlite3Database,
  instruction: Omit<OutboxInstruction, 'status'>,
): void {
  db.prepare(
    `INSERT INTO instructions (id, namespace, phase, worker_name, tier, kind, task_id, payload_json, status, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'queued', ?)`,
  ).run(
    instruction.id,
    instruction.namespace,
    instruction.phase,
    instruction.workerName,
    instruction.tier,
    instruction.kind,
    instruction.taskId,
    JSON.stringify(instruction.payload),
    instruction.createdAt,
  )
}

export interface InstructionFilter {
  namespace?: string
  status?: InstructionStatus
}

export function listInstructions(
  db: BetterSqlite3Database,
  filter: InstructionFilter = {},
): OutboxInstruction[] {
  const clauses: string[] = []
  const params: string[] = []
  if (filter.namespace !== undefined) {
    clauses.push('namespace = ?')
    params.push(filter.namespace)
  }
  if (filter.status !== undefined) {
    clauses.push('status = ?')
    params.push(filter.status)
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : ''
  const rows = db
    .prepare(`SELECT * FROM instructions ${where} ORDER BY created_at ASC, rowid ASC`)
    .all(...params) as InstructionRow[]
  return rows.map(toInstruction)
}

export function markInstructionDelivered(db: BetterSqlite3Database, id: string): boolean {
  return (
    db.prepare(`UPDATE instructions SET status = 'delivered' WHERE id = ? AND status = 'queued'`).run(id)
      .changes === 1
  )
}
