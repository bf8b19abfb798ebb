/**
 * Escalation queue query functions: the operator queue of phases whose
 * automatic progression stopped.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { randomUUID } from 'crypto'
import type { Phase } from '../../core/types.js'
import {
  CreateEscalationInputSchema,
  EscalationKindEnum,
  EscalationStatusEnum,
  PhaseEnum,
  type CreateEscalationInput,
} from '../schemas/records.js'
import type { z } from 'zod'

export type EscalationKind = z.infer<typeof EscalationKindEnum>
export type EscalationStatus = z.infer<typeof EscalationStatusEnum>

export interface Escalation {
  id: string
  namespace: string
  phase: Phase
  kind: EscalationKind
  gateName: string | null
  reason: string
  status: EscalationStatus
  resolutionNote: string | null
  createdAt: string
  resolvedAt: string | null
}

interface EscalationRow {
  id: string
  namespace: string
  phase: string
  kind: string
  gate_name: string | null
  reason: string
  status: string
  resolution_note: string | null
  created_at: string
  resolved_at: string | null
}

function toEscalation(row: EscalationRow): Escalation {
  return {
    id: row.id,
    namespace: row.namespace,
    phase: PhaseEnum.parse(row.phase),
    kind: EscalationKindEnum.parse(row.kind),
    gateName: row.gate_name,
    reason: row.reason,
    status: EscalationStatusEnum.parse(row.status),
    resolutionNote: row.resolution_note,
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
  }
}

export function createEscalation(
  db: BetterSqlite3Database,
  input: CreateEscalationInput,
  now: string = new Date().toISOString(),
): Escalation {
  const validated = CreateEscalationInputSchema.parse(input)
  const id = randomUUID()
  db.prepare(
    `INSERT INTO escalations (id, namespace, phase, kind, gate_name, reason, status, created_at)
     VALUES (?, ?, ?, ?, ?, ?, 'open', ?)`,
  ).run(id, validated.namespace, validated.phase, validated.kind, validated.gateName, validated.reason, now)
  const escalation = getEscalation(db, id)
  if (escalation === undefined) {
    throw new Error(`Escalation ${id} was not persisted`)
  }
  return escalation
}

export function getEscalation(db: BetterSqlite3Database, id: string): Escalation | undefined {
  const row = db.prepare('SELECT * FROM escalations WHERE id = ?').get(id) as EscalationRow | undefined
  return row === undefined ? undefined : toEscalation(row)
}

export interface EscalationFilter {
  namespace?: string
  status?: EscalationStatus
}

export function listEscalations(db: BetterSqlite3Database, filter: EscalationFilter = {}): Escalation[] {
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
    .prepare(`SELECT * FROM escalations ${where} ORDER BY created_at ASC, rowid ASC`)
    .all(...params) as EscalationRow[]
  return rows.map(toEscalation)
}

/** The open escalation blocking (namespace, phase), if any */
export function findOpenEscalation(
  db: BetterSqlite3Database,
  namespace: string,
  phase: Phase,
): Escalation | undefined {
  const row = db
    .prepare(
      `SELECT * FROM escalations WHERE namespace = ? AND phase = ? AND status = 'open'
       ORDER BY created_at ASC, rowid ASC LIMIT 1`,
    )
    .get(namespace, phase) as EscalationRow | undefined
  return row === undefined ? undefined : toEscalation(row)
}

export function resolveEscalation(
  db: BetterSqlite3Database,
  id: string,
  status: Exclude<EscalationStatus, 'open'>,
  note: string | null,
  now: string = new Date().toISOString(),
): void {
  db.prepare(
    `UPDATE escalations SET status = ?, resolution_note = ?, resolved_at = ? WHERE id = ? AND status = 'open'`,
  ).run(status, note, now, id)
}

/** Close every open escalation of a namespace (used on cancel and rollback) */
export function closeOpenEscalations(
  db: BetterSqlite3Database,
  namespace: string,
  note: string,
  now: string = new Date().toISOString(),
): number {
  return db
    .prepare(
      `UPDATE escalations SET status = 'rejected', resolution_note = ?, resolved_at = ?
       WHERE namespace = ? AND status = 'open'`,
    )
    .run(note, now, namespace).changes
}
