/**
 * Review audit query functions: triangulation results, gate results and the
 * per-(namespace, phase) review progress record.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { randomUUID } from 'crypto'
import type { Phase } from '../../core/types.js'
import {
  GateResultInputSchema,
  TriangulationRecordInputSchema,
  type GateResultInput,
  type TriangulationRecordInput,
} from '../schemas/records.js'

// ---------------------------------------------------------------------------
// Triangulation results
// ---------------------------------------------------------------------------

/**
 * Persist a triangulation result.
 * @returns the generated row id
 */
export function insertTriangulationResult(
  db: BetterSqlite3Database,
  input: TriangulationRecordInput,
  now: string = new Date().toISOString(),
): string {
  const validated = TriangulationRecordInputSchema.parse(input)
  const id = randomUUID()
  db.prepare(
    `INSERT INTO triangulation_results
       (id, namespace, artifact_ref, phase, consensus_score, passed, viewpoints_json, conflicts_json, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    validated.namespace,
    validated.artifactRef,
    validated.phase,
    validated.consensusScore,
    validated.passed ? 1 : 0,
    JSON.stringify(validated.viewpoints),
    JSON.stringify(validated.conflicts),
    now,
  )
  return id
}

export interface StoredTriangulationResult {
  id: string
  namespace: string
  artifactRef: string
  phase: string
  consensusScore: number
  passed: boolean
  createdAt: string
}

export function listTriangulationResults(
  db: BetterSqlite3Database,
  namespace: string,
): StoredTriangulationResult[] {
  const rows = db
    .prepare(
      `SELECT id, namespace, artifact_ref, phase, consensus_score, passed, created_at
       FROM triangulation_results WHERE namespace = ? ORDER BY created_at ASC, rowid ASC`,
    )
    .all(namespace) as {
    id: string
    namespace: string
    artifact_ref: string
    phase: string
    consensus_score: number
    passed: number
    created_at: string
  }[]
  return rows.map((row) => ({
    id: row.id,
    namespace: row.namespace,
    artifactRef: row.artifact_ref,
    phase: row.phase,
    consensusScore: row.consensus_score,
    passed: row.passed === 1,
    createdAt: row.created_at,
  }))
}

// ---------------------------------------------------------------------------
// Gate results
// ---------------------------------------------------------------------------

export interface StoredGateResult {
  id: string
  namespace: string
  phase: string
  gateName: string
  artifactRef: string
  passed: boolean
  score: number
  issues: string[]
  retryCount: number
  triangulationId: string | null
  createdAt: string
}

interface GateResultRow {
  id: string
  namespace: string
  phase: string
  gate_name: string
  artifact_ref: string
  passed: number
  score: number
  issues_json: string
  retry_count: number
  triangulation_id: string | null
  created_at: string
}

function parseIssues(json: string): string[] {
  try {
    const parsed: unknown = JSON.parse(json)
    return Array.isArray(parsed) ? parsed.filter((i): i is string => typeof i === 'string') : []
  } catch {
    return []
  }
}

export function insertGateResult(
  db: BetterSqlite3Database,
  input: GateResultInput,
  now: string = new Date().toISOString(),
): string {
  const validated = GateResultInputSchema.parse(input)
  const id = randomUUID()
  db.prepare(
    `INSERT INTO review_gate_results
       (id, namespace, phase, gate_name, artifact_ref, passed, score, issues_json, retry_count, triangulation_id, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    validated.namespace,
    validated.phase,
    validated.gateName,
    validated.artifactRef,
    validated.passed ? 1 : 0,
    validated.score,
    JSON.stringify(validated.issues),
    validated.retryCount,
    validated.triangulationId,
    now,
  )
  return id
}

/** Gate results of one phase in the order they were written */
export function listGateResults(
  db: BetterSqlite3Database,
  namespace: string,
  phase: Phase,
): StoredGateResult[] {
  const rows = db
    .prepare(
      'SELECT * FROM review_gate_results WHERE namespace = ? AND phase = ? ORDER BY created_at ASC, rowid ASC',
    )
    .all(namespace, phase) as GateResultRow[]
  return rows.map((row) => ({
    id: row.id,
    namespace: row.namespace,
    phase: row.phase,
    gateName: row.gate_name,
    artifactRef: row.artifact_ref,
    passed: row.passed === 1,
    score: row.score,
    issues: parseIssues(row.issues_json),
    retryCount: row.retry_count,
    triangulationId: row.triangulation_id,
    createdAt: row.created_at,
  }))
}

// ---------------------------------------------------------------------------
// Review progress
// ---------------------------------------------------------------------------

/** Where a phase's review chain stands between signals */
export interface ReviewProgress {
  /** Artifact the gate position refers to */
  artifactRef: string | null
  /** Index of the first gate not yet passed */
  gateIndex: number
  /** Failed attempts per gate name */
  retryCounts: Record<string, number>
  /** MODIFY verdicts from the intent check in this phase */
  intentModifyCount: number
}

export function emptyReviewProgress(): ReviewProgress {
  return { artifactRef: null, gateIndex: 0, retryCounts: {}, intentModifyCount: 0 }
}

function parseRetryCounts(json: string): Record<string, number> {
  const counts: Record<string, number> = {}
  try {
    const parsed: unknown = JSON.parse(json)
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      for (const [gate, count] of Object.entries(parsed)) {
        if (typeof count === 'number') counts[gate] = count
      }
    }
  } catch {
    return {}
  }
  return counts
}

export function getReviewProgress(
  db: BetterSqlite3Database,
  namespace: string,
  phase: Phase,
): ReviewProgress {
  const row = db
    .prepare(
      `SELECT artifact_ref, gate_index, retry_counts_json, intent_modify_count
       FROM review_progress WHERE namespace = ? AND phase = ?`,
    )
    .get(namespace, phase) as
    | { artifact_ref: string | null; gate_index: number; retry_counts_json: string; intent_modify_count: number }
    | undefined
  if (row === undefined) return emptyReviewProgress()
  return {
    artifactRef: row.artifact_ref,
    gateIndex: row.gate_index,
    retryCounts: parseRetryCounts(row.retry_counts_json),
    intentModifyCount: row.intent_modify_count,
  }
}

export function saveReviewProgress(
  db: BetterSqlite3Database,
  namespace: string,
  phase: Phase,
  progress: ReviewProgress,
  now: string = new Date().toISOString(),
): void {
  db.prepare(
    `INSERT INTO review_progress
       (namespace, phase, artifact_ref, gate_index, retry_counts_json, intent_modify_count, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(namespace, phase) DO UPDATE SET
       artifact_ref = excluded.artifact_ref,
       gate_index = excluded.gate_index,
       retry_counts_json = excluded.retry_counts_json,
       intent_modify_count = excluded.intent_modify_count,
       updated_at = excluded.updated_at`,
  ).run(
    namespace,
    phase,
    progress.artifactRef,
    progress.gateIndex,
    JSON.stringify(progress.retryCounts),
    progress.intentModifyCount,
    now,
  )
}

export function resetReviewProgress(db: BetterSqlite3Database, namespace: string, phase: Phase): void {
  db.prepare('DELETE FROM review_progress WHERE namespace = ? AND phase = ?').run(namespace, phase)
}
