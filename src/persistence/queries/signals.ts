/**
 * Signal log query functions.
 *
 * The signal log is append-only per namespace. The UNIQUE(namespace, signal_id)
 * constraint is the idempotency key: a second insert of the same signal is
 * reported as a duplicate instead of creating a row.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { CompletionSignal } from '../../core/types.js'

export interface SignalLogEntry {
  id: number
  namespace: string
  signalId: string
  phase: string
  workerName: string
  artifactRefs: string[]
  outcome: string
  signalTimestamp: string
  receivedAt: string
}

interface SignalLogRow {
  id: number
  namespace: string
  signal_id: string
  phase: string
  worker_name: string
  artifact_refs_json: string
  outcome: string
  signal_timestamp: string
  received_at: string
}

function toEntry(row: SignalLogRow): SignalLogEntry {
  let refs: string[] = []
  try {
    const parsed: unknown = JSON.parse(row.artifact_refs_json)
    if (Array.isArray(parsed)) refs = parsed.filter((r): r is string => typeof r === 'string')
  } catch {
    refs = []
  }
  return {
    id: row.id,
    namespace: row.namespace,
    signalId: row.signal_id,
    phase: row.phase,
    workerName: row.worker_name,
    artifactRefs: refs,
    outcome: row.outcome,
    signalTimestamp: row.signal_timestamp,
    receivedAt: row.received_at,
  }
}

/**
 * Append a signal to the log.
 * @returns true when the signal was new, false when (namespace, signalId) was already logged
 */
export function appendSignal(
  db: BetterSqlite3Database,
  signal: CompletionSignal,
  now: string = new Date().toISOString(),
): boolean {
  const result = db
    .prepare(
      `INSERT OR IGNORE INTO signal_log
         (namespace, signal_id, phase, worker_name, artifact_refs_json, outcome, signal_timestamp, received_at)
       VALUES (?, ?, ?, ?, ?, 'received', ?, ?)`,
    )
    .run(
      signal.namespace,
      signal.signalId,
      signal.phase,
      signal.workerName,
      JSON.stringify(signal.artifactRefs),
      signal.timestamp,
      now,
    )
  return result.changes === 1
}

export function setSignalOutcome(
  db: BetterSqlite3Database,
  namespace: string,
  signalId: string,
  outcome: string,
): void {
  db.prepare('UPDATE signal_log SET outcome = ? WHERE namespace = ? AND signal_id = ?').run(
    outcome,
    namespace,
    signalId,
  )
}

export function getSignal(
  db: BetterSqlite3Database,
  namespace: string,
  signalId: string,
): SignalLogEntry | undefined {
  const row = db
    .prepare('SELECT * FROM signal_log WHERE namespace = ? AND signal_id = ?')
    .get(namespace, signalId) as SignalLogRow | undefined
  return row === undefined ? undefined : toEntry(row)
}

/** Signals of a namespace in arrival order */
export function listSignals(db: BetterSqlite3Database, namespace: string): SignalLogEntry[] {
  const rows = db
    .prepare('SELECT * FROM signal_log WHERE namespace = ? ORDER BY id ASC')
    .all(namespace) as SignalLogRow[]
  return rows.map(toEntry)
}
