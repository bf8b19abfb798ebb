/**
 * Intent entry query functions.
 *
 * Entries are unique per (namespace, kind, normalized text). Sources carry a
 * precedence: explicit and custom-answer entries outrank inferred ones, and an
 * inferred write never replaces an entry of higher precedence.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { randomUUID } from 'crypto'
import {
  IntentEntryInputSchema,
  IntentKindEnum,
  IntentSourceEnum,
  type IntentEntryInput,
} from '../schemas/records.js'
import type { z } from 'zod'

export type IntentKind = z.infer<typeof IntentKindEnum>
export type IntentSource = z.infer<typeof IntentSourceEnum>

export interface StoredIntentEntry {
  id: string
  namespace: string
  kind: IntentKind
  text: string
  normalized: string
  source: IntentSource
  confidence: number
  createdAt: string
  updatedAt: string
}

interface IntentEntryRow {
  id: string
  namespace: string
  kind: string
  text: string
  normalized: string
  source: string
  confidence: number
  created_at: string
  updated_at: string
}

const SOURCE_PRECEDENCE: Record<IntentSource, number> = {
  explicit: 2,
  'custom-answer': 2,
  inferred: 1,
}

function toEntry(row: IntentEntryRow): StoredIntentEntry {
  return {
    id: row.id,
    namespace: row.namespace,
    kind: IntentKindEnum.parse(row.kind),
    text: row.text,
    normalized: row.normalized,
    source: IntentSourceEnum.parse(row.source),
    confidence: row.confidence,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

/** What an upsert did with the incoming entry */
export type IntentUpsertAction = 'inserted' | 'updated' | 'kept-existing'

/**
 * Insert or update an intent entry keyed by its normalized text.
 */
export function upsertIntentEntry(
  db: BetterSqlite3Database,
  namespace: string,
  input: IntentEntryInput & { normalized: string; confidence: number },
  now: string = new Date().toISOString(),
): { entry: StoredIntentEntry; action: IntentUpsertAction } {
  const validated = IntentEntryInputSchema.parse(input)

  return db.transaction(() => {
    const existingRow = db
      .prepare('SELECT * FROM intent_entries WHERE namespace = ? AND kind = ? AND normalized = ?')
      .get(namespace, validated.kind, input.normalized) as IntentEntryRow | undefined

    if (existingRow === undefined) {
      const id = randomUUID()
      db.prepare(
        `INSERT INTO intent_entries (id, namespace, kind, text, normalized, source, confidence, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      ).run(id, namespace, validated.kind, validated.text, input.normalized, validated.source, input.confidence, now, now)
      return { entry: requireEntry(db, id), action: 'inserted' as const }
    }

    const existing = toEntry(existingRow)
    if (SOURCE_PRECEDENCE[validated.source] < SOURCE_PRECEDENCE[existing.source]) {
      return { entry: existing, action: 'kept-existing' as const }
    }

    db.prepare(
      'UPDATE intent_entries SET text = ?, source = ?, confidence = ?, updated_at = ? WHERE id = ?',
    ).run(validated.text, validated.source, input.confidence, now, existing.id)
    return { entry: requireEntry(db, existing.id), action: 'updated' as const }
  })()
}

function requireEntry(db: BetterSqlite3Database, id: string): StoredIntentEntry {
  const row = db.prepare('SELECT * FROM intent_entries WHERE id = ?').get(id) as IntentEntryRow | undefined
  if (row === undefined) {
    throw new Error(`Intent entry ${id} was not persisted`)
  }
  return toEntry(row)
}

/** Entries of a namespace, oldest first */
export function listIntentEntries(db: BetterSqlite3Database, namespace: string): StoredIntentEntry[] {
  const rows = db
    .prepare('SELECT * FROM intent_entries WHERE namespace = ? ORDER BY created_at ASC, rowid ASC')
    .all(namespace) as IntentEntryRow[]
  return rows.map(toEntry)
}
