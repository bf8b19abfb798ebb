/**
 * SqlitePatternStore: the durable record collection, tag-indexed through
 * the memory_record_tags join table.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import type { PatternStore } from './pattern-store.js'
import { applyPatternWrite, rankBySimilarity } from './records.js'
import type { MemoryRecord, PatternWrite, RetentionPolicy, ScoredRecord } from './types.js'

const logger = createLogger('pattern-store:sqlite')

const MS_PER_DAY = 24 * 60 * 60 * 1000

interface MemoryRecordRow {
  id: string
  namespace: string | null
  pattern_text: string
  confidence_score: number
  success_count: number
  failure_count: number
  embedding_json: string
  created_at: string
  updated_at: string
  last_used_at: string | null
}

function parseEmbedding(json: string): number[] {
  try {
    const parsed: unknown = JSON.parse(json)
    return Array.isArray(parsed) ? parsed.filter((v): v is number => typeof v === 'number') : []
  } catch {
    return []
  }
}

export class SqlitePatternStore implements PatternStore {
  private readonly _db: BetterSqlite3Database

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  async upsert(tags: string[], write: PatternWrite): Promise<MemoryRecord> {
    const apply = this._db.transaction((): MemoryRecord => {
      const existing = this._getSync(write.id)
      if (existing !== undefined && this._wasApplied(write.writeId)) {
        logger.debug({ recordId: write.id, writeId: write.writeId }, 'Pattern write already applied')
        return existing
      }
      const next = applyPatternWrite(existing, tags, write)
      this._db
        .prepare(
          `INSERT INTO memory_records
             (id, namespace, pattern_text, confidence_score, success_count, failure_count,
              embedding_json, created_at, updated_at, last_used_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             confidence_score = excluded.confidence_score,
             success_count = excluded.success_count,
             failure_count = excluded.failure_count,
             embedding_json = excluded.embedding_json,
             updated_at = excluded.updated_at,
             last_used_at = excluded.last_used_at`,
        )
        .run(
          next.id,
          next.namespace,
          next.patternText,
          next.confidenceScore,
          next.successCount,
          next.failureCount,
          JSON.stringify(next.embedding),
          next.createdAt,
          next.updatedAt,
          next.lastUsedAt,
        )
      const insertTag = this._db.prepare('INSERT OR IGNORE INTO memory_record_tags (record_id, tag) VALUES (?, ?)')
      for (const tag of next.tags) {
        insertTag.run(next.id, tag)
      }
      this._db
        .prepare('INSERT INTO memory_applied_writes (write_id, record_id, applied_at) VALUES (?, ?, ?)')
        .run(write.writeId, next.id, write.at)
      return next
    })
    return apply()
  }

  async query(tags: string[], embedding: number[], topK: number, namespace?: string): Promise<ScoredRecord[]> {
    if (tags.length === 0 || topK <= 0) return []
    const placeholders = tags.map(() => '?').join(', ')
    const namespaceClause = namespace === undefined ? '' : 'AND (r.namespace IS NULL OR r.namespace = ?)'
    const params: string[] = namespace === undefined ? [...tags] : [...tags, namespace]

    const rows = this._db
      .prepare(
        `SELECT DISTINCT r.* FROM memory_records r
         JOIN memory_record_tags t ON t.record_id = r.id
         WHERE t.tag IN (${placeholders}) ${namespaceClause}`,
      )
      .all(...params) as MemoryRecordRow[]

    return rankBySimilarity(rows.map((row) => this._toRecord(row)), tags, embedding, topK)
  }

  async get(id: string): Promise<MemoryRecord | undefined> {
    return this._getSync(id)
  }

  async prune(policy: RetentionPolicy): Promise<number> {
    const now = policy.now ?? new Date()
    const run = this._db.transaction((): number => {
      let removed = 0
      if (policy.maxAgeDays > 0) {
        const cutoff = new Date(now.getTime() - policy.maxAgeDays * MS_PER_DAY).toISOString()
        removed += this._db.prepare('DELETE FROM memory_records WHERE updated_at < ?').run(cutoff).changes
      }
      if (policy.maxRecords > 0) {
        removed += this._db
          .prepare(
            `DELETE FROM memory_records WHERE id IN (
               SELECT id FROM memory_records ORDER BY updated_at DESC, id ASC LIMIT -1 OFFSET ?
             )`,
          )
          .run(policy.maxRecords).changes
      }
      return removed
    })
    const removed = run()
    logger.info({ removed, maxAgeDays: policy.maxAgeDays, maxRecords: policy.maxRecords }, 'Pattern store pruned')
    return removed
  }

  async ping(): Promise<void> {
    this._db.prepare('SELECT 1').get()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _wasApplied(writeId: string): boolean {
    return this._db.prepare('SELECT 1 FROM memory_applied_writes WHERE write_id = ?').get(writeId) !== undefined
  }

  private _getSync(id: string): MemoryRecord | undefined {
    const row = this._db.prepare('SELECT * FROM memory_records WHERE id = ?').get(id) as
      | MemoryRecordRow
      | undefined
    return row === undefined ? undefined : this._toRecord(row)
  }

  private _toRecord(row: MemoryRecordRow): MemoryRecord {
    const tags = (
      this._db.prepare('SELECT tag FROM memory_record_tags WHERE record_id = ? ORDER BY tag').all(row.id) as {
        tag: string
      }[]
    ).map((t) => t.tag)
    return {
      id: row.id,
      namespace: row.namespace,
      tags,
      patternText: row.pattern_text,
      confidenceScore: row.confidence_score,
      successCount: row.success_count,
      failureCount: row.failure_count,
      embedding: parseEmbedding(row.embedding_json),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      lastUsedAt: row.last_used_at,
    }
  }
}
