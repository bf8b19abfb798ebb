/**
 * Types for the pattern store.
 */

/** A learned pattern, shared across namespaces and tagged for retrieval */
export interface MemoryRecord {
  id: string
  /** Originating namespace, or null for a global pattern */
  namespace: string | null
  tags: string[]
  patternText: string
  confidenceScore: number
  successCount: number
  failureCount: number
  embedding: number[]
  createdAt: string
  updatedAt: string
  /** Time of the last outcome folded into this record */
  lastUsedAt: string | null
}

export type PatternOutcome = 'success' | 'failure'

/**
 * One outcome to fold into a record. Writes are applied in order, so a queue
 * of writes replayed against the store yields the same record as applying
 * them directly.
 */
export interface PatternWrite {
  /** Stable record id, see `patternRecordId()` */
  id: string
  /** Unique id of this outcome; a store folds each write id in at most once */
  writeId: string
  namespace: string | null
  patternText: string
  embedding: number[]
  outcome: PatternOutcome
  /** EMA smoothing factor for this write */
  alpha: number
  /** ISO timestamp of the outcome */
  at: string
}

/** A query hit with its similarity to the query embedding */
export interface ScoredRecord {
  record: MemoryRecord
  /** Cosine similarity in [0, 1] (negative similarities are clamped) */
  similarity: number
  /** Number of query tags the record carries */
  matchedTags: number
}

export interface RetentionPolicy {
  /** Remove records whose last update is older than this (0 disables) */
  maxAgeDays: number
  /** Keep at most this many records, newest first (0 disables) */
  maxRecords: number
  /** Reference time (default: now) */
  now?: Date
}
