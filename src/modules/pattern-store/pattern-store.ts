/**
 * PatternStore interface: the boundary to durable, tag-indexed pattern
 * storage. Implemented by the SQLite store, the local file fallback and the
 * resilient wrapper that combines the two.
 */

import type { MemoryRecord, PatternWrite, RetentionPolicy, ScoredRecord } from './types.js'

export interface PatternStore {
  /**
   * Fold a write into the record with `write.id`, creating it if needed,
   * and attach `tags`. A write whose `writeId` was already applied leaves
   * the record unchanged, so replaying a queued write is safe.
   */
  upsert(tags: string[], write: PatternWrite): Promise<MemoryRecord>

  /**
   * Records carrying at least one of `tags`, most similar to `embedding`
   * first. When `namespace` is given only that namespace and global records
   * are considered.
   */
  query(tags: string[], embedding: number[], topK: number, namespace?: string): Promise<ScoredRecord[]>

  get(id: string): Promise<MemoryRecord | undefined>

  /**
   * Apply a retention policy.
   * @returns number of records removed
   */
  prune(policy: RetentionPolicy): Promise<number>

  /** Resolves when the store is reachable, rejects otherwise */
  ping(): Promise<void>
}
