/**
 * Pure helpers shared by every PatternStore implementation.
 */

import { createHash } from 'crypto'
import { clamp } from '../../utils/helpers.js'
import { cosineSimilarity } from './embedder.js'
import type { MemoryRecord, PatternWrite, ScoredRecord } from './types.js'

/** Confidence of a record before its first outcome */
export const INITIAL_CONFIDENCE = 0.5

/**
 * Stable id of the record identified by (namespace, tags, patternText).
 * Tag order does not matter.
 */
export function patternRecordId(namespace: string | null, tags: string[], patternText: string): string {
  const key = [namespace ?? '*', [...new Set(tags)].sort().join(','), patternText].join('\u0000')
  return createHash('sha256').update(key).digest('hex').slice(0, 32)
}

/**
 * Exponential moving average update: success moves the confidence toward 1,
 * failure toward 0.
 */
export function updateConfidence(current: number, outcome: PatternWrite['outcome'], alpha: number): number {
  const next = outcome === 'success' ? current + alpha * (1 - current) : current * (1 - alpha)
  return clamp(next, 0, 1)
}

/**
 * Fold one write into an existing record (or a fresh one).
 */
export function applyPatternWrite(
  existing: MemoryRecord | undefined,
  tags: string[],
  write: PatternWrite,
): MemoryRecord {
  const base: MemoryRecord = existing ?? {
    id: write.id,
    namespace: write.namespace,
    tags: [],
    patternText: write.patternText,
    confidenceScore: INITIAL_CONFIDENCE,
    successCount: 0,
    failureCount: 0,
    embedding: write.embedding,
    createdAt: write.at,
    updatedAt: write.at,
    lastUsedAt: null,
  }

  return {
    ...base,
    tags: [...new Set([...base.tags, ...tags])].sort(),
    embedding: write.embedding,
    confidenceScore: updateConfidence(base.confidenceScore, write.outcome, write.alpha),
    successCount: base.successCount + (write.outcome === 'success' ? 1 : 0),
    failureCount: base.failureCount + (write.outcome === 'failure' ? 1 : 0),
    updatedAt: write.at,
    lastUsedAt: write.at,
  }
}

/**
 * Score candidates against a query and keep the `topK` most similar.
 * Ties break on id so results are deterministic.
 */
export function rankBySimilarity(
  candidates: MemoryRecord[],
  tags: string[],
  embedding: number[],
  topK: number,
): ScoredRecord[] {
  const wanted = new Set(tags)
  return candidates
    .map((record) => ({
      record,
      similarity: Math.max(0, cosineSimilarity(record.embedding, embedding)),
      matchedTags: record.tags.filter((t) => wanted.has(t)).length,
    }))
    .filter((scored) => scored.matchedTags > 0)
    .sort((a, b) => b.similarity - a.similarity || a.record.id.localeCompare(b.record.id))
    .slice(0, topK)
}
