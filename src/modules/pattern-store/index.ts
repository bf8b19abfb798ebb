/**
 * Pattern store module: public exports.
 */

export type { PatternStore } from './pattern-store.js'
export type { MemoryRecord, PatternOutcome, PatternWrite, RetentionPolicy, ScoredRecord } from './types.js'
export type { Embedder } from './embedder.js'
export { HashingEmbedder, cosineSimilarity } from './embedder.js'
export {
  INITIAL_CONFIDENCE,
  applyPatternWrite,
  patternRecordId,
  rankBySimilarity,
  updateConfidence,
} from './records.js'
export { SqlitePatternStore } from './sqlite-pattern-store.js'
export { FileFallbackStore, fallbackKey } from './file-fallback-store.js'
export type { FallbackBatch, QueuedWrite } from './file-fallback-store.js'
export { ResilientPatternStore } from './resilient-pattern-store.js'
export type { ResilientPatternStoreOptions } from './resilient-pattern-store.js'
