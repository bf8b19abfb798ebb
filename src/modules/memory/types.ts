/**
 * Types for the memory orchestrator.
 */

import type { Phase } from '../../core/types.js'

/** What a worker is about to do, used to find similar past patterns */
export interface EnhanceContext {
  namespace?: string
  /** Free text describing the task (goal, phase summary, prior artifacts) */
  text: string
}

/** One learned pattern selected for a task */
export interface BoostedPattern {
  id: string
  patternText: string
  tags: string[]
  confidenceScore: number
  similarity: number
  /** Recency decay factor in (0, 1] */
  recency: number
  /** confidence × recency × similarity, rounded to 4 decimals */
  applicability: number
  successCount: number
  failureCount: number
  /** Namespace the pattern was learned in (null for global) */
  sourceNamespace: string | null
}

/** Ranked patterns handed to a worker with its instruction */
export interface MemoryBoost {
  workerName: string
  taskType: string
  patterns: BoostedPattern[]
  /** True when the store could not be consulted and the boost is empty */
  degraded: boolean
  reason?: string
}

/** Result of one finished task, learned from by `record()` */
export interface TaskOutcome {
  namespace: string
  workerName: string
  /** Task type tag, typically the phase */
  taskType: string
  /** The reusable lesson, e.g. a summary of what the worker did */
  patternText: string
  success: boolean
  /** Outcome time (default: now) */
  at?: string
  /** Store the pattern without namespace provenance */
  global?: boolean
}

/** Per-viewpoint weight multipliers used by triangulation */
export type ViewpointCalibration = Map<string, number>

export interface ViewpointOutcome {
  phase: Phase
  viewpoint: string
  /** Whether the viewpoint's verdict matched the final verdict */
  agreed: boolean
}
