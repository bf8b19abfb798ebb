/**
 * Types for worker selection.
 */

import type { Phase } from '../../core/types.js'

/** One registered implementation of a capability */
export interface WorkerVariant {
  name: string
  /** Priority tier, e.g. "memory-enhanced" or "basic" */
  tier: string
  /** External services that must be healthy for this variant */
  dependencies: string[]
}

/** Dependency name → healthy */
export type HealthSnapshot = ReadonlyMap<string, boolean>

/** A variant passed over during selection, and why */
export interface SkippedVariant {
  name: string
  tier: string
  unhealthy: string[]
}

export interface VariantSelection {
  variant: WorkerVariant
  skipped: SkippedVariant[]
}

/**
 * Which worker performs a phase, and the reasoning behind the choice.
 *
 * @example
 * {
 *   phase: 'specification',
 *   capability: 'specification-writer',
 *   workerName: 'specification-writer',
 *   tier: 'basic',
 *   rationale: 'specification-writer-memory-enhanced skipped (unhealthy: pattern-store); selected specification-writer (basic)',
 *   fallbackChain: ['specification-writer-memory-enhanced', 'specification-writer'],
 * }
 */
export interface SelectionDecision {
  phase: Phase
  capability: string
  workerName: string
  tier: string
  rationale: string
  /** Variants considered, in preference order, up to the selected one */
  fallbackChain: string[]
}
