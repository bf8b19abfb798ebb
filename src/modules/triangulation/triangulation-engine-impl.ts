/**
 * TriangulationEngineImpl: runs viewpoint evaluators in parallel and
 * synthesises a weighted consensus.
 *
 * Weighting: each viewpoint's weight is its configured domain weight times
 * the calibration multiplier learned by the memory orchestrator. A viewpoint
 * that times out or throws contributes `neutral_score` at
 * weight × `timeout_weight_factor`.
 *
 * Conflicts: two answering viewpoints conflict when their pass/fail verdicts
 * differ and their scores are more than `conflict_threshold` apart. Weighting
 * resolves a conflict when one side carries at least twice the other's
 * weight; anything else is unresolved and fails the result.
 *
 * Results are persisted to triangulation_results when a database and a
 * namespace are available.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { Phase } from '../../core/types.js'
import { insertTriangulationResult } from '../../persistence/queries/review.js'
import { errorMessage, roundTo, withTimeout } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { TriangulationConfig } from '../config/config-schema.js'
import type { MemoryOrchestrator } from '../memory/memory-orchestrator.js'
import type { ArtifactResolver } from './artifact-resolver.js'
import { DEFAULT_EVALUATORS } from './evaluators.js'
import type { TriangulationEngine } from './triangulation-engine.js'
import type {
  TriangulateOptions,
  TriangulationResult,
  ViewpointConflict,
  ViewpointEvaluator,
  ViewpointResult,
} from './types.js'

const logger = createLogger('triangulation')

/** Heavier side must outweigh the lighter one by this factor to settle a conflict */
const RESOLUTION_RATIO = 2

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface TriangulationEngineOptions {
  config: Readonly<TriangulationConfig>
  /** Default pass threshold (review.pass_threshold) */
  passThreshold: number
  resolver: ArtifactResolver
  /**
   * Evaluators by viewpoint name. Merged over the built-in heuristics, so a
   * custom evaluator replaces the built-in one of the same name.
   */
  evaluators?: Record<string, ViewpointEvaluator>
  /** Source of calibration multipliers; weights are uncalibrated without it */
  memory?: MemoryOrchestrator
  db?: BetterSqlite3Database
  eventBus?: TypedEventBus
}

// ---------------------------------------------------------------------------
// Synthesis helpers (pure)
// ---------------------------------------------------------------------------

/** Weighted mean of the viewpoint scores, rounded to 4 decimals */
export function computeConsensus(viewpoints: ViewpointResult[]): number {
  let weighted = 0
  let total = 0
  for (const v of viewpoints) {
    weighted += v.score * v.weight
    total += v.weight
  }
  return total > 0 ? roundTo(weighted / total, 4) : 0
}

/**
 * Every disagreeing pair of answering viewpoints whose score gap exceeds the
 * threshold, in viewpoint order.
 */
export function detectConflicts(viewpoints: ViewpointResult[], conflictThreshold: number): ViewpointConflict[] {
  const answered = viewpoints.filter((v) => !v.timedOut)
  const conflicts: ViewpointConflict[] = []

  for (let i = 0; i < answered.length; i++) {
    for (let j = i + 1; j < answered.length; j++) {
      const a = answered[i]
      const b = answered[j]
      if (a === undefined || b === undefined || a.passed === b.passed) continue
      const scoreGap = roundTo(Math.abs(a.score - b.score), 4)
      if (scoreGap <= conflictThreshold) continue

      const [heavy, light] = a.weight >= b.weight ? [a, b] : [b, a]
      const resolved = heavy.weight >= RESOLUTION_RATIO * light.weight
      const reason = resolved
        ? `${heavy.viewpoint} (weight ${heavy.weight}) outweighs ${light.viewpoint} (weight ${light.weight})`
        : `${a.viewpoint} ${a.passed ? 'passes' : 'fails'} (${a.score}) while ${b.viewpoint} ${b.passed ? 'passes' : 'fails'} (${b.score}); weighting cannot settle it`
      conflicts.push({ viewpoints: [a.viewpoint, b.viewpoint], scoreGap, resolved, reason })
    }
  }
  return conflicts
}

// ---------------------------------------------------------------------------
// TriangulationEngineImpl
// ---------------------------------------------------------------------------

export class TriangulationEngineImpl implements TriangulationEngine {
  private readonly _config: Readonly<TriangulationConfig>
  private readonly _passThreshold: number
  private readonly _resolver: ArtifactResolver
  private readonly _evaluators: Record<string, ViewpointEvaluator>
  private readonly _memory: MemoryOrchestrator | undefined
  private readonly _db: BetterSqlite3Database | undefined
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: TriangulationEngineOptions) {
    this._config = options.config
    this._passThreshold = options.passThreshold
    this._resolver = options.resolver
    this._evaluators = { ...DEFAULT_EVALUATORS, ...options.evaluators }
    this._memory = options.memory
    this._db = options.db
    this._eventBus = options.eventBus
  }

  get viewpoints(): string[] {
    return Object.keys(this._evaluators)
  }

  async triangulate(
    artifactRef: string,
    phase: Phase,
    options: TriangulateOptions = {},
  ): Promise<TriangulationResult> {
    const viewpointNames = options.viewpoints ?? this.viewpoints
    const passThreshold = options.passThreshold ?? this._passThreshold

    const calibration =
      this._memory !== undefined
        ? await this._memory.viewpointCalibration(phase, viewpointNames)
        : new Map<string, number>()

    let content: string | null = null
    let readError: string | null = null
    try {
      content = await this._resolver.resolve(artifactRef)
    } catch (err) {
      readError = errorMessage(err)
      logger.warn({ artifactRef, reason: readError }, 'Artifact could not be read')
    }

    const viewpoints = await Promise.all(
      viewpointNames.map(async (viewpoint): Promise<ViewpointResult> => {
        const weight = roundTo((this._config.domain_weights[viewpoint] ?? 1) * (calibration.get(viewpoint) ?? 1), 4)
        if (content === null) {
          return {
            viewpoint,
            score: 0,
            issues: [`Artifact ${artifactRef} could not be read: ${readError ?? 'unknown error'}`],
            weight,
            passed: false,
            timedOut: false,
          }
        }
        return this._evaluate(viewpoint, weight, passThreshold, {
          viewpoint,
          artifactRef,
          phase,
          content,
          goal: options.goal,
        })
      }),
    )

    const consensusScore = computeConsensus(viewpoints)
    const conflicts = detectConflicts(viewpoints, this._config.conflict_threshold)
    const unresolvedConflicts = conflicts.filter((c) => !c.resolved)
    const passed = consensusScore >= passThreshold && unresolvedConflicts.length === 0

    let id: string | null = null
    if (this._db !== undefined && options.namespace !== undefined) {
      id = insertTriangulationResult(this._db, {
        namespace: options.namespace,
        artifactRef,
        phase,
        consensusScore,
        passed,
        viewpoints,
        conflicts,
      })
    }

    logger.debug(
      { artifactRef, phase, consensusScore, passed, unresolved: unresolvedConflicts.length },
      'Triangulation complete',
    )
    this._eventBus?.emit('triangulation:complete', {
      artifactRef,
      phase,
      consensusScore,
      unresolvedConflicts: unresolvedConflicts.length,
    })

    if (this._memory !== undefined) {
      const memory = this._memory
      await Promise.all(
        viewpoints
          .filter((v) => !v.timedOut && content !== null)
          .map((v) => memory.recordViewpointOutcome({ phase, viewpoint: v.viewpoint, agreed: v.passed === passed })),
      )
    }

    return { id, artifactRef, phase, viewpoints, consensusScore, conflicts, unresolvedConflicts, passed }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _evaluate(
    viewpoint: string,
    weight: number,
    passThreshold: number,
    input: Parameters<ViewpointEvaluator>[0],
  ): Promise<ViewpointResult> {
    const evaluator = this._evaluators[viewpoint]
    try {
      if (evaluator === undefined) {
        throw new Error(`No evaluator registered for viewpoint "${viewpoint}"`)
      }
      const evaluation = await withTimeout(
        evaluator(input),
        this._config.viewpoint_timeout_ms,
        `viewpoint ${viewpoint}`,
      )
      if (!Number.isFinite(evaluation.score)) {
        throw new Error(`Viewpoint ${viewpoint} returned a non-numeric score`)
      }
      const score = roundTo(Math.min(1, Math.max(0, evaluation.score)), 4)
      return { viewpoint, score, issues: [...evaluation.issues], weight, passed: score >= passThreshold, timedOut: false }
    } catch (err) {
      const reason = errorMessage(err)
      logger.warn({ viewpoint, reason }, 'Viewpoint evaluation failed; using neutral score')
      const score = this._config.neutral_score
      return {
        viewpoint,
        score,
        issues: [],
        weight: roundTo(weight * this._config.timeout_weight_factor, 4),
        passed: score >= passThreshold,
        timedOut: true,
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createTriangulationEngine(options: TriangulationEngineOptions): TriangulationEngine {
  return new TriangulationEngineImpl(options)
}
