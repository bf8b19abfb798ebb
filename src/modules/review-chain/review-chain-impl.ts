/**
 * ReviewChainImpl: sequential quality gates over triangulation.
 *
 * Position and retry counts live in review_progress per (namespace, phase)
 * so a remediated artifact re-enters the gate that failed it, even when the
 * fix arrives as a separate completion signal. A review of a different
 * artifact that is not a remediation starts again from the first gate.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { Phase } from '../../core/types.js'
import { createEscalation } from '../../persistence/queries/escalations.js'
import {
  emptyReviewProgress,
  getReviewProgress,
  insertGateResult,
  saveReviewProgress,
} from '../../persistence/queries/review.js'
import { generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ReviewConfig, ReviewGateConfig } from '../config/config-schema.js'
import type { TriangulationEngine } from '../triangulation/triangulation-engine.js'
import type { TriangulationResult } from '../triangulation/types.js'
import type { ReviewChain } from './review-chain.js'
import type {
  RemediateFn,
  ReviewChainOutcome,
  ReviewContext,
  ReviewGateResult,
  ReviewProgress,
} from './types.js'

const logger = createLogger('review-chain')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ReviewChainOptions {
  config: Readonly<ReviewConfig>
  triangulation: TriangulationEngine
  db?: BetterSqlite3Database
  eventBus?: TypedEventBus
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Issues a failed gate reports: viewpoint issues, open conflicts, low consensus */
export function gateIssues(result: TriangulationResult, passThreshold: number): string[] {
  const issues: string[] = []
  for (const v of result.viewpoints) {
    for (const issue of v.issues) {
      issues.push(`[${v.viewpoint}] ${issue}`)
    }
  }
  for (const conflict of result.unresolvedConflicts) {
    issues.push(`Unresolved conflict: ${conflict.reason}`)
  }
  if (result.consensusScore < passThreshold) {
    issues.push(`Consensus ${result.consensusScore} is below the pass threshold ${passThreshold}`)
  }
  return issues
}

function cloneProgress(progress: ReviewProgress): ReviewProgress {
  return { ...progress, retryCounts: { ...progress.retryCounts } }
}

// ---------------------------------------------------------------------------
// ReviewChainImpl
// ---------------------------------------------------------------------------

export class ReviewChainImpl implements ReviewChain {
  private readonly _config: Readonly<ReviewConfig>
  private readonly _triangulation: TriangulationEngine
  private readonly _db: BetterSqlite3Database | undefined
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: ReviewChainOptions) {
    this._config = options.config
    this._triangulation = options.triangulation
    this._db = options.db
    this._eventBus = options.eventBus
  }

  get gateNames(): string[] {
    return this._config.gates.map((g) => g.name)
  }

  async review(artifactRef: string, phase: Phase, context: ReviewContext): Promise<ReviewChainOutcome> {
    const { namespace } = context
    const progress = this._startingProgress(artifactRef, phase, context)
    const results: ReviewGateResult[] = []

    const gates = this._config.gates
    for (let index = progress.gateIndex; index < gates.length; index++) {
      const gate = gates[index]
      if (gate === undefined) break

      const failures = progress.retryCounts[gate.name] ?? 0
      if (failures >= this._config.max_retries) {
        // Already escalated; an operator has to act before this gate runs again
        logger.debug({ namespace, phase, gate: gate.name }, 'Gate retries exhausted; not re-running')
        return this._finish(namespace, phase, progress, { status: 'escalated', results, progress })
      }

      const result = await this._runGate(gate, artifactRef, phase, context, failures)
      results.push(result)

      if (result.passed) {
        progress.gateIndex = index + 1
        this._eventBus?.emit('gate:passed', { namespace, phase, gateName: gate.name, score: result.score })
        continue
      }

      progress.retryCounts[gate.name] = result.retryCount
      this._eventBus?.emit('gate:failed', {
        namespace,
        phase,
        gateName: gate.name,
        score: result.score,
        retryCount: result.retryCount,
        issues: result.issues,
      })

      if (result.retryCount >= this._config.max_retries) {
        const reason = `Gate "${gate.name}" failed ${String(result.retryCount)} times for ${artifactRef}`
        const escalationId = this._raiseEscalation(namespace, phase, gate.name, reason)
        logger.warn({ namespace, phase, gate: gate.name, escalationId }, 'Review escalated')
        return this._finish(namespace, phase, progress, {
          status: 'escalated',
          results,
          escalation: { escalationId, gateName: gate.name, reason },
          progress,
        })
      }

      const fixInstruction = {
        gateName: gate.name,
        artifactRef,
        phase,
        issues: result.issues,
        attempt: result.retryCount,
        remainingAttempts: this._config.max_retries - result.retryCount,
      }
      logger.info({ namespace, phase, gate: gate.name, attempt: result.retryCount }, 'Remediation requested')
      this._eventBus?.emit('review:remediation-requested', {
        namespace,
        phase,
        gateName: gate.name,
        artifactRef,
        issues: result.issues,
      })
      return this._finish(namespace, phase, progress, { status: 'remediation', results, fixInstruction, progress })
    }

    progress.gateIndex = gates.length
    return this._finish(namespace, phase, progress, { status: 'passed', results, progress })
  }

  async reviewUntilSettled(
    artifactRef: string,
    phase: Phase,
    context: ReviewContext,
    remediate: RemediateFn,
  ): Promise<ReviewChainOutcome> {
    const results: ReviewGateResult[] = []
    let ref = artifactRef
    let progress = context.progress
    let remediation = context.remediation ?? false

    // Terminates: every remediation pass spends one retry of a bounded budget
    for (;;) {
      const outcome = await this.review(ref, phase, { ...context, progress, remediation })
      results.push(...outcome.results)
      if (outcome.status !== 'remediation' || outcome.fixInstruction === undefined) {
        return { ...outcome, results }
      }
      const fixedRef = await remediate(outcome.fixInstruction)
      ref = typeof fixedRef === 'string' ? fixedRef : ref
      progress = outcome.progress
      remediation = true
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _startingProgress(artifactRef: string, phase: Phase, context: ReviewContext): ReviewProgress {
    const stored =
      context.progress ??
      (this._db !== undefined ? getReviewProgress(this._db, context.namespace, phase) : emptyReviewProgress())
    const progress = cloneProgress(stored)

    if (progress.artifactRef !== null && progress.artifactRef !== artifactRef && context.remediation !== true) {
      return { ...emptyReviewProgress(), artifactRef, intentModifyCount: progress.intentModifyCount }
    }
    progress.artifactRef = artifactRef
    return progress
  }

  private async _runGate(
    gate: ReviewGateConfig,
    artifactRef: string,
    phase: Phase,
    context: ReviewContext,
    failures: number,
  ): Promise<ReviewGateResult> {
    const triangulation = await this._triangulation.triangulate(artifactRef, phase, {
      viewpoints: gate.viewpoints,
      namespace: context.namespace,
      goal: context.goal,
      passThreshold: this._config.pass_threshold,
    })
    const passed = triangulation.passed
    const result: ReviewGateResult = {
      gateName: gate.name,
      artifactRef,
      passed,
      score: triangulation.consensusScore,
      issues: passed ? [] : gateIssues(triangulation, this._config.pass_threshold),
      retryCount: passed ? failures : failures + 1,
      triangulation,
    }

    if (this._db !== undefined) {
      insertGateResult(this._db, {
        namespace: context.namespace,
        phase,
        gateName: gate.name,
        artifactRef,
        passed,
        score: result.score,
        issues: result.issues,
        retryCount: result.retryCount,
        triangulationId: triangulation.id,
      })
    }
    logger.debug({ gate: gate.name, artifactRef, passed, score: result.score }, 'Gate evaluated')
    return result
  }

  private _raiseEscalation(namespace: string, phase: Phase, gateName: string, reason: string): string {
    const escalationId =
      this._db !== undefined
        ? createEscalation(this._db, { namespace, phase, kind: 'gate', gateName, reason }).id
        : generateId('escalation')
    this._eventBus?.emit('escalation:required', { escalationId, namespace, phase, kind: 'gate', reason })
    return escalationId
  }

  private _finish(
    namespace: string,
    phase: Phase,
    progress: ReviewProgress,
    outcome: ReviewChainOutcome,
  ): ReviewChainOutcome {
    if (this._db !== undefined) {
      saveReviewProgress(this._db, namespace, phase, progress)
    }
    return { ...outcome, progress: cloneProgress(progress) }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createReviewChain(options: ReviewChainOptions): ReviewChain {
  return new ReviewChainImpl(options)
}
