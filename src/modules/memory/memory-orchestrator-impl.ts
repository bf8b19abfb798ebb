/**
 * MemoryOrchestratorImpl: ranks stored patterns into memory boosts and
 * folds task outcomes back into the pattern store.
 *
 * Ranking: applicability = confidence × recency × similarity, where recency
 * halves every `recency_half_life_days` since the record's last update.
 */

import type { Phase } from '../../core/types.js'
import type { MemoryConfig } from '../config/config-schema.js'
import { clamp, errorMessage, generateId, roundTo, withTimeout } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { Embedder } from '../pattern-store/embedder.js'
import type { PatternStore } from '../pattern-store/pattern-store.js'
import { patternRecordId } from '../pattern-store/records.js'
import type { MemoryRecord, PatternWrite } from '../pattern-store/types.js'
import type { MemoryOrchestrator } from './memory-orchestrator.js'
import type {
  BoostedPattern,
  EnhanceContext,
  MemoryBoost,
  TaskOutcome,
  ViewpointCalibration,
  ViewpointOutcome,
} from './types.js'

const logger = createLogger('memory')

const MS_PER_DAY = 24 * 60 * 60 * 1000

/** Candidates fetched per boosted pattern before re-ranking */
const CANDIDATE_FACTOR = 4

const CALIBRATION_TAG = 'viewpoint-calibration'
const MIN_MULTIPLIER = 0.5
const MAX_MULTIPLIER = 1.5

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface MemoryOrchestratorOptions {
  store: PatternStore
  embedder: Embedder
  config: Readonly<MemoryConfig>
  /** Clock, for tests */
  now?: () => Date
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Tag naming the worker that produced a pattern */
export function workerTag(workerName: string): string {
  return `worker:${workerName}`
}

/** Recency decay: 1 for a record updated now, 0.5 after one half-life */
export function recencyDecay(updatedAt: string, now: Date, halfLifeDays: number): number {
  const updated = Date.parse(updatedAt)
  if (Number.isNaN(updated)) return 0
  const ageDays = Math.max(0, (now.getTime() - updated) / MS_PER_DAY)
  return Math.pow(0.5, ageDays / halfLifeDays)
}

function calibrationTags(phase: Phase, viewpoint: string): string[] {
  return [CALIBRATION_TAG, `phase:${phase}`, `viewpoint:${viewpoint}`]
}

function calibrationText(phase: Phase, viewpoint: string): string {
  return `viewpoint ${viewpoint} verdicts in ${phase}`
}

function emptyBoost(workerName: string, taskType: string, reason?: string): MemoryBoost {
  return reason === undefined
    ? { workerName, taskType, patterns: [], degraded: false }
    : { workerName, taskType, patterns: [], degraded: true, reason }
}

// ---------------------------------------------------------------------------
// MemoryOrchestratorImpl
// ---------------------------------------------------------------------------

export class MemoryOrchestratorImpl implements MemoryOrchestrator {
  private readonly _store: PatternStore
  private readonly _embedder: Embedder
  private readonly _config: Readonly<MemoryConfig>
  private readonly _now: () => Date

  constructor(options: MemoryOrchestratorOptions) {
    this._store = options.store
    this._embedder = options.embedder
    this._config = options.config
    this._now = options.now ?? (() => new Date())
  }

  async enhance(workerName: string, taskType: string, context: EnhanceContext): Promise<MemoryBoost> {
    try {
      return await withTimeout(
        this._rank(workerName, taskType, context),
        this._config.enhance_timeout_ms,
        'memory enhance',
      )
    } catch (err) {
      const reason = errorMessage(err)
      logger.warn({ workerName, taskType, reason }, 'Memory boost unavailable; continuing without it')
      return emptyBoost(workerName, taskType, reason)
    }
  }

  async record(outcome: TaskOutcome): Promise<void> {
    const namespace = outcome.global === true ? null : outcome.namespace
    const tags = [outcome.taskType, workerTag(outcome.workerName)]
    const write: PatternWrite = {
      id: patternRecordId(namespace, tags, outcome.patternText),
      writeId: generateId('pw'),
      namespace,
      patternText: outcome.patternText,
      embedding: this._embedder.embed(`${outcome.taskType} ${outcome.patternText}`),
      outcome: outcome.success ? 'success' : 'failure',
      alpha: this._config.ema_alpha,
      at: outcome.at ?? this._now().toISOString(),
    }

    try {
      const record = await this._store.upsert(tags, write)
      logger.debug(
        { recordId: record.id, confidence: record.confidenceScore, success: outcome.success },
        'Task outcome recorded',
      )
    } catch (err) {
      logger.warn({ namespace: outcome.namespace, reason: errorMessage(err) }, 'Failed to record task outcome')
    }
  }

  async viewpointCalibration(phase: Phase, viewpoints: string[]): Promise<ViewpointCalibration> {
    const calibration: ViewpointCalibration = new Map(viewpoints.map((v): [string, number] => [v, 1]))
    try {
      const records = await withTimeout(
        Promise.all(
          viewpoints.map((v) =>
            this._store.get(patternRecordId(null, calibrationTags(phase, v), calibrationText(phase, v))),
          ),
        ),
        this._config.enhance_timeout_ms,
        'viewpoint calibration',
      )
      viewpoints.forEach((viewpoint, i) => {
        const record = records[i]
        if (record !== undefined) {
          calibration.set(viewpoint, roundTo(clamp(MIN_MULTIPLIER + record.confidenceScore, MIN_MULTIPLIER, MAX_MULTIPLIER), 4))
        }
      })
    } catch (err) {
      logger.debug({ phase, reason: errorMessage(err) }, 'Viewpoint calibration unavailable; using neutral weights')
    }
    return calibration
  }

  async recordViewpointOutcome(outcome: ViewpointOutcome): Promise<void> {
    const tags = calibrationTags(outcome.phase, outcome.viewpoint)
    const text = calibrationText(outcome.phase, outcome.viewpoint)
    const write: PatternWrite = {
      id: patternRecordId(null, tags, text),
      writeId: generateId('pw'),
      namespace: null,
      patternText: text,
      embedding: this._embedder.embed(text),
      outcome: outcome.agreed ? 'success' : 'failure',
      alpha: this._config.ema_alpha,
      at: this._now().toISOString(),
    }
    try {
      await this._store.upsert(tags, write)
    } catch (err) {
      logger.warn({ ...outcome, reason: errorMessage(err) }, 'Failed to record viewpoint outcome')
    }
  }

  async prune(): Promise<number> {
    const removed = await this._store.prune({
      maxAgeDays: this._config.retention.max_age_days,
      maxRecords: this._config.retention.max_records,
      now: this._now(),
    })
    logger.info({ removed }, 'Memory retention applied')
    return removed
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _rank(workerName: string, taskType: string, context: EnhanceContext): Promise<MemoryBoost> {
    const topK = this._config.top_k
    const embedding = this._embedder.embed(`${taskType} ${context.text}`)
    const hits = await this._store.query([taskType, workerTag(workerName)], embedding, topK * CANDIDATE_FACTOR)
    if (hits.length === 0) {
      return emptyBoost(workerName, taskType)
    }

    const now = this._now()
    const patterns = hits
      .filter(({ record }) => !record.tags.includes(CALIBRATION_TAG))
      .map(({ record, similarity }) => this._toBoosted(record, similarity, now))
      .filter((p) => p.applicability >= this._config.min_applicability)
      .sort((a, b) => b.applicability - a.applicability || a.id.localeCompare(b.id))
      .slice(0, topK)

    return { workerName, taskType, patterns, degraded: false }
  }

  private _toBoosted(record: MemoryRecord, similarity: number, now: Date): BoostedPattern {
    const recency = recencyDecay(record.updatedAt, now, this._config.recency_half_life_days)
    return {
      id: record.id,
      patternText: record.patternText,
      tags: record.tags,
      confidenceScore: record.confidenceScore,
      similarity: roundTo(similarity, 4),
      recency: roundTo(recency, 4),
      applicability: roundTo(record.confidenceScore * recency * similarity, 4),
      successCount: record.successCount,
      failureCount: record.failureCount,
      sourceNamespace: record.namespace,
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createMemoryOrchestrator(options: MemoryOrchestratorOptions): MemoryOrchestrator {
  return new MemoryOrchestratorImpl(options)
}
