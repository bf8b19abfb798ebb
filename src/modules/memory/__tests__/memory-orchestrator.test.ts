/**
 * Unit tests for MemoryOrchestratorImpl.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openMemoryDatabase } from '../../../persistence/database.js'
import { buildConfig } from '../../config/index.js'
import type { MemoryConfig } from '../../config/index.js'
import { SqlitePatternStore } from '../../pattern-store/sqlite-pattern-store.js'
import { HashingEmbedder } from '../../pattern-store/embedder.js'
import type { PatternStore } from '../../pattern-store/pattern-store.js'
import type { MemoryRecord, ScoredRecord } from '../../pattern-store/types.js'
import { MemoryOrchestratorImpl, recencyDecay } from '../memory-orchestrator-impl.js'

const NOW = new Date('2026-03-01T00:00:00.000Z')

let db: BetterSqlite3Database
let store: SqlitePatternStore

beforeEach(() => {
  db = openMemoryDatabase()
  store = new SqlitePatternStore(db)
})

afterEach(() => {
  db.close()
})

function orchestrator(storeOverride?: PatternStore, memoryOverrides: Partial<Pick<MemoryConfig, 'top_k' | 'min_applicability' | 'enhance_timeout_ms'>> = {}): MemoryOrchestratorImpl {
  const config = buildConfig({ memory: { ema_alpha: 0.5, ...memoryOverrides } })
  return new MemoryOrchestratorImpl({
    store: storeOverride ?? store,
    embedder: new HashingEmbedder(),
    config: config.memory,
    now: () => NOW,
  })
}

const unreachable: PatternStore = {
  upsert: () => Promise.reject(new Error('ECONNREFUSED')),
  query: () => Promise.reject(new Error('ECONNREFUSED')),
  get: () => Promise.reject(new Error('ECONNREFUSED')),
  prune: () => Promise.reject(new Error('ECONNREFUSED')),
  ping: () => Promise.reject(new Error('ECONNREFUSED')),
}

const hanging: PatternStore = {
  upsert: () => new Promise<MemoryRecord>(() => undefined),
  query: () => new Promise<ScoredRecord[]>(() => undefined),
  get: () => new Promise<MemoryRecord | undefined>(() => undefined),
  prune: () => new Promise<number>(() => undefined),
  ping: () => new Promise<void>(() => undefined),
}

describe('recencyDecay', () => {
  it('halves once per half-life', () => {
    expect(recencyDecay('2026-03-01T00:00:00.000Z', NOW, 30)).toBe(1)
    expect(recencyDecay('2026-01-30T00:00:00.000Z', NOW, 30)).toBeCloseTo(0.5, 10)
    expect(recencyDecay('not a date', NOW, 30)).toBe(0)
  })
})

describe('record', () => {
  it('creates a record and moves its confidence with each outcome', async () => {
    const memory = orchestrator()
    const outcome = {
      namespace: 'demo',
      workerName: 'specification-writer',
      taskType: 'specification',
      patternText: 'list every endpoint with its error codes',
      success: true,
    }

    await memory.record(outcome)
    await memory.record({ ...outcome, success: false })

    const rows = db.prepare('SELECT confidence_score, success_count, failure_count FROM memory_records').all() as {
      confidence_score: number
      success_count: number
      failure_count: number
    }[]
    // 0.5 → 0.75 → 0.375 with alpha 0.5
    expect(rows).toEqual([{ confidence_score: 0.375, success_count: 1, failure_count: 1 }])
  })

  it('never throws when the store is unreachable', async () => {
    await expect(
      orchestrator(unreachable).record({
        namespace: 'demo',
        workerName: 'w',
        taskType: 't',
        patternText: 'p',
        success: true,
      }),
    ).resolves.toBeUndefined()
  })
})

describe('enhance', () => {
  it('returns an empty, non-degraded boost when nothing is stored', async () => {
    const boost = await orchestrator().enhance('specification-writer', 'specification', { text: 'build an API' })
    expect(boost).toEqual({
      workerName: 'specification-writer',
      taskType: 'specification',
      patterns: [],
      degraded: false,
    })
  })

  it('ranks by confidence, recency and similarity', async () => {
    const memory = orchestrator()
    const base = { namespace: 'demo', workerName: 'specification-writer', taskType: 'specification' }
    await memory.record({ ...base, patternText: 'document api endpoints', success: true, at: '2026-03-01T00:00:00.000Z' })
    await memory.record({ ...base, patternText: 'document api endpoints', success: true, at: '2026-03-01T00:00:00.000Z' })
    await memory.record({ ...base, patternText: 'document api errors', success: false, at: '2026-01-30T00:00:00.000Z' })
    await memory.record({
      ...base,
      workerName: 'architecture-writer',
      taskType: 'architecture',
      patternText: 'document api endpoints',
      success: true,
    })

    const boost = await memory.enhance('specification-writer', 'specification', { text: 'document api endpoints' })

    expect(boost.degraded).toBe(false)
    expect(boost.patterns.map((p) => p.patternText)).toEqual(['document api endpoints', 'document api errors'])
    const [best, second] = boost.patterns
    // two successes: 0.5 → 0.75 → 0.875
    expect(best?.confidenceScore).toBe(0.875)
    expect(best?.similarity).toBe(1)
    expect(best?.recency).toBe(1)
    expect(best?.applicability).toBe(0.875)
    expect(second?.recency).toBe(0.5)
    expect(boost.patterns.every((p) => p.tags.includes('specification'))).toBe(true)
  })

  it('also draws on patterns the same worker recorded for other task types', async () => {
    const memory = orchestrator(undefined, { min_applicability: 0 })
    await memory.record({ namespace: 'demo', workerName: 'w', taskType: 'architecture', patternText: 'split services by domain', success: true })
    await memory.record({ namespace: 'demo', workerName: 'other', taskType: 'architecture', patternText: 'split services by team', success: true })

    const boost = await memory.enhance('w', 'specification', { text: 'split services by domain' })
    expect(boost.patterns.map((p) => p.patternText)).toEqual(['split services by domain'])
    expect(boost.patterns[0]?.tags).toEqual(['architecture', 'worker:w'])
  })

  it('applies top_k and min_applicability', async () => {
    const memory = orchestrator(undefined, { top_k: 1 })
    const base = { namespace: 'demo', workerName: 'w', taskType: 'specification', success: true }
    await memory.record({ ...base, patternText: 'alpha beta gamma' })
    await memory.record({ ...base, patternText: 'alpha beta delta' })

    const boost = await memory.enhance('w', 'specification', { text: 'alpha beta gamma' })
    expect(boost.patterns).toHaveLength(1)
    expect(boost.patterns[0]?.patternText).toBe('alpha beta gamma')

    const strict = orchestrator(undefined, { min_applicability: 1 })
    expect((await strict.enhance('w', 'specification', { text: 'alpha beta gamma' })).patterns).toEqual([])
  })

  it('degrades to an empty boost when the store fails', async () => {
    const boost = await orchestrator(unreachable).enhance('w', 'specification', { text: 'x' })
    expect(boost.patterns).toEqual([])
    expect(boost.degraded).toBe(true)
    expect(boost.reason).toBe('ECONNREFUSED')
  })

  it('returns within its timeout when the store hangs', async () => {
    const memory = orchestrator(hanging, { enhance_timeout_ms: 50 })
    const started = Date.now()
    const boost = await memory.enhance('w', 'specification', { text: 'x' })
    expect(Date.now() - started).toBeLessThan(1_000)
    expect(boost.degraded).toBe(true)
    expect(boost.reason).toBe('memory enhance timed out after 50ms')
  })
})

describe('viewpoint calibration', () => {
  it('defaults to 1 and follows recorded agreement', async () => {
    const memory = orchestrator()
    expect([...(await memory.viewpointCalibration('specification', ['security', 'alignment']))]).toEqual([
      ['security', 1],
      ['alignment', 1],
    ])

    await memory.recordViewpointOutcome({ phase: 'specification', viewpoint: 'security', agreed: true })
    await memory.recordViewpointOutcome({ phase: 'specification', viewpoint: 'alignment', agreed: false })

    const calibration = await memory.viewpointCalibration('specification', ['security', 'alignment'])
    // 0.5 + 0.75 and 0.5 + 0.25
    expect(calibration.get('security')).toBe(1.25)
    expect(calibration.get('alignment')).toBe(0.75)
  })

  it('keeps calibration records out of memory boosts', async () => {
    const memory = orchestrator()
    await memory.recordViewpointOutcome({ phase: 'specification', viewpoint: 'security', agreed: true })
    const boost = await memory.enhance('w', 'viewpoint-calibration', { text: 'viewpoint security' })
    expect(boost.patterns).toEqual([])
  })

  it('falls back to neutral weights when the store fails', async () => {
    const calibration = await orchestrator(unreachable).viewpointCalibration('specification', ['security'])
    expect(calibration.get('security')).toBe(1)
  })
})

describe('prune', () => {
  it('applies the configured retention policy', async () => {
    const memory = orchestrator(undefined, { top_k: 5 })
    await memory.record({ namespace: 'demo', workerName: 'w', taskType: 't', patternText: 'old', success: true, at: '2025-01-01T00:00:00.000Z' })
    await memory.record({ namespace: 'demo', workerName: 'w', taskType: 't', patternText: 'new', success: true })
    expect(await memory.prune()).toBe(1)
  })
})
