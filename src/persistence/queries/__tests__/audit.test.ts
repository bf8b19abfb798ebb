/**
 * Unit tests for the signal log, review audit, intent, escalation and
 * instruction outbox queries.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openMemoryDatabase } from '../../database.js'
import { appendSignal, getSignal, listSignals, setSignalOutcome } from '../signals.js'
import {
  insertTriangulationResult,
  insertGateResult,
  listGateResults,
  getReviewProgress,
  saveReviewProgress,
  resetReviewProgress,
} from '../review.js'
import { upsertIntentEntry, listIntentEntries } from '../intents.js'
import {
  createEscalation,
  listEscalations,
  findOpenEscalation,
  resolveEscalation,
  closeOpenEscalations,
} from '../escalations.js'
import { insertInstruction, listInstructions, markInstructionDelivered } from '../instructions.js'
import type { CompletionSignal } from '../../../core/types.js'

let db: BetterSqlite3Database

beforeEach(() => {
  db = openMemoryDatabase()
})

afterEach(() => {
  db.close()
})

const signal: CompletionSignal = {
  namespace: 'demo',
  phase: 'goal-clarification',
  workerName: 'goal-clarifier',
  artifactRefs: ['artifacts/goal.md'],
  timestamp: '2026-01-01T00:00:00.000Z',
  signalId: 'sig-1',
}

describe('signal log', () => {
  it('deduplicates by (namespace, signalId)', () => {
    expect(appendSignal(db, signal)).toBe(true)
    expect(appendSignal(db, signal)).toBe(false)
    expect(appendSignal(db, { ...signal, namespace: 'other' })).toBe(true)
    expect(listSignals(db, 'demo')).toHaveLength(1)
  })

  it('records the outcome', () => {
    appendSignal(db, signal)
    setSignalOutcome(db, 'demo', 'sig-1', 'enqueued')
    const entry = getSignal(db, 'demo', 'sig-1')
    expect(entry?.outcome).toBe('enqueued')
    expect(entry?.artifactRefs).toEqual(['artifacts/goal.md'])
  })
})

describe('review audit', () => {
  it('stores gate results linked to a triangulation result', () => {
    const triangulationId = insertTriangulationResult(db, {
      namespace: 'demo',
      artifactRef: 'a.md',
      phase: 'specification',
      consensusScore: 0.8,
      passed: true,
      viewpoints: [{ viewpoint: 'security', score: 0.8, issues: [], weight: 1.5, passed: true, timedOut: false }],
      conflicts: [],
    })
    insertGateResult(db, {
      namespace: 'demo',
      phase: 'specification',
      gateName: 'safety',
      artifactRef: 'a.md',
      passed: true,
      score: 0.8,
      issues: [],
      retryCount: 0,
      triangulationId,
    })

    const results = listGateResults(db, 'demo', 'specification')
    expect(results).toHaveLength(1)
    expect(results[0]?.triangulationId).toBe(triangulationId)
    expect(results[0]?.passed).toBe(true)
  })

  it('returns empty progress by default and round-trips saved progress', () => {
    expect(getReviewProgress(db, 'demo', 'specification')).toEqual({
      artifactRef: null,
      gateIndex: 0,
      retryCounts: {},
      intentModifyCount: 0,
    })

    saveReviewProgress(db, 'demo', 'specification', {
      artifactRef: 'a.md',
      gateIndex: 2,
      retryCounts: { safety: 1 },
      intentModifyCount: 1,
    })
    saveReviewProgress(db, 'demo', 'specification', {
      artifactRef: 'a.md',
      gateIndex: 3,
      retryCounts: { safety: 1 },
      intentModifyCount: 1,
    })
    expect(getReviewProgress(db, 'demo', 'specification')).toEqual({
      artifactRef: 'a.md',
      gateIndex: 3,
      retryCounts: { safety: 1 },
      intentModifyCount: 1,
    })

    resetReviewProgress(db, 'demo', 'specification')
    expect(getReviewProgress(db, 'demo', 'specification').gateIndex).toBe(0)
  })
})

describe('intent entries', () => {
  it('never lets an inferred entry overwrite an explicit one', () => {
    upsertIntentEntry(db, 'demo', { kind: 'goal', text: 'Use REST', source: 'explicit', normalized: 'use rest', confidence: 1 })
    const result = upsertIntentEntry(db, 'demo', {
      kind: 'goal',
      text: 'use rest',
      source: 'inferred',
      normalized: 'use rest',
      confidence: 0.5,
    })

    expect(result.action).toBe('kept-existing')
    expect(result.entry.source).toBe('explicit')
    expect(listIntentEntries(db, 'demo')).toHaveLength(1)
  })

  it('lets an explicit entry replace an inferred one', () => {
    upsertIntentEntry(db, 'demo', { kind: 'goal', text: 'use rest', source: 'inferred', normalized: 'use rest', confidence: 0.5 })
    const result = upsertIntentEntry(db, 'demo', {
      kind: 'goal',
      text: 'Use REST',
      source: 'custom-answer',
      normalized: 'use rest',
      confidence: 1,
    })

    expect(result.action).toBe('updated')
    expect(result.entry).toMatchObject({ source: 'custom-answer', text: 'Use REST', confidence: 1 })
  })
})

describe('escalations', () => {
  it('lists, finds and resolves escalations', () => {
    const escalation = createEscalation(db, {
      namespace: 'demo',
      phase: 'specification',
      kind: 'gate',
      gateName: 'safety',
      reason: 'safety failed twice',
    })

    expect(findOpenEscalation(db, 'demo', 'specification')?.id).toBe(escalation.id)
    expect(listEscalations(db, { status: 'open' })).toHaveLength(1)

    resolveEscalation(db, escalation.id, 'approved', 'looks fine')
    expect(findOpenEscalation(db, 'demo', 'specification')).toBeUndefined()
    expect(listEscalations(db, { namespace: 'demo' })[0]).toMatchObject({
      status: 'approved',
      resolutionNote: 'looks fine',
    })
  })

  it('closes every open escalation of a namespace', () => {
    createEscalation(db, { namespace: 'demo', phase: 'specification', kind: 'intent', reason: 'r1' })
    createEscalation(db, { namespace: 'demo', phase: 'architecture', kind: 'gate', gateName: 'safety', reason: 'r2' })
    createEscalation(db, { namespace: 'other', phase: 'architecture', kind: 'gate', gateName: 'safety', reason: 'r3' })

    expect(closeOpenEscalations(db, 'demo', 'project cancelled')).toBe(2)
    expect(listEscalations(db, { status: 'open' }).map((e) => e.namespace)).toEqual(['other'])
  })
})

describe('instruction outbox', () => {
  it('queues and delivers instructions', () => {
    insertInstruction(db, {
      id: 'ins-1',
      namespace: 'demo',
      phase: 'specification',
      workerName: 'specification-writer-memory-enhanced',
      tier: 'memory-enhanced',
      kind: 'work',
      taskId: null,
      payload: { hello: 'world' },
      createdAt: '2026-01-01T00:00:00.000Z',
    })

    const queued = listInstructions(db, { status: 'queued' })
    expect(queued).toHaveLength(1)
    expect(queued[0]?.payload).toEqual({ hello: 'world' })

    expect(markInstructionDelivered(db, 'ins-1')).toBe(true)
    expect(markInstructionDelivered(db, 'ins-1')).toBe(false)
    expect(listInstructions(db, { status: 'queued' })).toHaveLength(0)
  })
})
