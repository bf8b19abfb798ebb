/**
 * End-to-end: a project driven from goal to completion through the assembled
 * engine, plus the detours an executor and an operator can cause.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createEngine } from '../../core/engine-impl.js'
import type { Engine } from '../../core/engine.js'
import { PHASE_SEQUENCE, phaseIndex, type Phase } from '../../core/types.js'
import { buildConfig } from '../../modules/config/index.js'
import type { CadenceConfig } from '../../modules/config/config-schema.js'
import { InMemoryArtifactResolver } from '../../modules/triangulation/artifact-resolver.js'
import { IN_MEMORY_DATABASE } from '../../persistence/database.js'

const GOAL = 'Build a todo list application'

let dataDir: string
let engine: Engine
let config: Readonly<CadenceConfig>
let signalCounter: number

function workerFor(phase: Phase): string {
  return `${config.workers.phase_capabilities[phase]}-memory-enhanced`
}

function completion(phase: Phase, artifactRef: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  signalCounter += 1
  return {
    namespace: 'demo',
    phase,
    workerName: workerFor(phase),
    artifactRefs: [artifactRef],
    timestamp: '2026-03-01T10:00:00.000Z',
    signalId: `sig-${String(signalCounter)}`,
    ...extra,
  }
}

beforeEach(async () => {
  dataDir = mkdtempSync(join(tmpdir(), 'cadence-e2e-'))
  signalCounter = 0
  config = buildConfig({ global: { data_dir: dataDir } })
  engine = await createEngine({
    config,
    databasePath: IN_MEMORY_DATABASE,
    resolver: new InMemoryArtifactResolver({
      'good.md': `# Plan\n${GOAL} with due dates and reminders.\n`,
      'unsafe.md': `# Plan\n${GOAL}.\nconst password = "test-secret"\neval(input)\n`,
    }),
  })
})

afterEach(async () => {
  await engine.shutdown()
  rmSync(dataDir, { recursive: true, force: true })
})

describe('project lifecycle', () => {
  it('walks every phase in order and completes', async () => {
    await engine.dispatcher.startProject('demo', GOAL)

    const kinds: string[] = []
    for (const phase of PHASE_SEQUENCE) {
      const outcome = await engine.dispatcher.onCompletionSignal(completion(phase, 'good.md'))
      kinds.push(outcome.kind)
    }

    const { project, history } = engine.phaseMachine.status('demo')
    expect(kinds).toEqual([...Array<string>(PHASE_SEQUENCE.length - 1).fill('enqueued'), 'completed'])
    expect(project.status).toBe('completed')
    expect(history.map((h) => h.phase)).toEqual([...PHASE_SEQUENCE])
  })

  it('hands the second phase to the memory-enhanced specification writer', async () => {
    await engine.dispatcher.startProject('demo', GOAL)

    const outcome = await engine.dispatcher.onCompletionSignal(completion('goal-clarification', 'good.md'))

    expect(outcome.instruction?.workerName).toBe('specification-writer-memory-enhanced')
    expect(outcome.instruction?.context.priorArtifacts).toEqual(['good.md'])
    expect(outcome.instruction?.context.intent.goals).toEqual([GOAL])
  })

  it('escalates once after two failed safety reviews and continues on approval', async () => {
    await engine.dispatcher.startProject('demo', GOAL)

    const first = await engine.dispatcher.onCompletionSignal(completion('goal-clarification', 'unsafe.md'))
    const second = await engine.dispatcher.onCompletionSignal(
      completion('goal-clarification', 'unsafe.md', { kind: 'remediation' }),
    )
    const open = engine.dispatcher.listEscalations({ namespace: 'demo', status: 'open' })

    expect(first.kind).toBe('remediation')
    expect(second.kind).toBe('escalated')
    expect(open.map((e) => [e.kind, e.gateName])).toEqual([['gate', 'safety']])

    const approved = await engine.dispatcher.approve(open[0]?.id ?? 'missing', 'accepted risk')
    expect(approved.phase).toBe('specification')
    expect(engine.phaseMachine.status('demo').history.map((h) => h.via)).toEqual(['created', 'approved'])
  })

  it('stops work that conflicts with an anti-goal', async () => {
    await engine.dispatcher.startProject('demo', GOAL)
    engine.intent.recordIntent('demo', { kind: 'anti-goal', text: 'Avoid paid hosting services', source: 'explicit' })

    const outcome = await engine.dispatcher.onCompletionSignal(
      completion('goal-clarification', 'good.md', { summary: 'Deployed the todo list on paid hosting services' }),
    )

    expect(outcome.kind).toBe('intent-stop')
    expect(engine.phaseMachine.getProject('demo')?.currentPhase).toBe('goal-clarification')
    expect(engine.dispatcher.listEscalations({ status: 'open' }).map((e) => e.kind)).toEqual(['intent'])
  })

  it('processes a redelivered signal once', async () => {
    await engine.dispatcher.startProject('demo', GOAL)
    const signal = completion('goal-clarification', 'good.md')

    const [a, b] = await Promise.all([
      engine.dispatcher.onCompletionSignal(signal),
      engine.dispatcher.onCompletionSignal(signal),
    ])

    expect([a.kind, b.kind]).toEqual(['enqueued', 'duplicate'])
    expect(engine.listInstructions({ namespace: 'demo' })).toHaveLength(2)
  })

  it('treats a signal for a phase already left as stale', async () => {
    await engine.dispatcher.startProject('demo', GOAL)
    await engine.dispatcher.onCompletionSignal(completion('goal-clarification', 'good.md'))

    const late = await engine.dispatcher.onCompletionSignal(completion('goal-clarification', 'good.md'))

    expect(late.kind).toBe('stale')
    expect(late.reasons).toEqual(['Project already left goal-clarification; now in specification'])
  })

  it('keeps the phase index monotonic except for explicit rollback', async () => {
    await engine.dispatcher.startProject('demo', GOAL)
    await engine.dispatcher.onCompletionSignal(completion('goal-clarification', 'good.md'))
    await engine.dispatcher.onCompletionSignal(completion('specification', 'good.md'))

    const rolled = await engine.dispatcher.rollback('demo', 'specification')
    await engine.dispatcher.onCompletionSignal(completion('specification', 'good.md'))

    const history = engine.phaseMachine.status('demo').history
    expect(rolled.phase).toBe('specification')
    expect(history.map((h) => [h.phase, h.via])).toEqual([
      ['goal-clarification', 'created'],
      ['specification', 'advanced'],
      ['architecture', 'advanced'],
      ['specification', 'rolled-back'],
      ['architecture', 'advanced'],
    ])
    for (let i = 1; i < history.length; i++) {
      const prev = history[i - 1]
      const entry = history[i]
      if (prev === undefined || entry === undefined) continue
      if (entry.via !== 'rolled-back') {
        expect(phaseIndex(entry.phase)).toBeGreaterThan(phaseIndex(prev.phase))
      }
    }
  })

  it('answers every signal after cancel with stale', async () => {
    await engine.dispatcher.startProject('demo', GOAL)
    await engine.dispatcher.cancelProject('demo')

    const late = await engine.dispatcher.onCompletionSignal(completion('goal-clarification', 'good.md'))

    expect(late.kind).toBe('stale')
    expect(late.reasons).toEqual(['Project is cancelled'])
  })
})
