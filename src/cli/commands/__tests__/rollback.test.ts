/**
 * Tests for `cadence rollback` and `cadence cancel`.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Project } from '../../../core/types.js'
import type { DispatchOutcome } from '../../../modules/dispatch/types.js'
import { runCancelAction } from '../cancel.js'
import { runRollbackAction } from '../rollback.js'
import { runSignalAction } from '../signal.js'
import { runStartAction } from '../start.js'
import {
  GOAL,
  GOOD_ARTIFACT,
  captureOutput,
  completionSignal,
  createTestProject,
  initProject,
  type CapturedOutput,
  type TestProject,
} from './helpers.js'

let project: TestProject
let output: CapturedOutput

function location(): { projectRoot: string; globalConfigDir: string; outputFormat: 'json' } {
  return { projectRoot: project.root, globalConfigDir: project.globalConfigDir, outputFormat: 'json' }
}

beforeEach(async () => {
  project = createTestProject()
  output = captureOutput()
  await initProject(project, output)
  await runStartAction({ namespace: 'demo', goal: GOAL, ...location() })
  project.writeFile('goal.md', GOOD_ARTIFACT)
  project.writeFile('sig-1.json', completionSignal('sig-1', 'goal.md'))
  await runSignalAction({ source: 'sig-1.json', ...location() })
  output.reset()
})

afterEach(() => {
  output.restore()
  project.cleanup()
})

describe('runRollbackAction', () => {
  it('moves back and re-issues the target phase', async () => {
    const code = await runRollbackAction({ namespace: 'demo', phase: 'goal-clarification', ...location() })

    const outcome = output.jsonData<DispatchOutcome>()
    expect(code).toBe(0)
    expect(outcome.kind).toBe('enqueued')
    expect(outcome.phase).toBe('goal-clarification')
    expect(outcome.instruction?.workerName).toBe('goal-clarifier-memory-enhanced')
  })

  it('exits 2 for an unknown phase name', async () => {
    const code = await runRollbackAction({ namespace: 'demo', phase: 'design', ...location() })

    expect(code).toBe(2)
    expect(output.stderr()).toMatch(/^Error: Unknown phase "design"\. Expected one of: goal-clarification, /)
  })

  it('exits 2 for a target that is not earlier', async () => {
    const code = await runRollbackAction({ namespace: 'demo', phase: 'architecture', ...location() })

    expect(code).toBe(2)
    expect(output.stderr()).toBe('Error: Rollback target architecture is not before specification\n')
  })
})

describe('runCancelAction', () => {
  it('cancels without prompting when --yes is given', async () => {
    const code = await runCancelAction({ namespace: 'demo', yes: true, isTTY: true, ...location() })

    const cancelled = output.jsonData<Project>()
    expect(code).toBe(0)
    expect(cancelled.status).toBe('cancelled')
    expect(cancelled.currentPhase).toBe('specification')
  })

  it('aborts when the operator declines', async () => {
    const code = await runCancelAction({
      namespace: 'demo',
      yes: false,
      isTTY: true,
      confirm: async () => false,
      ...location(),
    })

    expect(code).toBe(0)
    expect(output.stdout()).toBe('Cancelled by user.\n')
  })

  it('exits 2 when the project is already cancelled', async () => {
    await runCancelAction({ namespace: 'demo', yes: true, isTTY: false, ...location() })
    output.reset()

    const code = await runCancelAction({ namespace: 'demo', yes: true, isTTY: false, ...location() })

    expect(code).toBe(2)
    expect(output.stderr()).toBe('Error: Project demo is already cancelled\n')
  })
})
