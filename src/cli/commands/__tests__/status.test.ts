/**
 * Tests for `cadence status`.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Project } from '../../../core/types.js'
import type { PhaseHistoryEntry } from '../../../persistence/queries/projects.js'
import type { OutboxInstruction } from '../../../persistence/queries/instructions.js'
import { runStartAction } from '../start.js'
import { runStatusAction } from '../status.js'
import { GOAL, captureOutput, createTestProject, initProject, type CapturedOutput, type TestProject } from './helpers.js'

let project: TestProject
let output: CapturedOutput

beforeEach(async () => {
  project = createTestProject()
  output = captureOutput()
  await initProject(project, output)
})

afterEach(() => {
  output.restore()
  project.cleanup()
})

async function startProject(namespace: string): Promise<void> {
  await runStartAction({
    namespace,
    goal: GOAL,
    outputFormat: 'json',
    projectRoot: project.root,
    globalConfigDir: project.globalConfigDir,
  })
  output.reset()
}

function status(namespace?: string, outputFormat: 'human' | 'json' = 'json'): Promise<number> {
  return runStatusAction({
    ...(namespace !== undefined && { namespace }),
    outputFormat,
    projectRoot: project.root,
    globalConfigDir: project.globalConfigDir,
  })
}

describe('runStatusAction', () => {
  it('says so when there are no projects', async () => {
    const code = await status(undefined, 'human')

    expect(code).toBe(0)
    expect(output.stdout()).toBe('No projects. Start one with: cadence start <namespace> --goal "<text>"\n')
  })

  it('lists every project', async () => {
    await startProject('alpha')
    await startProject('beta')

    await status()

    const { projects } = output.jsonData<{ projects: Project[] }>()
    expect(projects.map((p) => [p.namespace, p.currentPhase, p.status])).toEqual([
      ['alpha', 'goal-clarification', 'active'],
      ['beta', 'goal-clarification', 'active'],
    ])
  })

  it('shows one project with its history and queued instructions', async () => {
    await startProject('demo')

    await status('demo')

    const data = output.jsonData<{
      project: Project
      history: PhaseHistoryEntry[]
      escalations: unknown[]
      instructions: OutboxInstruction[]
    }>()
    expect(data.project.goal).toBe(GOAL)
    expect(data.history.map((h) => [h.phase, h.via])).toEqual([['goal-clarification', 'created']])
    expect(data.escalations).toEqual([])
    expect(data.instructions.map((i) => [i.phase, i.workerName, i.kind])).toEqual([
      ['goal-clarification', 'goal-clarifier-memory-enhanced', 'work'],
    ])
  })

  it('prints the project header in human form', async () => {
    await startProject('demo')

    await status('demo', 'human')

    const lines = output.stdout().split('\n')
    expect(lines.slice(0, 4)).toEqual([
      'Project:  demo',
      `Goal:     ${GOAL}`,
      'Phase:    goal-clarification',
      'Status:   active',
    ])
  })

  it('exits 2 for an unknown namespace', async () => {
    const code = await status('missing')

    expect(code).toBe(2)
    expect(output.stderr()).toBe('Error: Project not found: missing\n')
  })
})
