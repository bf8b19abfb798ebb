/**
 * Tests for `cadence intent`, `cadence instructions` and `cadence memory prune`.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { IntentEntry } from '../../../modules/intent/types.js'
import type { OutboxInstruction } from '../../../persistence/queries/instructions.js'
import { runInstructionAckAction, runInstructionsListAction, runInstructionShowAction } from '../instructions.js'
import { runIntentAddAction } from '../intent.js'
import { runMemoryPruneAction } from '../memory.js'
import { runStartAction } from '../start.js'
import { GOAL, captureOutput, createTestProject, initProject, type CapturedOutput, type TestProject } from './helpers.js'

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
  output.reset()
})

afterEach(() => {
  output.restore()
  project.cleanup()
})

describe('runIntentAddAction', () => {
  it('records an explicit anti-goal', async () => {
    const code = await runIntentAddAction({
      namespace: 'demo',
      kind: 'anti-goal',
      text: 'Avoid paid hosting services',
      source: 'explicit',
      ...location(),
    })

    const result = output.jsonData<{ entry: IntentEntry; action: string }>()
    expect(code).toBe(0)
    expect(result.action).toBe('inserted')
    expect([result.entry.kind, result.entry.text, result.entry.source]).toEqual([
      'anti-goal',
      'Avoid paid hosting services',
      'explicit',
    ])
  })

  it('exits 2 for an unknown kind', async () => {
    const code = await runIntentAddAction({
      namespace: 'demo',
      kind: 'wish',
      text: 'Dark mode',
      source: 'explicit',
      ...location(),
    })

    expect(code).toBe(2)
  })

  it('exits 2 for an unknown project', async () => {
    const code = await runIntentAddAction({
      namespace: 'missing',
      kind: 'goal',
      text: 'Dark mode',
      source: 'explicit',
      ...location(),
    })

    expect(code).toBe(2)
    expect(output.stderr()).toBe('Error: Project not found: missing\n')
  })
})

describe('instruction outbox commands', () => {
  async function queued(): Promise<OutboxInstruction[]> {
    output.reset()
    await runInstructionsListAction({ all: false, ...location() })
    return output.jsonData<{ instructions: OutboxInstruction[] }>().instructions
  }

  it('lists, shows and acknowledges the queued instruction', async () => {
    const [instruction] = await queued()
    if (instruction === undefined) throw new Error('expected a queued instruction')

    output.reset()
    const showCode = await runInstructionShowAction({ id: instruction.id, ...location() })
    expect(showCode).toBe(0)
    expect(output.jsonData<OutboxInstruction>().payload).toMatchObject({ id: instruction.id, namespace: 'demo' })

    output.reset()
    const ackCode = await runInstructionAckAction({ id: instruction.id, ...location() })
    expect(ackCode).toBe(0)
    expect(await queued()).toEqual([])
  })

  it('exits 2 when acknowledging an unknown instruction', async () => {
    const code = await runInstructionAckAction({ id: 'missing', ...location() })

    expect(code).toBe(2)
    expect(output.stderr()).toBe('Error: Instruction missing is not queued\n')
  })
})

describe('runMemoryPruneAction', () => {
  it('reports how many records were removed', async () => {
    const code = await runMemoryPruneAction(location())

    expect(code).toBe(0)
    expect(output.jsonData<{ removed: number }>()).toEqual({ removed: 0 })
  })
})
