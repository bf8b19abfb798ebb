/**
 * Shared fixtures for the command tests: a throwaway project directory, an
 * empty global config directory, and captured stdout/stderr.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { vi } from 'vitest'
import { runInitAction } from '../init.js'

export interface TestProject {
  root: string
  globalConfigDir: string
  writeFile(name: string, content: string): string
  cleanup(): void
}

export function createTestProject(): TestProject {
  const root = mkdtempSync(join(tmpdir(), 'cadence-cli-'))
  const globalConfigDir = mkdtempSync(join(tmpdir(), 'cadence-global-'))
  return {
    root,
    globalConfigDir,
    writeFile(name: string, content: string): string {
      const path = join(root, name)
      writeFileSync(path, content, 'utf-8')
      return path
    },
    cleanup(): void {
      rmSync(root, { recursive: true, force: true })
      rmSync(globalConfigDir, { recursive: true, force: true })
    },
  }
}

export interface CapturedOutput {
  stdout(): string
  stderr(): string
  /** Parse stdout as one JSON envelope and return its data */
  jsonData<T>(): T
  /** Forget everything captured so far */
  reset(): void
  restore(): void
}

export function captureOutput(): CapturedOutput {
  const out: string[] = []
  const err: string[] = []
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: unknown) => {
    out.push(String(chunk))
    return true
  })
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: unknown) => {
    err.push(String(chunk))
    return true
  })
  return {
    stdout: () => out.join(''),
    stderr: () => err.join(''),
    jsonData<T>(): T {
      const envelope: { data: T } = JSON.parse(out.join(''))
      return envelope.data
    },
    reset(): void {
      out.length = 0
      err.length = 0
    },
    restore(): void {
      stdoutSpy.mockRestore()
      stderrSpy.mockRestore()
    },
  }
}

export const GOAL = 'Build a todo list application'

/** Passes every default gate for GOAL */
export const GOOD_ARTIFACT = '# Goal\nBuild a todo list application with due dates and reminders.\n'

/** Fails the safety gate: two security findings */
export const UNSAFE_ARTIFACT = '# Goal\nBuild a todo list application.\nconst password = "test-secret"\neval(input)\n'

export function completionSignal(
  signalId: string,
  artifactRef: string,
  extra: Record<string, unknown> = {},
): string {
  return JSON.stringify({
    namespace: 'demo',
    phase: 'goal-clarification',
    workerName: 'goal-clarifier-memory-enhanced',
    artifactRefs: [artifactRef],
    timestamp: '2026-03-01T10:00:00.000Z',
    signalId,
    ...extra,
  })
}

/** Run `cadence init` in the project; output is left in `output` */
export async function initProject(project: TestProject, output: CapturedOutput): Promise<void> {
  const code = await runInitAction({
    projectRoot: project.root,
    globalConfigDir: project.globalConfigDir,
    force: false,
    outputFormat: 'human',
  })
  if (code !== 0) {
    throw new Error(`init failed with ${String(code)}: ${output.stderr()}`)
  }
  output.reset()
}
