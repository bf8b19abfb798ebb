/**
 * Tests for `cadence init`.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { runInitAction } from '../init.js'
import { captureOutput, createTestProject, type CapturedOutput, type TestProject } from './helpers.js'

let project: TestProject
let output: CapturedOutput

beforeEach(() => {
  project = createTestProject()
  output = captureOutput()
})

afterEach(() => {
  output.restore()
  project.cleanup()
})

function init(force = false, outputFormat: 'human' | 'json' = 'human'): Promise<number> {
  return runInitAction({
    projectRoot: project.root,
    globalConfigDir: project.globalConfigDir,
    force,
    outputFormat,
  })
}

describe('runInitAction', () => {
  it('writes the default config and creates the database', async () => {
    const code = await init()

    const configPath = join(project.root, '.cadence', 'config.yaml')
    const written = yaml.load(readFileSync(configPath, 'utf-8'))
    expect(code).toBe(0)
    expect(written).toMatchObject({ config_format_version: '1', global: { data_dir: '.cadence' } })
    expect(existsSync(join(project.root, '.cadence', 'cadence.db'))).toBe(true)
    expect(output.stdout().split('\n')[0]).toBe(`Initialized Cadence in ${join(project.root, '.cadence')}`)
  })

  it('refuses to overwrite an existing config without --force', async () => {
    await init()
    output.reset()

    const code = await init()

    expect(code).toBe(2)
    expect(output.stderr()).toBe(
      `Error: ${join(project.root, '.cadence', 'config.yaml')} already exists. Use --force to overwrite it.\n`,
    )
  })

  it('overwrites with --force', async () => {
    await init()
    project.writeFile('.cadence/config.yaml', 'review:\n  max_retries: 5\n')

    const code = await init(true)

    const written = yaml.load(readFileSync(join(project.root, '.cadence', 'config.yaml'), 'utf-8'))
    expect(code).toBe(0)
    expect(written).toMatchObject({ review: { max_retries: 2 } })
  })

  it('reports the paths as JSON', async () => {
    const code = await init(false, 'json')

    expect(code).toBe(0)
    expect(output.jsonData<{ configPath: string; databasePath: string }>()).toEqual({
      configPath: join(project.root, '.cadence', 'config.yaml'),
      databasePath: join(project.root, '.cadence', 'cadence.db'),
    })
  })
})
