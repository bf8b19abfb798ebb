/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < overrides)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - set() with project file update
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, readFile, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { buildConfig, createConfigSystem, readEnvOverrides } from '../config-system-impl.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigError } from '../../../core/errors.js'
import type { ConfigSystemOptions } from '../config-system.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'cadence-config-test-'))
  projectConfigDir = join(testDir, 'project', '.cadence')
  globalConfigDir = join(testDir, 'global', '.cadence')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createSystem(options: ConfigSystemOptions = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({ projectConfigDir, globalConfigDir, env: {}, ...options })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// load()
// ---------------------------------------------------------------------------

describe('ConfigSystem.load', () => {
  it('returns the built-in defaults when no files exist', async () => {
    const system = createSystem()
    await system.load()
    expect(system.isLoaded).toBe(true)
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })

  it('treats an empty file as no overrides', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().review.max_retries).toBe(2)
  })

  it('lets the project file override the global file key by key', async () => {
    await writeYaml(globalConfigDir, 'review:\n  max_retries: 4\n  pass_threshold: 0.6\n')
    await writeYaml(projectConfigDir, 'review:\n  max_retries: 3\n')

    const system = createSystem()
    await system.load()

    expect(system.getConfig().review.max_retries).toBe(3)
    expect(system.getConfig().review.pass_threshold).toBe(0.6)
    expect(system.getConfig().review.gates).toEqual(DEFAULT_CONFIG.review.gates)
  })

  it('applies CADENCE_* environment variables over files', async () => {
    await writeYaml(projectConfigDir, 'review:\n  max_retries: 3\n')
    const system = createSystem({
      env: { CADENCE_MAX_RETRIES: '5', CADENCE_PASS_THRESHOLD: '0.9', CADENCE_LOG_LEVEL: 'debug' },
    })
    await system.load()

    expect(system.getConfig().review.max_retries).toBe(5)
    expect(system.getConfig().review.pass_threshold).toBe(0.9)
    expect(system.getConfig().global.log_level).toBe('debug')
  })

  it('lets programmatic overrides win over the environment', async () => {
    const system = createSystem({
      env: { CADENCE_MEMORY_TOP_K: '9' },
      overrides: { memory: { top_k: 2 } },
    })
    await system.load()
    expect(system.getConfig().memory.top_k).toBe(2)
  })

  it('returns a deep-frozen config', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.review.gates)).toBe(true)
  })

  it('rejects out-of-range values in a config file', async () => {
    await writeYaml(projectConfigDir, 'review:\n  max_retries: 0\n')
    await expect(createSystem().load()).rejects.toBeInstanceOf(ConfigError)
  })

  it('rejects unknown keys in a config file', async () => {
    await writeYaml(projectConfigDir, 'global:\n  colour: blue\n')
    await expect(createSystem().load()).rejects.toThrow(/Invalid config file at/)
  })

  it('rejects malformed YAML', async () => {
    await writeYaml(projectConfigDir, 'review: [unclosed\n')
    await expect(createSystem().load()).rejects.toThrow(/Failed to read config file at/)
  })

  it('throws from getConfig() before load()', () => {
    expect(() => createSystem().getConfig()).toThrow(ConfigError)
  })
})

// ---------------------------------------------------------------------------
// readEnvOverrides()
// ---------------------------------------------------------------------------

describe('readEnvOverrides', () => {
  it('ignores variables that do not validate', () => {
    expect(readEnvOverrides({ CADENCE_MAX_RETRIES: 'lots' })).toEqual({})
  })

  it('maps variables onto nested config paths', () => {
    expect(readEnvOverrides({ CADENCE_DATA_DIR: 'state', CADENCE_MEMORY_TOP_K: '3' })).toEqual({
      global: { data_dir: 'state' },
      memory: { top_k: 3 },
    })
  })
})

// ---------------------------------------------------------------------------
// get() / set()
// ---------------------------------------------------------------------------

describe('ConfigSystem.get', () => {
  it('reads nested values by dot-notation key', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('review.max_retries')).toBe(2)
    expect(system.get('triangulation.domain_weights.security')).toBe(1.5)
    expect(system.get('review.nope')).toBeUndefined()
  })
})

describe('ConfigSystem.set', () => {
  it('writes the value to the project file and reloads', async () => {
    const system = createSystem()
    await system.load()

    await system.set('review.max_retries', 4)

    expect(system.get('review.max_retries')).toBe(4)
    const written = await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8')
    expect(written).toBe('review:\n  max_retries: 4\n')
  })

  it('keeps keys already present in the project file', async () => {
    await writeYaml(projectConfigDir, 'memory:\n  top_k: 7\n')
    const system = createSystem()
    await system.load()

    await system.set('intent.stop_threshold', 0.8)

    expect(system.get('memory.top_k')).toBe(7)
    expect(system.get('intent.stop_threshold')).toBe(0.8)
  })

  it('rejects unknown keys', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('review.colour', 'blue')).rejects.toThrow('Unknown config key: review.colour')
  })

  it('rejects whole sections', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('review', 1)).rejects.toBeInstanceOf(ConfigError)
  })

  it('rejects invalid values without touching the file', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('review.pass_threshold', 2)).rejects.toThrow(/Invalid value for "review.pass_threshold"/)
    expect(system.get('review.pass_threshold')).toBe(0.7)
  })
})

// ---------------------------------------------------------------------------
// buildConfig()
// ---------------------------------------------------------------------------

describe('buildConfig', () => {
  it('merges overrides onto defaults without filesystem access', () => {
    const config = buildConfig({ intent: { stop_threshold: 0.9 } })
    expect(config.intent.stop_threshold).toBe(0.9)
    expect(config.intent.goal_threshold).toBe(0.3)
  })

  it('throws ConfigError for invalid overrides', () => {
    expect(() => buildConfig({ global: { max_concurrent_namespaces: 0 } })).toThrow(ConfigError)
  })
})
