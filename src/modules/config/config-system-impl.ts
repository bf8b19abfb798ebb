/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set operations over an immutable merged config.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.cadence/config.yaml)
 *     → project config      (./.cadence/config.yaml)
 *     → environment vars    (CADENCE_* prefixed)
 *     → overrides           (passed via ConfigSystemOptions.overrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  CadenceConfigSchema,
  PartialCadenceConfigSchema,
  type CadenceConfig,
  type PartialCadenceConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge / freeze utilities
// ---------------------------------------------------------------------------

/**
 * Merge `override` into `base`. Plain objects merge recursively; arrays and
 * scalars replace. Undefined values in the override are skipped.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of CADENCE_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
const ENV_VAR_MAP: Record<string, string> = {
  CADENCE_LOG_LEVEL: 'global.log_level',
  CADENCE_DATA_DIR: 'global.data_dir',
  CADENCE_MAX_CONCURRENT_NAMESPACES: 'global.max_concurrent_namespaces',
  CADENCE_MAX_RETRIES: 'review.max_retries',
  CADENCE_PASS_THRESHOLD: 'review.pass_threshold',
  CADENCE_VIEWPOINT_TIMEOUT_MS: 'triangulation.viewpoint_timeout_ms',
  CADENCE_CONFLICT_THRESHOLD: 'triangulation.conflict_threshold',
  CADENCE_ENHANCE_TIMEOUT_MS: 'memory.enhance_timeout_ms',
  CADENCE_MEMORY_TOP_K: 'memory.top_k',
  CADENCE_FALLBACK_DIR: 'memory.fallback_dir',
}

function coerceEnvValue(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialCadenceConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    overrides = setByPath(overrides, configPath, coerceEnvValue(rawValue))
  }

  const parsed = PartialCadenceConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return obj
  if (rest.length === 0) {
    return { ...obj, [head]: value }
  }
  const existing = obj[head]
  const child = isPlainObject(existing) ? existing : {}
  return { ...obj, [head]: setByPath(child, rest.join('.'), value) }
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: Readonly<CadenceConfig> | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _overrides: PartialCadenceConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.cadence')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.cadence')
    this._overrides = options.overrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Global user config, 3. project config
    for (const dir of [this._globalConfigDir, this._projectConfigDir]) {
      const fileConfig = await this._loadYamlFile(join(dir, 'config.yaml'))
      if (fileConfig !== null) {
        merged = deepMerge(merged, fileConfig)
      }
    }

    // 4. Environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 5. Programmatic / CLI overrides
    merged = deepMerge(merged, this._overrides)

    // 6. Validate the merged config
    const result = CadenceConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = deepFreeze(result.data)
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): Readonly<CadenceConfig> {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    // Reject unknown keys: the key must resolve to something in the merged config
    if (existing === undefined) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }

    // Whole sections cannot be replaced through set()
    if (typeof existing === 'object' && existing !== null) {
      throw new ConfigError(`Cannot set object key "${key}"; use a more specific dot-notation path`, {
        key,
      })
    }

    const projectConfigPath = join(this._projectConfigDir, 'config.yaml')
    const current = (await this._loadYamlFile(projectConfigPath)) ?? {}
    const updated = setByPath(current, key, value)

    const partial = PartialCadenceConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(partial.data), 'utf-8')

    // Reload so the merged view reflects the new value
    await this.load()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialCadenceConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialCadenceConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}

/**
 * Build a validated config directly from defaults plus overrides, without
 * touching the filesystem or environment. Used by tests and embedders.
 */
export function buildConfig(overrides: PartialCadenceConfig = {}): Readonly<CadenceConfig> {
  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), overrides)
  const result = CadenceConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
      issues: result.error.issues,
    })
  }
  return deepFreeze(result.data)
}
