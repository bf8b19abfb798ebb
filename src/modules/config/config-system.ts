/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { CadenceConfig, PartialCadenceConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for initializing the config system.
 */
export interface ConfigSystemOptions {
  /** Path to the project-level .cadence/ directory (default: <cwd>/.cadence) */
  projectConfigDir?: string
  /** Path to the global user-level .cadence/ directory (default: ~/.cadence) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags or by tests.
   */
  overrides?: PartialCadenceConfig
  /** Environment to read CADENCE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated, immutable Cadence configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < overrides
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration (deep-frozen).
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): Readonly<CadenceConfig>

  /**
   * Return a single value by dot-notation key (e.g. "review.max_retries").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Persist a single scalar value to the project config file and reload.
   * @throws {ConfigError} if the key is unknown or the value is invalid.
   */
  set(key: string, value: unknown): Promise<void>

  /** Whether load() has been called and succeeded */
  readonly isLoaded: boolean
}
