/**
 * Shared plumbing for the commands that talk to a project's engine:
 * config loading, the "run init first" check, engine lifetime and the
 * mapping from errors to exit codes.
 */

import { existsSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { ZodError } from 'zod'
import type { Logger } from 'pino'
import {
  ConfigError,
  InvalidTransitionError,
  ProjectNotFoundError,
  ValidationFailureError,
} from '../../core/errors.js'
import type { Engine } from '../../core/engine.js'
import { createEngine, DATABASE_FILE } from '../../core/engine-impl.js'
import type { CadenceConfig } from '../../modules/config/config-schema.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE_ERROR = 2

/** Directory under the project root holding config.yaml */
export const PROJECT_CONFIG_DIR = '.cadence'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProjectLocation {
  projectRoot: string
  /** Overrides ~/.cadence; tests point this at a temp dir */
  globalConfigDir?: string
  /** Environment for CADENCE_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/** Raised when a command runs before `cadence init` */
export class NotInitializedError extends Error {
  constructor(readonly databasePath: string) {
    super(`No Cadence database found at ${databasePath}. Run 'cadence init' first.`)
    this.name = 'NotInitializedError'
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function projectConfigDir(projectRoot: string): string {
  return join(projectRoot, PROJECT_CONFIG_DIR)
}

export async function loadProjectConfig(location: ProjectLocation): Promise<Readonly<CadenceConfig>> {
  const system = createConfigSystem({
    projectConfigDir: projectConfigDir(location.projectRoot),
    ...(location.globalConfigDir !== undefined && { globalConfigDir: location.globalConfigDir }),
    ...(location.env !== undefined && { env: location.env }),
  })
  await system.load()
  return system.getConfig()
}

export function databasePathFor(projectRoot: string, config: Readonly<CadenceConfig>): string {
  return join(resolve(projectRoot, config.global.data_dir), DATABASE_FILE)
}

/**
 * Load config, open the engine, run `fn`, and always shut the engine down
 * afterwards (which also waits for queued dispatches).
 */
export async function withEngine<T>(
  location: ProjectLocation,
  fn: (engine: Engine) => Promise<T>,
): Promise<T> {
  const config = await loadProjectConfig(location)
  const databasePath = databasePathFor(location.projectRoot, config)
  if (!existsSync(databasePath)) {
    throw new NotInitializedError(databasePath)
  }

  const engine = await createEngine({ config, rootDir: location.projectRoot, databasePath })
  try {
    return await fn(engine)
  } finally {
    await engine.shutdown()
  }
}

/** Caller mistakes exit 2; everything else is a system error */
export function exitCodeFor(err: unknown): number {
  if (
    err instanceof ProjectNotFoundError ||
    err instanceof InvalidTransitionError ||
    err instanceof ConfigError ||
    err instanceof ValidationFailureError ||
    err instanceof ZodError
  ) {
    return EXIT_USAGE_ERROR
  }
  return EXIT_ERROR
}

function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ')
  }
  return err instanceof Error ? err.message : String(err)
}

/** Write the error to stderr, log system errors, and return the exit code */
export function reportError(err: unknown, logger: Logger, action: string): number {
  const code = exitCodeFor(err)
  process.stderr.write(`Error: ${describeError(err)}\n`)
  if (code === EXIT_ERROR) {
    logger.error({ err }, `${action} failed`)
  }
  return code
}
