/**
 * `cadence config` command group
 *
 * Subcommands:
 *   - `cadence config show`               display the merged configuration
 *   - `cadence config get <key>`          print one value by dot-notation key
 *   - `cadence config set <key> <value>`  update a project config value
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Invalid configuration, unknown key or invalid value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { createLogger } from '../../utils/logger.js'
import { parseOutputFormat, writeJson, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, projectConfigDir, reportError } from '../utils/engine-context.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Coerce string value to appropriate JS type
// ---------------------------------------------------------------------------

export function coerceValue(raw: string): unknown {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (trimmed === 'null') return null
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return trimmed
}

// ---------------------------------------------------------------------------
// Shared options
// ---------------------------------------------------------------------------

export interface ConfigActionOptions {
  projectRoot: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  outputFormat: OutputFormat
  version?: string
}

async function loadSystem(opts: ConfigActionOptions): Promise<ConfigSystem> {
  const system = createConfigSystem({
    projectConfigDir: projectConfigDir(opts.projectRoot),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  await system.load()
  return system
}

// ---------------------------------------------------------------------------
// `config show`
// ---------------------------------------------------------------------------

export async function runConfigShow(opts: ConfigActionOptions): Promise<number> {
  try {
    const system = await loadSystem(opts)
    const config = system.getConfig()
    if (opts.outputFormat === 'json') {
      writeJson('config show', config, opts.version ?? '0.0.0')
    } else {
      process.stdout.write('# Cadence Configuration (merged)\n\n')
      process.stdout.write(yaml.dump(config))
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'config show')
  }
}

// ---------------------------------------------------------------------------
// `config get`
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigActionOptions): Promise<number> {
  try {
    const system = await loadSystem(opts)
    const value = system.get(key)
    if (value === undefined) {
      process.stderr.write(`Error: Unknown config key: ${key}\n`)
      return EXIT_USAGE_ERROR
    }
    if (opts.outputFormat === 'json') {
      writeJson('config get', { key, value }, opts.version ?? '0.0.0')
    } else if (typeof value === 'object' && value !== null) {
      process.stdout.write(yaml.dump(value))
    } else {
      process.stdout.write(`${String(value)}\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'config get')
  }
}

// ---------------------------------------------------------------------------
// `config set`
// ---------------------------------------------------------------------------

export async function runConfigSet(key: string, rawValue: string, opts: ConfigActionOptions): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('Error: key must not be empty\n')
    return EXIT_USAGE_ERROR
  }

  const value = coerceValue(rawValue)
  try {
    const system = await loadSystem(opts)
    await system.set(key, value)
    if (opts.outputFormat === 'json') {
      writeJson('config set', { key, value }, opts.version ?? '0.0.0')
    } else {
      process.stdout.write(`Set ${key} = ${JSON.stringify(value)}\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'config set')
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  const configCmd = program.command('config').description('Inspect and update configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration')
    .option('--output-format <format>', 'Output format: human (YAML, default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      process.exitCode = await runConfigShow({ projectRoot, outputFormat: parseOutputFormat(opts.outputFormat), version })
    })

  configCmd
    .command('get <key>')
    .description('Print one value by dot-notation key (e.g. review.max_retries)')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (key: string, opts: { outputFormat: string }) => {
      process.exitCode = await runConfigGet(key, {
        projectRoot,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
      })
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a project config value (e.g. review.max_retries 3)')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (key: string, value: string, opts: { outputFormat: string }) => {
      process.exitCode = await runConfigSet(key, value, {
        projectRoot,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
      })
    })
}
