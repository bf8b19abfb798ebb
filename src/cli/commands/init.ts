/**
 * `cadence init` command
 *
 * Writes `.cadence/config.yaml` with the built-in defaults and creates the
 * project database so the other commands have somewhere to work.
 *
 * Usage:
 *   cadence init                   Initialize the current directory
 *   cadence init --force           Overwrite an existing config.yaml
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Already initialized (without --force) or invalid existing config
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'
import { createDatabaseService } from '../../persistence/database.js'
import { createLogger } from '../../utils/logger.js'
import { parseOutputFormat, writeJson, type OutputFormat } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  databasePathFor,
  loadProjectConfig,
  projectConfigDir,
  reportError,
} from '../utils/engine-context.js'

const logger = createLogger('init-cmd')

export const CONFIG_FILE = 'config.yaml'

export interface InitActionOptions {
  projectRoot: string
  force: boolean
  outputFormat: OutputFormat
  globalConfigDir?: string
  version?: string
}

export async function runInitAction(options: InitActionOptions): Promise<number> {
  const { projectRoot, force, outputFormat, version = '0.0.0' } = options
  const configDir = projectConfigDir(projectRoot)
  const configPath = join(configDir, CONFIG_FILE)

  if (existsSync(configPath) && !force) {
    process.stderr.write(`Error: ${configPath} already exists. Use --force to overwrite it.\n`)
    return EXIT_USAGE_ERROR
  }

  try {
    await mkdir(configDir, { recursive: true })
    await writeFile(configPath, yaml.dump(DEFAULT_CONFIG), 'utf-8')

    // Global config or env may move data_dir; the database follows the merged view
    const config = await loadProjectConfig({
      projectRoot,
      ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
    })
    const databasePath = databasePathFor(projectRoot, config)
    const database = createDatabaseService(databasePath)
    await database.initialize()
    await database.shutdown()

    logger.info({ configPath, databasePath }, 'Project initialized')
    if (outputFormat === 'json') {
      writeJson('init', { configPath, databasePath }, version)
    } else {
      process.stdout.write(`Initialized Cadence in ${configDir}\n`)
      process.stdout.write(`  config:   ${configPath}\n`)
      process.stdout.write(`  database: ${databasePath}\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'init')
  }
}

export function registerInitCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('init')
    .description('Initialize Cadence in the current directory (creates .cadence/config.yaml and the database)')
    .option('-f, --force', 'Overwrite an existing config.yaml', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { force: boolean; outputFormat: string }) => {
      process.exitCode = await runInitAction({
        projectRoot,
        force: opts.force,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
      })
    })
}
