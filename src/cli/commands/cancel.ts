/**
 * `cadence cancel` command
 *
 * Cancels a project. Open escalations are closed and later signals for the
 * namespace come back stale.
 *
 * Usage:
 *   cadence cancel <namespace>
 *   cadence cancel <namespace> --yes       Skip the confirmation prompt
 *
 * Exit codes:
 *   0 - Success (project cancelled, or aborted at the prompt)
 *   1 - System error
 *   2 - Unknown namespace or a project that is already terminal
 */

import type { Command } from 'commander'
import * as readline from 'node:readline'
import { createLogger } from '../../utils/logger.js'
import { parseOutputFormat, writeJson, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, reportError, withEngine } from '../utils/engine-context.js'

const logger = createLogger('cancel-cmd')

export interface CancelActionOptions {
  namespace: string
  outputFormat: OutputFormat
  yes: boolean
  projectRoot: string
  globalConfigDir?: string
  version?: string
  /** Override for testing: injects the TTY check */
  isTTY?: boolean
  /** Override for testing: answers the confirmation prompt */
  confirm?: (namespace: string) => Promise<boolean>
}

/**
 * Prompt the user for confirmation via readline.
 * Returns true if the user confirms (y/yes), false otherwise.
 */
async function promptConfirmation(namespace: string): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    })

    rl.question(`Cancel project ${namespace}? Queued work will be abandoned. [y/N] `, (answer) => {
      rl.close()
      const normalised = answer.trim().toLowerCase()
      resolve(normalised === 'y' || normalised === 'yes')
    })
  })
}

export async function runCancelAction(options: CancelActionOptions): Promise<number> {
  const { namespace, outputFormat, yes, projectRoot, version = '0.0.0' } = options

  const isInteractive = options.isTTY ?? process.stdin.isTTY === true
  if (isInteractive && !yes) {
    const confirmed = await (options.confirm ?? promptConfirmation)(namespace)
    if (!confirmed) {
      process.stdout.write('Cancelled by user.\n')
      return EXIT_SUCCESS
    }
  }

  try {
    const project = await withEngine(
      { projectRoot, ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }) },
      (engine) => engine.dispatcher.cancelProject(namespace),
    )
    if (outputFormat === 'json') {
      writeJson('cancel', project, version)
    } else {
      process.stdout.write(`Project ${namespace} cancelled in ${project.currentPhase}.\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'cancel')
  }
}

export function registerCancelCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('cancel <namespace>')
    .description('Cancel a project')
    .option('-y, --yes', 'Skip the confirmation prompt', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (namespace: string, opts: { yes: boolean; outputFormat: string }) => {
      process.exitCode = await runCancelAction({
        namespace,
        yes: opts.yes,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
