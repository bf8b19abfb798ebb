/**
 * `cadence rollback` command
 *
 * Moves a project back to an earlier phase, resets the later phases' tasks
 * and re-issues the target phase's work.
 *
 * Usage:
 *   cadence rollback <namespace> <phase>
 *
 * Exit codes:
 *   0 - Rolled back
 *   1 - System error
 *   2 - Unknown phase or namespace, or a target that is not earlier
 */

import type { Command } from 'commander'
import { isPhase, PHASE_SEQUENCE } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { formatOutcome, parseOutputFormat, writeJson, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, reportError, withEngine } from '../utils/engine-context.js'

const logger = createLogger('rollback-cmd')

export interface RollbackActionOptions {
  namespace: string
  phase: string
  outputFormat: OutputFormat
  projectRoot: string
  globalConfigDir?: string
  version?: string
}

export async function runRollbackAction(options: RollbackActionOptions): Promise<number> {
  const { namespace, phase, outputFormat, projectRoot, version = '0.0.0' } = options

  if (!isPhase(phase)) {
    process.stderr.write(`Error: Unknown phase "${phase}". Expected one of: ${PHASE_SEQUENCE.join(', ')}\n`)
    return EXIT_USAGE_ERROR
  }

  try {
    const outcome = await withEngine(
      { projectRoot, ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }) },
      (engine) => engine.dispatcher.rollback(namespace, phase),
    )
    if (outputFormat === 'json') {
      writeJson('rollback', outcome, version)
    } else {
      process.stdout.write(formatOutcome(outcome) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'rollback')
  }
}

export function registerRollbackCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('rollback <namespace> <phase>')
    .description('Roll a project back to an earlier phase and re-issue its work')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (namespace: string, phase: string, opts: { outputFormat: string }) => {
      process.exitCode = await runRollbackAction({
        namespace,
        phase,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
