/**
 * `cadence status` command
 *
 * Without a namespace, lists every project. With one, shows the project's
 * phase, phase history, open escalations and queued instructions.
 *
 * Usage:
 *   cadence status
 *   cadence status <namespace> [--output-format json]
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Unknown namespace
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import {
  formatEscalationTable,
  formatInstructionTable,
  formatProjectTable,
  parseOutputFormat,
  writeJson,
  type OutputFormat,
} from '../utils/formatting.js'
import { EXIT_SUCCESS, reportError, withEngine } from '../utils/engine-context.js'

const logger = createLogger('status-cmd')

export interface StatusActionOptions {
  namespace?: string
  outputFormat: OutputFormat
  projectRoot: string
  globalConfigDir?: string
  version?: string
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  const { namespace, outputFormat, projectRoot, version = '0.0.0' } = options
  const location = {
    projectRoot,
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
  }

  try {
    await withEngine(location, async (engine) => {
      if (namespace === undefined) {
        const projects = engine.phaseMachine.listProjects()
        if (outputFormat === 'json') {
          writeJson('status', { projects }, version)
        } else if (projects.length === 0) {
          process.stdout.write('No projects. Start one with: cadence start <namespace> --goal "<text>"\n')
        } else {
          process.stdout.write(formatProjectTable(projects) + '\n')
        }
        return
      }

      const { project, history } = engine.phaseMachine.status(namespace)
      const escalations = engine.dispatcher.listEscalations({ namespace, status: 'open' })
      const instructions = engine.listInstructions({ namespace, status: 'queued' })

      if (outputFormat === 'json') {
        writeJson('status', { project, history, escalations, instructions }, version)
        return
      }

      process.stdout.write(`Project:  ${project.namespace}\n`)
      process.stdout.write(`Goal:     ${project.goal}\n`)
      process.stdout.write(`Phase:    ${project.currentPhase}\n`)
      process.stdout.write(`Status:   ${project.status}\n`)
      process.stdout.write('\nHistory:\n')
      for (const entry of history) {
        process.stdout.write(`  ${entry.enteredAt}  ${entry.phase} (${entry.via})\n`)
      }
      if (escalations.length > 0) {
        process.stdout.write('\nOpen escalations:\n' + formatEscalationTable(escalations) + '\n')
      }
      if (instructions.length > 0) {
        process.stdout.write('\nQueued instructions:\n' + formatInstructionTable(instructions) + '\n')
      }
    })
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'status')
  }
}

export function registerStatusCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('status [namespace]')
    .description('List projects, or show one project in detail')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (namespace: string | undefined, opts: { outputFormat: string }) => {
      process.exitCode = await runStatusAction({
        ...(namespace !== undefined && { namespace }),
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
