/**
 * Instruction outbox commands
 *
 *   cadence instructions list [--namespace <ns>] [--all]   List queued (or all) instructions
 *   cadence instructions show <id>                    Print one instruction's full request
 *   cadence instructions ack <id>                     Mark an instruction delivered
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Unknown instruction, or one that was already delivered
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { formatInstructionTable, parseOutputFormat, writeJson, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, reportError, withEngine, type ProjectLocation } from '../utils/engine-context.js'

const logger = createLogger('instructions-cmd')

interface CommonOptions {
  outputFormat: OutputFormat
  projectRoot: string
  globalConfigDir?: string
  version?: string
}

function locationOf(options: CommonOptions): ProjectLocation {
  return {
    projectRoot: options.projectRoot,
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
  }
}

export interface InstructionsListOptions extends CommonOptions {
  namespace?: string
  all: boolean
}

export async function runInstructionsListAction(options: InstructionsListOptions): Promise<number> {
  try {
    const instructions = await withEngine(locationOf(options), async (engine) =>
      engine.listInstructions({
        ...(options.namespace !== undefined && { namespace: options.namespace }),
        ...(!options.all && { status: 'queued' as const }),
      }),
    )
    if (options.outputFormat === 'json') {
      writeJson('instructions', { instructions }, options.version ?? '0.0.0')
    } else if (instructions.length === 0) {
      process.stdout.write('No queued instructions.\n')
    } else {
      process.stdout.write(formatInstructionTable(instructions) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'instructions')
  }
}

export interface InstructionActionOptions extends CommonOptions {
  id: string
}

export async function runInstructionShowAction(options: InstructionActionOptions): Promise<number> {
  try {
    const instruction = await withEngine(locationOf(options), async (engine) =>
      engine.listInstructions().find((i) => i.id === options.id),
    )
    if (instruction === undefined) {
      process.stderr.write(`Error: Instruction not found: ${options.id}\n`)
      return EXIT_USAGE_ERROR
    }
    if (options.outputFormat === 'json') {
      writeJson('instructions show', instruction, options.version ?? '0.0.0')
    } else {
      process.stdout.write(JSON.stringify(instruction.payload, null, 2) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'instructions show')
  }
}

export async function runInstructionAckAction(options: InstructionActionOptions): Promise<number> {
  try {
    const acknowledged = await withEngine(locationOf(options), async (engine) =>
      engine.acknowledgeInstruction(options.id),
    )
    if (!acknowledged) {
      process.stderr.write(`Error: Instruction ${options.id} is not queued\n`)
      return EXIT_USAGE_ERROR
    }
    if (options.outputFormat === 'json') {
      writeJson('instructions ack', { id: options.id, status: 'delivered' }, options.version ?? '0.0.0')
    } else {
      process.stdout.write(`Instruction ${options.id} marked delivered.\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'instructions ack')
  }
}

export function registerInstructionsCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  const instructionsCmd = program.command('instructions').description('Work with the instruction outbox')

  instructionsCmd
    .command('list')
    .description('List instructions waiting in the outbox')
    .option('--namespace <namespace>', 'Only instructions of this project')
    .option('--all', 'Include delivered instructions', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { namespace?: string; all: boolean; outputFormat: string }) => {
      process.exitCode = await runInstructionsListAction({
        ...(opts.namespace !== undefined && { namespace: opts.namespace }),
        all: opts.all,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })

  instructionsCmd
    .command('show <id>')
    .description('Print the full instruction request')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (id: string, opts: { outputFormat: string }) => {
      process.exitCode = await runInstructionShowAction({
        id,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })

  instructionsCmd
    .command('ack <id>')
    .description('Mark an instruction delivered')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (id: string, opts: { outputFormat: string }) => {
      process.exitCode = await runInstructionAckAction({
        id,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
