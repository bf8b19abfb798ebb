/**
 * `cadence start` command
 *
 * Registers a project, records its goal (plus anything inferable from an
 * optional clarification conversation) and enqueues the first instruction.
 *
 * Usage:
 *   cadence start <namespace> --goal "<text>"
 *   cadence start <namespace> --goal "<text>" --conversation turns.json
 *
 * Exit codes:
 *   0 - Project started
 *   1 - System error
 *   2 - Usage error (namespace taken, invalid conversation file, no worker)
 */

import type { Command } from 'commander'
import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { z } from 'zod'
import type { ConversationTurn } from '../../modules/intent/types.js'
import { createLogger } from '../../utils/logger.js'
import { formatOutcome, parseOutputFormat, writeJson, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, reportError, withEngine } from '../utils/engine-context.js'

const logger = createLogger('start-cmd')

export const ConversationFileSchema = z.array(
  z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
  }),
)

export interface StartActionOptions {
  namespace: string
  goal: string
  /** Path to a JSON array of { role, content } turns */
  conversationPath?: string
  outputFormat: OutputFormat
  projectRoot: string
  globalConfigDir?: string
  version?: string
}

async function readConversation(path: string): Promise<ConversationTurn[]> {
  const raw = await readFile(path, 'utf-8')
  return ConversationFileSchema.parse(JSON.parse(raw))
}

export async function runStartAction(options: StartActionOptions): Promise<number> {
  const { namespace, goal, outputFormat, projectRoot, version = '0.0.0' } = options

  if (goal.trim() === '') {
    process.stderr.write('Error: --goal must not be empty\n')
    return EXIT_USAGE_ERROR
  }

  try {
    const conversation = options.conversationPath !== undefined
      ? await readConversation(resolve(projectRoot, options.conversationPath))
      : undefined

    const outcome = await withEngine(
      { projectRoot, ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }) },
      (engine) => engine.dispatcher.startProject(namespace, goal, conversation),
    )

    if (outputFormat === 'json') {
      writeJson('start', outcome, version)
    } else {
      process.stdout.write(formatOutcome(outcome) + '\n')
    }
    return outcome.kind === 'rejected' ? EXIT_USAGE_ERROR : EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'start')
  }
}

export function registerStartCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('start <namespace>')
    .description('Start a project and enqueue its goal-clarification work')
    .requiredOption('--goal <text>', 'What the project should achieve')
    .option('--conversation <file>', 'JSON file of clarification turns ([{ role, content }])')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (namespace: string, opts: { goal: string; conversation?: string; outputFormat: string }) => {
      process.exitCode = await runStartAction({
        namespace,
        goal: opts.goal,
        ...(opts.conversation !== undefined && { conversationPath: opts.conversation }),
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
