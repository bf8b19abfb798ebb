/**
 * `cadence intent` command group
 *
 *   cadence intent add <namespace> <kind> <text> [--source explicit|custom-answer]
 *   cadence intent show <namespace>
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Unknown namespace, kind or source
 */

import type { Command } from 'commander'
import { ProjectNotFoundError } from '../../core/errors.js'
import { IntentKindEnum, IntentSourceEnum } from '../../persistence/schemas/records.js'
import { createLogger } from '../../utils/logger.js'
import { formatTable, parseOutputFormat, writeJson, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, reportError, withEngine } from '../utils/engine-context.js'

const logger = createLogger('intent-cmd')

export interface IntentAddActionOptions {
  namespace: string
  kind: string
  text: string
  source: string
  outputFormat: OutputFormat
  projectRoot: string
  globalConfigDir?: string
  version?: string
}

export async function runIntentAddAction(options: IntentAddActionOptions): Promise<number> {
  const { namespace, outputFormat, projectRoot, version = '0.0.0' } = options
  try {
    const kind = IntentKindEnum.parse(options.kind)
    const source = IntentSourceEnum.parse(options.source)

    const result = await withEngine(
      { projectRoot, ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }) },
      async (engine) => {
        if (engine.phaseMachine.getProject(namespace) === undefined) {
          throw new ProjectNotFoundError(namespace)
        }
        return engine.intent.recordIntent(namespace, { kind, text: options.text, source })
      },
    )

    if (outputFormat === 'json') {
      writeJson('intent add', result, version)
    } else {
      process.stdout.write(
        `${result.action} ${result.entry.kind} "${result.entry.text}" ` +
          `(${result.entry.source}, confidence ${result.entry.confidence.toFixed(2)})\n`,
      )
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'intent add')
  }
}

export interface IntentShowActionOptions {
  namespace: string
  outputFormat: OutputFormat
  projectRoot: string
  globalConfigDir?: string
  version?: string
}

export async function runIntentShowAction(options: IntentShowActionOptions): Promise<number> {
  const { namespace, outputFormat, projectRoot, version = '0.0.0' } = options
  try {
    const model = await withEngine(
      { projectRoot, ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }) },
      async (engine) => {
        if (engine.phaseMachine.getProject(namespace) === undefined) {
          throw new ProjectNotFoundError(namespace)
        }
        return engine.intent.getModel(namespace)
      },
    )

    if (outputFormat === 'json') {
      writeJson('intent show', model, version)
      return EXIT_SUCCESS
    }

    const rows = [...model.goals, ...model.antiGoals, ...model.constraints].map((entry) => ({
      kind: entry.kind,
      text: entry.text,
      source: entry.source,
      confidence: entry.confidence.toFixed(2),
    }))
    process.stdout.write(formatTable(['Kind', 'Text', 'Source', 'Confidence'], rows, ['kind', 'text', 'source', 'confidence']) + '\n')
    process.stdout.write(`\nModel confidence: ${model.confidenceScore.toFixed(2)}\n`)
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'intent show')
  }
}

export function registerIntentCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  const intentCmd = program.command('intent').description('Inspect and extend a project\'s intent model')

  intentCmd
    .command('add <namespace> <kind> <text>')
    .description('Record a goal, anti-goal or constraint')
    .option('--source <source>', 'explicit (default) or custom-answer', 'explicit')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (namespace: string, kind: string, text: string, opts: { source: string; outputFormat: string }) => {
      process.exitCode = await runIntentAddAction({
        namespace,
        kind,
        text,
        source: opts.source,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })

  intentCmd
    .command('show <namespace>')
    .description('Show the intent model of a project')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (namespace: string, opts: { outputFormat: string }) => {
      process.exitCode = await runIntentShowAction({
        namespace,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
