/**
 * `cadence signal` command
 *
 * Feeds one completion signal (a JSON document) to the continuation
 * dispatcher and prints what it decided.
 *
 * Usage:
 *   cadence signal signal.json
 *   cat signal.json | cadence signal -
 *
 * Exit codes:
 *   0 - Signal processed (including duplicate, stale and escalated outcomes)
 *   1 - System error
 *   2 - Unreadable JSON or a rejected signal
 */

import type { Command } from 'commander'
import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { createLogger } from '../../utils/logger.js'
import { formatOutcome, parseOutputFormat, writeJson, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, reportError, withEngine } from '../utils/engine-context.js'

const logger = createLogger('signal-cmd')

export interface SignalActionOptions {
  /** File path, or "-" for stdin */
  source: string
  outputFormat: OutputFormat
  projectRoot: string
  globalConfigDir?: string
  version?: string
  /** Override for testing: supplies stdin contents */
  readStdin?: () => Promise<string>
}

async function readProcessStdin(): Promise<string> {
  process.stdin.setEncoding('utf-8')
  let text = ''
  for await (const chunk of process.stdin) {
    text += String(chunk)
  }
  return text
}

export async function runSignalAction(options: SignalActionOptions): Promise<number> {
  const { source, outputFormat, projectRoot, version = '0.0.0' } = options

  let raw: string
  try {
    raw = source === '-'
      ? await (options.readStdin ?? readProcessStdin)()
      : await readFile(resolve(projectRoot, source), 'utf-8')
  } catch (err) {
    return reportError(err, logger, 'signal read')
  }

  let signal: unknown
  try {
    signal = JSON.parse(raw)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: signal is not valid JSON: ${message}\n`)
    return EXIT_USAGE_ERROR
  }

  try {
    const outcome = await withEngine(
      { projectRoot, ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }) },
      (engine) => engine.dispatcher.onCompletionSignal(signal),
    )

    if (outputFormat === 'json') {
      writeJson('signal', outcome, version)
    } else {
      process.stdout.write(formatOutcome(outcome) + '\n')
    }
    return outcome.kind === 'rejected' ? EXIT_USAGE_ERROR : EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'signal')
  }
}

export function registerSignalCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('signal <file>')
    .description('Process a completion signal from a JSON file ("-" reads stdin)')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (file: string, opts: { outputFormat: string }) => {
      process.exitCode = await runSignalAction({
        source: file,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
