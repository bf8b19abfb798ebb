/**
 * `cadence memory prune`
 *
 * Applies the retention policy to the pattern store now rather than waiting
 * for the next scheduled sweep.
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { parseOutputFormat, writeJson, type OutputFormat } from '../utils/formatting.js'
import { EXIT_SUCCESS, reportError, withEngine } from '../utils/engine-context.js'

const logger = createLogger('memory-cmd')

export interface MemoryPruneActionOptions {
  outputFormat: OutputFormat
  projectRoot: string
  globalConfigDir?: string
  version?: string
}

export async function runMemoryPruneAction(options: MemoryPruneActionOptions): Promise<number> {
  const { outputFormat, projectRoot, version = '0.0.0' } = options
  try {
    const removed = await withEngine(
      { projectRoot, ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }) },
      (engine) => engine.memory.prune(),
    )
    if (outputFormat === 'json') {
      writeJson('memory prune', { removed }, version)
    } else {
      process.stdout.write(`Pruned ${removed} memory record(s).\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'memory prune')
  }
}

export function registerMemoryCommand(program: Command, version: string, projectRoot = process.cwd()): void {
  const memoryCmd = program.command('memory').description('Maintain the pattern store')

  memoryCmd
    .command('prune')
    .description('Remove records outside the retention policy')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      process.exitCode = await runMemoryPruneAction({
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
