/**
 * Builds the `cadence` Commander program. Kept apart from the entry point so
 * tests can construct it without parsing process.argv.
 */

import { Command } from 'commander'
import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { registerCancelCommand } from './commands/cancel.js'
import { registerConfigCommand } from './commands/config.js'
import { registerEscalationCommands } from './commands/escalations.js'
import { registerInitCommand } from './commands/init.js'
import { registerInstructionsCommand } from './commands/instructions.js'
import { registerIntentCommand } from './commands/intent.js'
import { registerMemoryCommand } from './commands/memory.js'
import { registerRollbackCommand } from './commands/rollback.js'
import { registerSignalCommand } from './commands/signal.js'
import { registerStartCommand } from './commands/start.js'
import { registerStatusCommand } from './commands/status.js'

/** Resolve the version from package.json relative to this file */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli and dist/cli both sit two levels below the package root
  const candidates = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of candidates) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg: unknown = JSON.parse(content)
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export function createProgram(version: string, projectRoot = process.cwd()): Command {
  const program = new Command()

  program
    .name('cadence')
    .description('Cadence - phase-driven orchestration with review gates, intent tracking and pattern memory')
    .version(version, '-v, --version', 'Output the current version')

  registerInitCommand(program, version, projectRoot)
  registerConfigCommand(program, version, projectRoot)
  registerStartCommand(program, version, projectRoot)
  registerSignalCommand(program, version, projectRoot)
  registerStatusCommand(program, version, projectRoot)
  registerRollbackCommand(program, version, projectRoot)
  registerCancelCommand(program, version, projectRoot)
  registerEscalationCommands(program, version, projectRoot)
  registerIntentCommand(program, version, projectRoot)
  registerInstructionsCommand(program, version, projectRoot)
  registerMemoryCommand(program, version, projectRoot)

  return program
}
