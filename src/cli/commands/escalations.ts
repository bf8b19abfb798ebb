/**
 * Operator escalation commands
 *
 *   cadence escalations [--namespace <ns>] [--all]    List escalations (open by default)
 *   cadence approve <id> [--note <text>]               Override and advance the phase
 *   cadence reject <id> [--reason <text>]              Reset the phase's review and re-issue its work
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Unknown escalation, or one that is already resolved
 */

import type { Command } from 'commander'
import type { EscalationFilter } from '../../persistence/queries/escalations.js'
import { createLogger } from '../../utils/logger.js'
import {
  formatEscalationTable,
  formatOutcome,
  parseOutputFormat,
  writeJson,
  type OutputFormat,
} from '../utils/formatting.js'
import { EXIT_SUCCESS, reportError, withEngine, type ProjectLocation } from '../utils/engine-context.js'

const logger = createLogger('escalations-cmd')

/** Recorded when the operator gives no reason */
export const DEFAULT_REJECT_REASON = 'Rejected by operator'

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

// ---------------------------------------------------------------------------
// escalations
// ---------------------------------------------------------------------------

export interface EscalationsActionOptions extends CommonOptions {
  namespace?: string
  /** Include resolved escalations */
  all: boolean
}

export async function runEscalationsAction(options: EscalationsActionOptions): Promise<number> {
  const filter: EscalationFilter = {
    ...(options.namespace !== undefined && { namespace: options.namespace }),
    ...(!options.all && { status: 'open' as const }),
  }
  try {
    const escalations = await withEngine(locationOf(options), async (engine) =>
      engine.dispatcher.listEscalations(filter),
    )
    if (options.outputFormat === 'json') {
      writeJson('escalations', { escalations }, options.version ?? '0.0.0')
    } else if (escalations.length === 0) {
      process.stdout.write(options.all ? 'No escalations.\n' : 'No open escalations.\n')
    } else {
      process.stdout.write(formatEscalationTable(escalations) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'escalations')
  }
}

// ---------------------------------------------------------------------------
// approve / reject
// ---------------------------------------------------------------------------

export interface ResolveActionOptions extends CommonOptions {
  escalationId: string
  /** Approval note or rejection reason */
  text?: string
}

export async function runApproveAction(options: ResolveActionOptions): Promise<number> {
  try {
    const outcome = await withEngine(locationOf(options), (engine) =>
      engine.dispatcher.approve(options.escalationId, options.text),
    )
    if (options.outputFormat === 'json') {
      writeJson('approve', outcome, options.version ?? '0.0.0')
    } else {
      process.stdout.write(formatOutcome(outcome) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'approve')
  }
}

export async function runRejectAction(options: ResolveActionOptions): Promise<number> {
  const reason = options.text !== undefined && options.text.trim() !== '' ? options.text : DEFAULT_REJECT_REASON
  try {
    const outcome = await withEngine(locationOf(options), (engine) =>
      engine.dispatcher.reject(options.escalationId, reason),
    )
    if (options.outputFormat === 'json') {
      writeJson('reject', outcome, options.version ?? '0.0.0')
    } else {
      process.stdout.write(formatOutcome(outcome) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, logger, 'reject')
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerEscalationCommands(program: Command, version: string, projectRoot = process.cwd()): void {
  program
    .command('escalations')
    .description('List escalations awaiting an operator')
    .option('--namespace <namespace>', 'Only escalations of this project')
    .option('--all', 'Include approved and rejected escalations', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { namespace?: string; all: boolean; outputFormat: string }) => {
      process.exitCode = await runEscalationsAction({
        ...(opts.namespace !== undefined && { namespace: opts.namespace }),
        all: opts.all,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })

  program
    .command('approve <escalationId>')
    .description('Approve an escalation and advance the blocked phase')
    .option('--note <text>', 'Note recorded with the approval')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (escalationId: string, opts: { note?: string; outputFormat: string }) => {
      process.exitCode = await runApproveAction({
        escalationId,
        ...(opts.note !== undefined && { text: opts.note }),
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })

  program
    .command('reject <escalationId>')
    .description('Reject an escalation and re-issue the phase work')
    .option('--reason <text>', 'Why the work was rejected; sent to the worker')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (escalationId: string, opts: { reason?: string; outputFormat: string }) => {
      process.exitCode = await runRejectAction({
        escalationId,
        ...(opts.reason !== undefined && { text: opts.reason }),
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
