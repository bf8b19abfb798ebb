/**
 * CLI output formatting utilities
 *
 * Human-readable tables for the project, escalation and instruction listings,
 * plus the JSON envelope every `--output-format json` command writes.
 */

import type { Project } from '../../core/types.js'
import type { Escalation } from '../../persistence/queries/escalations.js'
import type { OutboxInstruction } from '../../persistence/queries/instructions.js'
import type { DispatchOutcome } from '../../modules/dispatch/types.js'

export type OutputFormat = 'human' | 'json'

/** Anything other than "json" falls back to human output */
export function parseOutputFormat(raw: string | undefined): OutputFormat {
  return raw === 'json' ? 'json' : 'human'
}

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects (values indexed by key)
 * @param keys    - Object keys to read from each row (in column order)
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => {
      const val = row[key] ?? ''
      return Math.max(max, val.length)
    }, 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys.map((key, i) => {
      const val = row[key] ?? ''
      return val.padEnd(widths[i] ?? val.length)
    }).join(' | ')
  )

  return [headerRow, separator, ...dataRows].join('\n')
}

export function formatProjectTable(projects: Project[]): string {
  const rows = projects.map((p) => ({
    namespace: p.namespace,
    phase: p.currentPhase,
    status: p.status,
    updated: p.updatedAt,
  }))
  return formatTable(['Namespace', 'Phase', 'Status', 'Updated'], rows, ['namespace', 'phase', 'status', 'updated'])
}

export function formatEscalationTable(escalations: Escalation[]): string {
  const rows = escalations.map((e) => ({
    id: e.id,
    namespace: e.namespace,
    phase: e.phase,
    kind: e.gateName !== null ? `${e.kind}:${e.gateName}` : e.kind,
    status: e.status,
    reason: e.reason,
  }))
  return formatTable(
    ['ID', 'Namespace', 'Phase', 'Kind', 'Status', 'Reason'],
    rows,
    ['id', 'namespace', 'phase', 'kind', 'status', 'reason'],
  )
}

export function formatInstructionTable(instructions: OutboxInstruction[]): string {
  const rows = instructions.map((i) => ({
    id: i.id,
    namespace: i.namespace,
    phase: i.phase,
    worker: i.workerName,
    kind: i.kind,
    status: i.status,
  }))
  return formatTable(
    ['ID', 'Namespace', 'Phase', 'Worker', 'Kind', 'Status'],
    rows,
    ['id', 'namespace', 'phase', 'worker', 'kind', 'status'],
  )
}

/** One line per outcome: the kind, where it landed, then each reason indented */
export function formatOutcome(outcome: DispatchOutcome): string {
  const where = outcome.namespace === null
    ? ''
    : outcome.phase === null
      ? ` ${outcome.namespace}`
      : ` ${outcome.namespace} @ ${outcome.phase}`
  const lines = [`${outcome.kind}${where}`]
  for (const reason of outcome.reasons) {
    lines.push(`  - ${reason}`)
  }
  if (outcome.instruction !== undefined) {
    lines.push(`  instruction ${outcome.instruction.id} → ${outcome.instruction.workerName} (${outcome.instruction.kind})`)
  }
  if (outcome.escalationId !== undefined) {
    lines.push(`  escalation ${outcome.escalationId}`)
  }
  return lines.join('\n')
}

/**
 * CLIJsonOutput wrapper type for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  /** Cadence version string */
  version: string
  /** The CLI command that was executed */
  command: string
  /** The actual data payload */
  data: T
}

/**
 * Build a CLIJsonOutput wrapper around data.
 */
export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}

export function writeJson<T>(command: string, data: T, version: string): void {
  process.stdout.write(JSON.stringify(buildJsonOutput(command, data, version), null, 2) + '\n')
}
