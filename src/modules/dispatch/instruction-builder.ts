/**
 * Assembles the context block of an instruction request.
 */

import type { Phase } from '../../core/types.js'
import type { SignalLogEntry } from '../../persistence/queries/signals.js'
import { phaseIndex, isPhase } from '../../core/types.js'
import type { ReviewGateConfig } from '../config/config-schema.js'
import type { IntentModel } from '../intent/types.js'
import type { MemoryBoost } from '../memory/types.js'
import type { InstructionContext } from './types.js'

/** Signal outcomes whose artifacts never made it into the project */
const DISCARDED_OUTCOMES: ReadonlySet<string> = new Set(['duplicate', 'stale', 'rejected', 'received'])

/**
 * Artifacts of signals from phases before `phase`, first-seen order,
 * without duplicates.
 */
export function priorArtifacts(signals: readonly SignalLogEntry[], phase: Phase): string[] {
  const refs = new Set<string>()
  for (const signal of signals) {
    if (DISCARDED_OUTCOMES.has(signal.outcome)) continue
    if (!isPhase(signal.phase) || phaseIndex(signal.phase) >= phaseIndex(phase)) continue
    signal.artifactRefs.forEach((ref) => refs.add(ref))
  }
  return [...refs]
}

export function successCriteria(gates: readonly ReviewGateConfig[], model: IntentModel): string[] {
  const criteria = gates.map((g) => `Pass the ${g.name} gate (${g.viewpoints.join(', ')})`)
  for (const constraint of model.constraints) {
    criteria.push(`Respect: ${constraint.text}`)
  }
  for (const antiGoal of model.antiGoals) {
    criteria.push(`Avoid: ${antiGoal.text}`)
  }
  return criteria
}

export interface InstructionContextInput {
  goal: string
  phase: Phase
  model: IntentModel
  signals: readonly SignalLogEntry[]
  gates: readonly ReviewGateConfig[]
  memoryBoost: MemoryBoost
  fixIssues: string[]
}

export function buildInstructionContext(input: InstructionContextInput): InstructionContext {
  return {
    goal: input.goal,
    intent: {
      goals: input.model.goals.map((e) => e.text),
      antiGoals: input.model.antiGoals.map((e) => e.text),
      constraints: input.model.constraints.map((e) => e.text),
    },
    priorArtifacts: priorArtifacts(input.signals, input.phase),
    memoryBoost: input.memoryBoost,
    successCriteria: successCriteria(input.gates, input.model),
    fixIssues: [...input.fixIssues],
  }
}
