/**
 * IntentTrackerImpl: intent model over the intent_entries table.
 *
 * Alignment is term overlap after stop-word removal and stemming:
 *  - an anti-goal (or a constraint phrased as a prohibition) is compared with
 *    its negation stripped, so "no paid dependencies" matches an action that
 *    adds a paid dependency
 *  - goal alignment is the larger of the two coverage directions, scaled by
 *    the entry's source-weighted confidence
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import { listIntentEntries, upsertIntentEntry } from '../../persistence/queries/intents.js'
import type { IntentUpsertAction } from '../../persistence/queries/intents.js'
import { clamp, roundTo } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { contentTerms, normalizeText, STOPWORDS, termCoverage } from '../../utils/text.js'
import type { IntentConfig } from '../config/config-schema.js'
import type { IntentTracker } from './intent-tracker.js'
import type {
  AlignmentVerdict,
  ConversationTurn,
  IntentEntry,
  IntentEntryInput,
  IntentKind,
  IntentModel,
  IntentSource,
} from './types.js'

const logger = createLogger('intent')

/** Weight each source contributes to an entry's confidence */
export const SOURCE_WEIGHTS: Record<IntentSource, number> = {
  explicit: 1,
  'custom-answer': 1,
  inferred: 0.5,
}

/** Negations and modal verbs carry no subject matter of their own */
const IGNORED_TERMS: ReadonlySet<string> = new Set([
  ...STOPWORDS,
  'no', 'not', 'don', 'dont', 't', 'do', 'avoid', 'never', 'without', 'any',
  'must', 'should', 'only', 'please', 'want', 'need', 'like',
])

const NEGATION = /\b(?:not|never|no|without|avoid)\b|n't\b/i

// ---------------------------------------------------------------------------
// Conversation extraction
// ---------------------------------------------------------------------------

const ANTI_GOAL_PATTERN = /^(?:please\s+)?(?:don'?t|do not|avoid|never|no|without)\b/i
const CONSTRAINT_PATTERN = /\b(?:must|should|only)\b/i
const GOAL_PATTERN = /\b(?:i want|i'd like|i would like|i need|we need|we want|the goal is)\s+(?:to\s+)?(.+)$/i

function sentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((s) => s.trim().replace(/[.!?]+$/, '').trim())
    .filter((s) => s.length > 0)
}

/** Classify one sentence of a user turn, or null when it states no intent */
export function classifySentence(sentence: string): { kind: IntentKind; text: string } | null {
  if (ANTI_GOAL_PATTERN.test(sentence)) return { kind: 'anti-goal', text: sentence }
  if (CONSTRAINT_PATTERN.test(sentence)) return { kind: 'constraint', text: sentence }
  const goal = GOAL_PATTERN.exec(sentence)
  const goalText = goal?.[1]?.trim()
  if (goalText !== undefined && goalText.length > 0) return { kind: 'goal', text: goalText }
  return null
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface IntentTrackerOptions {
  db: BetterSqlite3Database
  config: Readonly<IntentConfig>
  eventBus?: TypedEventBus
}

// ---------------------------------------------------------------------------
// IntentTrackerImpl
// ---------------------------------------------------------------------------

export class IntentTrackerImpl implements IntentTracker {
  private readonly _db: BetterSqlite3Database
  private readonly _config: Readonly<IntentConfig>
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: IntentTrackerOptions) {
    this._db = options.db
    this._config = options.config
    this._eventBus = options.eventBus
  }

  recordIntent(namespace: string, entry: IntentEntryInput): { entry: IntentEntry; action: IntentUpsertAction } {
    const confidence = roundTo(clamp(entry.confidence ?? 1, 0, 1) * SOURCE_WEIGHTS[entry.source], 4)
    const result = upsertIntentEntry(this._db, namespace, {
      kind: entry.kind,
      text: entry.text.trim(),
      source: entry.source,
      normalized: normalizeText(entry.text),
      confidence,
    })
    if (result.action === 'kept-existing') {
      logger.debug(
        { namespace, kind: entry.kind, existingSource: result.entry.source },
        'Inferred entry did not replace a stronger one',
      )
    }
    return result
  }

  extractFromConversation(namespace: string, turns: ConversationTurn[]): IntentEntry[] {
    const recorded: IntentEntry[] = []
    for (const turn of turns) {
      if (turn.role !== 'user') continue
      for (const sentence of sentences(turn.content)) {
        const classified = classifySentence(sentence)
        if (classified === null) continue
        const { entry, action } = this.recordIntent(namespace, { ...classified, source: 'inferred' })
        if (action !== 'kept-existing') recorded.push(entry)
      }
    }
    logger.debug({ namespace, count: recorded.length }, 'Extracted intent from conversation')
    return recorded
  }

  getModel(namespace: string): IntentModel {
    const entries = listIntentEntries(this._db, namespace)
    const total = entries.reduce((sum, e) => sum + e.confidence, 0)
    return {
      namespace,
      goals: entries.filter((e) => e.kind === 'goal'),
      antiGoals: entries.filter((e) => e.kind === 'anti-goal'),
      constraints: entries.filter((e) => e.kind === 'constraint'),
      confidenceScore: entries.length > 0 ? roundTo(total / entries.length, 4) : 0,
    }
  }

  validateAlignment(namespace: string, proposedAction: string): AlignmentVerdict {
    const model = this.getModel(namespace)
    const actionTerms = contentTerms(proposedAction, IGNORED_TERMS)

    const prohibitions = [...model.antiGoals, ...model.constraints.filter((c) => NEGATION.test(c.text))]
    let conflict: { entry: IntentEntry; coverage: number } | null = null
    for (const entry of prohibitions) {
      const coverage = roundTo(termCoverage(contentTerms(entry.text, IGNORED_TERMS), actionTerms), 4)
      if (conflict === null || outranks(coverage, entry, conflict.coverage, conflict.entry)) {
        conflict = { entry, coverage }
      }
    }
    if (conflict !== null && conflict.coverage >= this._config.stop_threshold) {
      const label = conflict.entry.kind === 'anti-goal' ? 'anti-goal' : 'constraint'
      const reason = `Action conflicts with ${label} "${conflict.entry.text}" (${conflict.entry.source})`
      logger.warn({ namespace, action: proposedAction, reason }, 'Intent conflict')
      this._eventBus?.emit('intent:conflict', { namespace, action: proposedAction, reason })
      return { decision: 'STOP', reason, coverage: conflict.coverage, conflictingEntry: conflict.entry }
    }

    let best: { entry: IntentEntry; alignment: number } | null = null
    for (const goal of model.goals) {
      const goalTerms = contentTerms(goal.text, IGNORED_TERMS)
      const overlap = Math.max(termCoverage(goalTerms, actionTerms), termCoverage(actionTerms, goalTerms))
      const alignment = roundTo(overlap * goal.confidence, 4)
      if (best === null || outranks(alignment, goal, best.alignment, best.entry)) {
        best = { entry: goal, alignment }
      }
    }
    if (best === null) return { decision: 'PROCEED', alignment: null }

    if (best.alignment < this._config.goal_threshold) {
      return {
        decision: 'MODIFY',
        suggestion: `Rework the action so it serves the goal "${best.entry.text}"`,
        alignment: best.alignment,
        goal: best.entry,
      }
    }
    return { decision: 'PROCEED', alignment: best.alignment }
  }
}

/** Higher score wins; equal scores go to the stronger source */
function outranks(score: number, entry: IntentEntry, bestScore: number, bestEntry: IntentEntry): boolean {
  if (score !== bestScore) return score > bestScore
  return SOURCE_WEIGHTS[entry.source] > SOURCE_WEIGHTS[bestEntry.source]
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createIntentTracker(options: IntentTrackerOptions): IntentTracker {
  return new IntentTrackerImpl(options)
}
