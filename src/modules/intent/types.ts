/**
 * Types for the intent tracker.
 */

import type { IntentKind, IntentSource, StoredIntentEntry } from '../../persistence/queries/intents.js'

export type { IntentKind, IntentSource }

/** An intent statement as submitted */
export interface IntentEntryInput {
  kind: IntentKind
  text: string
  source: IntentSource
  /** Caller's own certainty in [0, 1] (default 1) */
  confidence?: number
}

export type IntentEntry = StoredIntentEntry

export interface IntentModel {
  namespace: string
  goals: IntentEntry[]
  antiGoals: IntentEntry[]
  constraints: IntentEntry[]
  /** Mean source-weighted confidence of all entries (0 when empty) */
  confidenceScore: number
}

/** One turn of the goal-clarification conversation */
export interface ConversationTurn {
  role: 'user' | 'assistant'
  content: string
}

export type AlignmentVerdict =
  | { decision: 'PROCEED'; alignment: number | null }
  | { decision: 'MODIFY'; suggestion: string; alignment: number; goal: IntentEntry }
  | { decision: 'STOP'; reason: string; coverage: number; conflictingEntry: IntentEntry }

export type AlignmentDecision = AlignmentVerdict['decision']
