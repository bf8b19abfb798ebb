/**
 * IntentTracker interface definition.
 *
 * Keeps a per-namespace model of what the user wants, does not want and
 * insists on, and checks proposed actions against it.
 */

import type { IntentUpsertAction } from '../../persistence/queries/intents.js'
import type { AlignmentVerdict, ConversationTurn, IntentEntry, IntentEntryInput, IntentModel } from './types.js'

export interface IntentTracker {
  /**
   * Record an entry with its source-weighted confidence. Entries are keyed
   * by normalised text; an inferred entry never replaces an explicit or
   * custom-answer one.
   */
  recordIntent(
    namespace: string,
    entry: IntentEntryInput,
  ): { entry: IntentEntry; action: IntentUpsertAction }

  /** Derive inferred entries from the user's turns of a conversation */
  extractFromConversation(namespace: string, turns: ConversationTurn[]): IntentEntry[]

  getModel(namespace: string): IntentModel

  /**
   * STOP when the action covers an anti-goal or negated constraint, MODIFY
   * when it drifts from every goal, PROCEED otherwise.
   */
  validateAlignment(namespace: string, proposedAction: string): AlignmentVerdict
}
