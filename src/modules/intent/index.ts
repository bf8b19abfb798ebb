/**
 * Intent module: public exports.
 */

export type { IntentTracker } from './intent-tracker.js'
export type {
  AlignmentDecision,
  AlignmentVerdict,
  ConversationTurn,
  IntentEntry,
  IntentEntryInput,
  IntentKind,
  IntentModel,
  IntentSource,
} from './types.js'
export { IntentTrackerImpl, createIntentTracker, classifySentence, SOURCE_WEIGHTS } from './intent-tracker-impl.js'
export type { IntentTrackerOptions } from './intent-tracker-impl.js'
