/**
 * ContinuationDispatcher interface definition.
 *
 * Consumes completion signals from the external executor and decides what
 * happens next for the namespace: remediation, escalation, or the next
 * phase's instruction. Also carries the operator actions, which go through
 * the same per-namespace queue as signals.
 */

import type { Phase, Project } from '../../core/types.js'
import type { Escalation, EscalationFilter } from '../../persistence/queries/escalations.js'
import type { ConversationTurn } from '../intent/types.js'
import type { DispatchOutcome } from './types.js'

export interface ContinuationDispatcher {
  /**
   * Create a project, record its goal as explicit intent (plus anything
   * inferable from `conversation`) and enqueue the goal-clarification work.
   */
  startProject(namespace: string, goal: string, conversation?: ConversationTurn[]): Promise<DispatchOutcome>

  /**
   * Process one completion signal. Never throws for a malformed, duplicate
   * or stale signal; the outcome says what happened and why.
   */
  onCompletionSignal(signal: unknown): Promise<DispatchOutcome>

  listEscalations(filter?: EscalationFilter): Escalation[]

  /** Override the blocked check and advance the phase */
  approve(escalationId: string, note?: string): Promise<DispatchOutcome>

  /** Reset the phase's review progress and re-issue its work */
  reject(escalationId: string, reason: string): Promise<DispatchOutcome>

  /** Move the project back and re-issue the target phase's work */
  rollback(namespace: string, targetPhase: Phase): Promise<DispatchOutcome>

  cancelProject(namespace: string): Promise<Project>

  /** Resolves once every queued signal and action has been processed */
  idle(): Promise<void>
}
