/**
 * ContinuationDispatcherImpl: signal-driven phase progression.
 *
 * Per signal, in the namespace's queue:
 *   validate → log (dedup by signalId) → stale check → escalation guard
 *   → complete the task → record the memory outcome → intent check
 *   → review chain → advance → select worker → memory boost → outbox
 *
 * Remediation is asynchronous: a failed gate or a MODIFY verdict enqueues a
 * remediation instruction, and the executor's next signal for the phase
 * resumes the review at the gate that failed.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { InvalidTransitionError, ProjectNotFoundError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { phaseIndex, type CompletionSignal, type Phase, type Project } from '../../core/types.js'
import {
  createEscalation,
  findOpenEscalation,
  getEscalation,
  listEscalations,
  resolveEscalation,
  type Escalation,
  type EscalationFilter,
} from '../../persistence/queries/escalations.js'
import { insertInstruction, markInstructionDelivered } from '../../persistence/queries/instructions.js'
import { getReviewProgress, resetReviewProgress, saveReviewProgress } from '../../persistence/queries/review.js'
import { appendSignal, listSignals, setSignalOutcome } from '../../persistence/queries/signals.js'
import { createTask, getTasksForPhase, updateTaskStatus } from '../../persistence/queries/tasks.js'
import { CompletionSignalSchema } from '../../persistence/schemas/records.js'
import { errorMessage, generateId } from '../../utils/helpers.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import type { CadenceConfig } from '../config/config-schema.js'
import type { IntentTracker } from '../intent/intent-tracker.js'
import type { ConversationTurn } from '../intent/types.js'
import type { MemoryOrchestrator } from '../memory/memory-orchestrator.js'
import type { PhaseMachine } from '../phase-machine/phase-machine.js'
import type { AdvanceResult } from '../phase-machine/types.js'
import type { ReviewChain } from '../review-chain/review-chain.js'
import type { CapabilityRegistry } from '../routing/capability-registry.js'
import type { WorkerSelector } from '../routing/worker-selector.js'
import type { ContinuationDispatcher } from './continuation-dispatcher.js'
import { buildInstructionContext } from './instruction-builder.js'
import { NamespaceQueue } from './namespace-queue.js'
import type { DispatchOutcome, InstructionKind, InstructionRequest, InstructionSink } from './types.js'

const logger = createLogger('dispatch')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ContinuationDispatcherOptions {
  db: BetterSqlite3Database
  config: Readonly<CadenceConfig>
  phaseMachine: PhaseMachine
  reviewChain: ReviewChain
  intent: IntentTracker
  memory: MemoryOrchestrator
  selector: WorkerSelector
  registry: CapabilityRegistry
  eventBus?: TypedEventBus
  /** Delivery hook; instructions stay queued in the outbox without one */
  sink?: InstructionSink
}

interface EnqueueRequest {
  project: Project
  phase: Phase
  kind: InstructionKind
  fixIssues: string[]
  /** Worker to address; selected from the priority table when omitted */
  worker?: { name: string; tier: string }
}

function outcome(
  kind: DispatchOutcome['kind'],
  namespace: string | null,
  phase: Phase | null,
  reasons: string[],
  extra: Pick<DispatchOutcome, 'instruction' | 'escalationId'> = {},
): DispatchOutcome {
  return { kind, namespace, phase, reasons, ...extra }
}

// ---------------------------------------------------------------------------
// ContinuationDispatcherImpl
// ---------------------------------------------------------------------------

export class ContinuationDispatcherImpl implements ContinuationDispatcher {
  private readonly _db: BetterSqlite3Database
  private readonly _config: Readonly<CadenceConfig>
  private readonly _phaseMachine: PhaseMachine
  private readonly _reviewChain: ReviewChain
  private readonly _intent: IntentTracker
  private readonly _memory: MemoryOrchestrator
  private readonly _selector: WorkerSelector
  private readonly _registry: CapabilityRegistry
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _sink: InstructionSink | undefined
  private readonly _queue: NamespaceQueue

  constructor(options: ContinuationDispatcherOptions) {
    this._db = options.db
    this._config = options.config
    this._phaseMachine = options.phaseMachine
    this._reviewChain = options.reviewChain
    this._intent = options.intent
    this._memory = options.memory
    this._selector = options.selector
    this._registry = options.registry
    this._eventBus = options.eventBus
    this._sink = options.sink
    this._queue = new NamespaceQueue(options.config.global.max_concurrent_namespaces)
  }

  // ---------------------------------------------------------------------------
  // Project start
  // ---------------------------------------------------------------------------

  startProject(namespace: string, goal: string, conversation: ConversationTurn[] = []): Promise<DispatchOutcome> {
    return this._queue.run(namespace, async () => {
      const trimmedGoal = goal.trim()
      if (trimmedGoal === '') {
        return outcome('rejected', namespace, null, ['Project goal must not be empty'])
      }

      const create = this._db.transaction(() => {
        const created = this._phaseMachine.createProject(namespace, trimmedGoal)
        this._intent.recordIntent(namespace, { kind: 'goal', text: trimmedGoal, source: 'explicit' })
        if (conversation.length > 0) {
          this._intent.extractFromConversation(namespace, conversation)
        }
        return created
      })
      const project = create()

      // A project only exists once its first instruction is queued
      let instruction: InstructionRequest | null
      try {
        instruction = await this._enqueue({ project, phase: project.currentPhase, kind: 'work', fixIssues: [] })
      } catch (err) {
        this._phaseMachine.discardProject(namespace)
        throw err
      }
      if (instruction === null) {
        this._phaseMachine.discardProject(namespace)
        return outcome('rejected', namespace, project.currentPhase, [
          `No worker is available for ${project.currentPhase}`,
        ])
      }
      return outcome('enqueued', namespace, project.currentPhase, [`Project started in ${project.currentPhase}`], {
        instruction,
      })
    })
  }

  // ---------------------------------------------------------------------------
  // Completion signals
  // ---------------------------------------------------------------------------

  async onCompletionSignal(signal: unknown): Promise<DispatchOutcome> {
    const parsed = CompletionSignalSchema.safeParse(signal)
    if (!parsed.success) {
      const reasons = parsed.error.issues.map((i) => `${i.path.join('.') || 'signal'}: ${i.message}`)
      logger.warn({ reasons }, 'Malformed completion signal rejected')
      return outcome('rejected', null, null, reasons)
    }
    const valid = parsed.data
    return this._queue.run(valid.namespace, async () => {
      const result = await this._process(valid)
      // A duplicate keeps the outcome of the delivery that was processed
      if (result.kind !== 'duplicate') {
        setSignalOutcome(this._db, valid.namespace, valid.signalId, result.kind)
      }
      return result
    })
  }

  private async _process(signal: CompletionSignal): Promise<DispatchOutcome> {
    const { namespace, phase, signalId } = signal
    const log = childLogger(logger, { namespace, signalId })

    const project = this._phaseMachine.getProject(namespace)
    if (project === undefined) {
      log.warn('Signal for an unknown project')
      return outcome('rejected', namespace, phase, [`Unknown project ${namespace}`])
    }

    if (!appendSignal(this._db, signal)) {
      log.info('Duplicate signal ignored')
      this._eventBus?.emit('signal:duplicate', { namespace, signalId })
      return outcome('duplicate', namespace, phase, [`Signal ${signalId} was already processed`])
    }

    if (project.status !== 'active') {
      const reason = `Project is ${project.status}`
      log.warn({ reason }, 'Signal for a project that is not active')
      this._eventBus?.emit('signal:stale', {
        namespace,
        signalId,
        signalPhase: phase,
        currentPhase: null,
        reason,
      })
      return outcome('stale', namespace, phase, [reason])
    }

    if (phase !== project.currentPhase) {
      let reason = `Project already left ${phase}; now in ${project.currentPhase}`
      if (phaseIndex(phase) > phaseIndex(project.currentPhase)) {
        // Ahead is stale only when a rollback moved the project back out of that phase
        const visited = this._phaseMachine.status(namespace).history.some((entry) => entry.phase === phase)
        if (!visited) {
          const rejection = `Signal phase ${phase} is ahead of the current phase ${project.currentPhase}`
          log.warn({ reason: rejection }, 'Signal rejected')
          return outcome('rejected', namespace, phase, [rejection])
        }
        reason = `Project was rolled back from ${phase}; now in ${project.currentPhase}`
      }
      log.warn({ reason }, 'Stale signal discarded')
      this._eventBus?.emit('signal:stale', {
        namespace,
        signalId,
        signalPhase: phase,
        currentPhase: project.currentPhase,
        reason,
      })
      return outcome('stale', namespace, phase, [reason])
    }

    setSignalOutcome(this._db, namespace, signalId, 'accepted')
    this._eventBus?.emit('signal:accepted', { namespace, signalId, phase })

    const blocking = findOpenEscalation(this._db, namespace, phase)
    if (blocking !== undefined) {
      return outcome('escalated', namespace, phase, [`Escalation ${blocking.id} is awaiting an operator: ${blocking.reason}`], {
        escalationId: blocking.id,
      })
    }

    const success = signal.success ?? true
    this._completeTask(signal, success)
    await this._memory.record({
      namespace,
      workerName: signal.workerName,
      taskType: phase,
      patternText: signal.summary ?? `${signal.workerName} produced ${signal.artifactRefs.join(', ')}`,
      success,
    })

    if (!success) {
      const reason = `${signal.workerName} reported failure${signal.summary !== undefined ? `: ${signal.summary}` : ''}`
      const instruction = await this._enqueue({ project, phase, kind: 'work', fixIssues: [reason] })
      if (instruction === null) return outcome('rejected', namespace, phase, [reason, `No worker is available for ${phase}`])
      return outcome('enqueued', namespace, phase, [reason, `Re-issued ${phase} work`], { instruction })
    }

    // Intent check
    if (signal.summary !== undefined && signal.summary.trim().length > 0) {
      const verdict = this._intent.validateAlignment(namespace, signal.summary)
      if (verdict.decision === 'STOP') {
        const escalationId = this._escalate(namespace, phase, 'intent', null, verdict.reason)
        return outcome('intent-stop', namespace, phase, [verdict.reason], { escalationId })
      }
      if (verdict.decision === 'MODIFY') {
        return this._handleModify(project, signal, verdict.suggestion)
      }
    }

    // Review chain
    const [primaryArtifact] = signal.artifactRefs
    if (primaryArtifact === undefined) {
      return outcome('rejected', namespace, phase, ['Signal carries no artifact'])
    }
    const review = await this._reviewChain.review(primaryArtifact, phase, {
      namespace,
      goal: project.goal,
      remediation: signal.kind === 'remediation',
    })

    if (review.status === 'remediation' && review.fixInstruction !== undefined) {
      const fix = review.fixInstruction
      const reasons = [
        `Gate "${fix.gateName}" failed (attempt ${String(fix.attempt)} of ${String(this._config.review.max_retries)})`,
        ...fix.issues,
      ]
      const instruction = await this._enqueue({
        project,
        phase,
        kind: 'remediation',
        fixIssues: fix.issues,
        worker: this._workerOf(phase, signal.workerName),
      })
      return outcome('remediation', namespace, phase, reasons, instruction !== null ? { instruction } : {})
    }

    if (review.status === 'escalated') {
      const escalationId = review.escalation?.escalationId
      const reason = review.escalation?.reason ?? 'Review retries exhausted'
      return outcome('escalated', namespace, phase, [reason], escalationId !== undefined ? { escalationId } : {})
    }

    const advance = this._phaseMachine.advance(namespace, { reviewPassed: true, intentDecision: 'PROCEED' })
    return this._afterAdvance(project, advance)
  }

  // ---------------------------------------------------------------------------
  // Operator actions
  // ---------------------------------------------------------------------------

  listEscalations(filter: EscalationFilter = {}): Escalation[] {
    return listEscalations(this._db, filter)
  }

  async approve(escalationId: string, note?: string): Promise<DispatchOutcome> {
    const escalation = this._requireOpenEscalation(escalationId)
    return this._queue.run(escalation.namespace, async () => {
      this._resolve(this._requireOpenEscalation(escalationId), 'approved', note ?? null)
      const project = this._requireProject(escalation.namespace)
      if (project.currentPhase !== escalation.phase || project.status !== 'active') {
        return outcome('rejected', project.namespace, escalation.phase, [
          `Escalation phase ${escalation.phase} is no longer current`,
        ])
      }
      const advance = this._phaseMachine.advance(project.namespace, {
        reviewPassed: false,
        intentDecision: 'PROCEED',
        override: true,
      })
      return this._afterAdvance(project, advance)
    })
  }

  async reject(escalationId: string, reason: string): Promise<DispatchOutcome> {
    const escalation = this._requireOpenEscalation(escalationId)
    return this._queue.run(escalation.namespace, async () => {
      this._resolve(this._requireOpenEscalation(escalationId), 'rejected', reason)
      const project = this._requireProject(escalation.namespace)
      if (project.currentPhase !== escalation.phase || project.status !== 'active') {
        return outcome('rejected', project.namespace, escalation.phase, [
          `Escalation phase ${escalation.phase} is no longer current`,
        ])
      }
      resetReviewProgress(this._db, project.namespace, project.currentPhase)
      const fixIssues = [`Operator rejected the ${escalation.kind} escalation: ${reason}`]
      const instruction = await this._enqueue({ project, phase: project.currentPhase, kind: 'work', fixIssues })
      if (instruction === null) {
        return outcome('rejected', project.namespace, project.currentPhase, [
          `No worker is available for ${project.currentPhase}`,
        ])
      }
      return outcome('enqueued', project.namespace, project.currentPhase, fixIssues, { instruction })
    })
  }

  rollback(namespace: string, targetPhase: Phase): Promise<DispatchOutcome> {
    return this._queue.run(namespace, async () => {
      const result = this._phaseMachine.rollback(namespace, targetPhase)
      const project = this._requireProject(namespace)
      const reasons = [
        `Rolled back from ${result.from} to ${result.to}; ${String(result.tasksReset)} task(s) reset`,
      ]
      const instruction = await this._enqueue({ project, phase: targetPhase, kind: 'work', fixIssues: [] })
      if (instruction === null) {
        return outcome('rejected', namespace, targetPhase, [...reasons, `No worker is available for ${targetPhase}`])
      }
      return outcome('enqueued', namespace, targetPhase, reasons, { instruction })
    })
  }

  cancelProject(namespace: string): Promise<Project> {
    return this._queue.run(namespace, async () => this._phaseMachine.cancel(namespace))
  }

  idle(): Promise<void> {
    return this._queue.onIdle()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _afterAdvance(project: Project, advance: AdvanceResult): Promise<DispatchOutcome> {
    const { namespace } = project
    if (!advance.advanced) {
      return outcome('waiting', namespace, advance.from, advance.reasons)
    }
    if (advance.completed || advance.to === null) {
      return outcome('completed', namespace, advance.from, [`Project completed after ${advance.from}`])
    }
    const reasons = [`Advanced from ${advance.from} to ${advance.to}`]
    const instruction = await this._enqueue({ project, phase: advance.to, kind: 'work', fixIssues: [] })
    if (instruction === null) {
      return outcome('rejected', namespace, advance.to, [...reasons, `No worker is available for ${advance.to}`])
    }
    return outcome('enqueued', namespace, advance.to, reasons, { instruction })
  }

  private async _handleModify(project: Project, signal: CompletionSignal, suggestion: string): Promise<DispatchOutcome> {
    const { namespace, phase } = signal
    const progress = getReviewProgress(this._db, namespace, phase)
    const count = progress.intentModifyCount + 1
    saveReviewProgress(this._db, namespace, phase, { ...progress, intentModifyCount: count })

    if (count >= this._config.intent.max_modify_retries) {
      const reason = `Intent check asked for changes ${String(count)} times in ${phase}: ${suggestion}`
      const escalationId = this._escalate(namespace, phase, 'intent', null, reason)
      return outcome('escalated', namespace, phase, [reason], { escalationId })
    }

    const instruction = await this._enqueue({
      project,
      phase,
      kind: 'remediation',
      fixIssues: [suggestion],
      worker: this._workerOf(phase, signal.workerName),
    })
    return outcome('remediation', namespace, phase, [suggestion], instruction !== null ? { instruction } : {})
  }

  /** Mark the signal's task done; prefers an open task of the same worker */
  private _completeTask(signal: CompletionSignal, success: boolean): void {
    const open = getTasksForPhase(this._db, signal.namespace, signal.phase).filter((t) => t.status !== 'completed')
    const task = open.find((t) => t.workerName === signal.workerName) ?? open[0]
    if (task !== undefined) {
      updateTaskStatus(this._db, task.id, success ? 'completed' : 'failed')
    }
  }

  /** The registered variant a remediation goes back to */
  private _workerOf(phase: Phase, workerName: string): { name: string; tier: string } | undefined {
    const capability = this._registry.capabilityFor(phase)
    if (capability === undefined) return undefined
    const variant = this._registry.variants(capability).find((v) => v.name === workerName)
    return variant === undefined ? undefined : { name: variant.name, tier: variant.tier }
  }

  private async _enqueue(request: EnqueueRequest): Promise<InstructionRequest | null> {
    const { project, phase, kind } = request
    const { namespace } = project

    let worker = request.worker
    if (worker === undefined) {
      const decision = await this._selector.selectForPhase(phase)
      if (decision === null) return null
      worker = { name: decision.workerName, tier: decision.tier }
    }

    const taskId = this._taskFor(namespace, phase, worker.name)
    const memoryBoost = await this._memory.enhance(worker.name, phase, { namespace, text: project.goal })
    const context = buildInstructionContext({
      goal: project.goal,
      phase,
      model: this._intent.getModel(namespace),
      signals: listSignals(this._db, namespace),
      gates: this._config.review.gates,
      memoryBoost,
      fixIssues: request.fixIssues,
    })

    const instruction: InstructionRequest = {
      id: generateId('instr'),
      namespace,
      phase,
      workerName: worker.name,
      tier: worker.tier,
      kind,
      taskId,
      context,
      createdAt: new Date().toISOString(),
    }
    insertInstruction(this._db, {
      id: instruction.id,
      namespace,
      phase,
      workerName: worker.name,
      tier: worker.tier,
      kind,
      taskId,
      payload: instruction,
      createdAt: instruction.createdAt,
    })
    logger.info({ namespace, phase, worker: worker.name, tier: worker.tier, kind }, 'Instruction enqueued')
    this._eventBus?.emit('instruction:enqueued', {
      instructionId: instruction.id,
      namespace,
      phase,
      workerName: worker.name,
      kind,
    })

    if (this._sink !== undefined) {
      try {
        await this._sink(instruction)
        markInstructionDelivered(this._db, instruction.id)
      } catch (err) {
        logger.warn({ instructionId: instruction.id, reason: errorMessage(err) }, 'Delivery failed; left in outbox')
      }
    }
    return instruction
  }

  /** Reuse the phase's first unfinished task, or open a new one */
  private _taskFor(namespace: string, phase: Phase, workerName: string): string {
    const open = getTasksForPhase(this._db, namespace, phase).find((t) => t.status !== 'completed')
    if (open !== undefined) {
      updateTaskStatus(this._db, open.id, 'in-progress')
      return open.id
    }
    return createTask(this._db, { namespace, phase, workerName, status: 'in-progress' }).id
  }

  private _escalate(
    namespace: string,
    phase: Phase,
    kind: Escalation['kind'],
    gateName: string | null,
    reason: string,
  ): string {
    const escalation = createEscalation(this._db, { namespace, phase, kind, gateName, reason })
    logger.warn({ namespace, phase, kind, escalationId: escalation.id }, 'Escalation raised')
    this._eventBus?.emit('escalation:required', { escalationId: escalation.id, namespace, phase, kind, reason })
    return escalation.id
  }

  private _resolve(escalation: Escalation, decision: 'approved' | 'rejected', note: string | null): void {
    resolveEscalation(this._db, escalation.id, decision, note)
    logger.info({ escalationId: escalation.id, namespace: escalation.namespace, decision }, 'Escalation resolved')
    this._eventBus?.emit('escalation:resolved', {
      escalationId: escalation.id,
      namespace: escalation.namespace,
      decision,
    })
  }

  private _requireOpenEscalation(escalationId: string): Escalation {
    const escalation = getEscalation(this._db, escalationId)
    if (escalation === undefined) {
      throw new InvalidTransitionError(`Escalation not found: ${escalationId}`, { escalationId })
    }
    if (escalation.status !== 'open') {
      throw new InvalidTransitionError(`Escalation ${escalationId} is already ${escalation.status}`, {
        escalationId,
        status: escalation.status,
      })
    }
    return escalation
  }

  private _requireProject(namespace: string): Project {
    const project = this._phaseMachine.getProject(namespace)
    if (project === undefined) throw new ProjectNotFoundError(namespace)
    return project
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createContinuationDispatcher(options: ContinuationDispatcherOptions): ContinuationDispatcher {
  return new ContinuationDispatcherImpl(options)
}
