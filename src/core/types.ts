/**
 * Core types for Cadence
 * Shared type definitions used across all modules
 */

/** Fixed, ordered sequence of development phases */
export const PHASE_SEQUENCE = [
  'goal-clarification',
  'specification',
  'architecture',
  'pseudocode',
  'implementation',
  'refinement-testing',
  'refinement-implementation',
  'completion',
  'documentation',
] as const

/** One stage of the development sequence */
export type Phase = (typeof PHASE_SEQUENCE)[number]

/** Project namespace: the isolation boundary for state, tasks and intent */
export type Namespace = string

/** Unique identifier for a task */
export type TaskId = string

/** Lifecycle status of a project */
export type ProjectStatus = 'active' | 'paused' | 'completed' | 'cancelled'

/** Status of an individual task */
export type TaskStatus = 'pending' | 'in-progress' | 'completed' | 'failed'

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Type guard for phase names coming from untyped input */
export function isPhase(value: string): value is Phase {
  return (PHASE_SEQUENCE as readonly string[]).includes(value)
}

/** Index of a phase in the sequence */
export function phaseIndex(phase: Phase): number {
  return PHASE_SEQUENCE.indexOf(phase)
}

/** The phase after `phase`, or null after documentation */
export function nextPhase(phase: Phase): Phase | null {
  return PHASE_SEQUENCE[phaseIndex(phase) + 1] ?? null
}

/** Project record */
export interface Project {
  namespace: Namespace
  goal: string
  currentPhase: Phase
  status: ProjectStatus
  createdAt: string
  updatedAt: string
}

/** A unit of work bound to (namespace, phase, workerName) */
export interface Task {
  id: TaskId
  namespace: Namespace
  phase: Phase
  workerName: string
  status: TaskStatus
  dependencies: TaskId[]
  createdAt: string
  updatedAt: string
}

/** Message from the external executor indicating a unit of work finished */
export interface CompletionSignal {
  namespace: Namespace
  phase: Phase
  workerName: string
  artifactRefs: string[]
  timestamp: string
  signalId: string
  /** Whether the executor reports the work as successful (default true) */
  success?: boolean
  /** Free-text summary of what the worker did */
  summary?: string
  /** `remediation` when the work answers a fix instruction */
  kind?: 'work' | 'remediation'
}
