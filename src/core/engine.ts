/**
 * Engine interface: the public contract of an assembled Cadence engine.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createEngine()` from engine-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { CadenceConfig } from '../modules/config/config-schema.js'
import type { ContinuationDispatcher } from '../modules/dispatch/continuation-dispatcher.js'
import type { InstructionSink } from '../modules/dispatch/types.js'
import type { IntentTracker } from '../modules/intent/intent-tracker.js'
import type { MemoryOrchestrator } from '../modules/memory/memory-orchestrator.js'
import type { PatternStore } from '../modules/pattern-store/pattern-store.js'
import type { PhaseMachine } from '../modules/phase-machine/phase-machine.js'
import type { ArtifactResolver } from '../modules/triangulation/artifact-resolver.js'
import type { ViewpointEvaluator } from '../modules/triangulation/types.js'
import type { InstructionFilter, OutboxInstruction } from '../persistence/queries/instructions.js'

// ---------------------------------------------------------------------------
// EngineOptions
// ---------------------------------------------------------------------------

export interface EngineOptions {
  /** Validated configuration, usually from ConfigSystem.getConfig() */
  config: Readonly<CadenceConfig>

  /**
   * Directory that relative paths (data_dir, fallback_dir, artifact refs)
   * resolve against.
   * @default process.cwd()
   */
  rootDir?: string

  /**
   * SQLite database path.
   * @default <global.data_dir>/cadence.db
   */
  databasePath?: string

  /** Resolves artifact refs for review (default: files under the working directory) */
  resolver?: ArtifactResolver

  /** Viewpoint evaluators merged over the built-in heuristics */
  evaluators?: Record<string, ViewpointEvaluator>

  /** Primary pattern store; the engine's own SQLite store when omitted */
  primaryStore?: PatternStore

  /** Receives each enqueued instruction; the outbox table alone when omitted */
  sink?: InstructionSink

  /**
   * Shut down gracefully on SIGTERM/SIGINT.
   * @default false
   */
  handleSignals?: boolean
}

// ---------------------------------------------------------------------------
// Engine interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle:
 *  1. Create via `createEngine(options)`; the database is migrated and the
 *     fallback queue picked up before it resolves
 *  2. Feed goals and completion signals to `dispatcher`
 *  3. Call `shutdown()` to drain in-flight work and close the database
 */
export interface Engine {
  readonly eventBus: TypedEventBus
  readonly config: Readonly<CadenceConfig>
  readonly dispatcher: ContinuationDispatcher
  readonly phaseMachine: PhaseMachine
  readonly intent: IntentTracker
  readonly memory: MemoryOrchestrator

  /** Whether the engine has been fully initialized and not shut down */
  readonly isReady: boolean

  /** Instructions in the outbox, oldest first */
  listInstructions(filter?: InstructionFilter): OutboxInstruction[]

  /** Mark a queued instruction delivered; false when it was not queued */
  acknowledgeInstruction(id: string): boolean

  /**
   * Wait for in-flight dispatches, then shut every service down in reverse
   * order. Safe to call multiple times.
   */
  shutdown(): Promise<void>
}
