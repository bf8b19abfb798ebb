/**
 * EngineImpl: the composition root.
 *
 * The createEngine() factory:
 *  1. Opens and migrates the SQLite database
 *  2. Instantiates the TypedEventBus
 *  3. Builds the pattern store stack (primary → resilient wrapper with the
 *     local fallback queue) and the memory orchestrator over it
 *  4. Creates triangulation, review chain, intent tracker, phase machine,
 *     worker selection and the continuation dispatcher via constructor
 *     injection
 *  5. Initializes lifecycle services through the ServiceRegistry
 *  6. Optionally sets up SIGTERM/SIGINT graceful shutdown handlers
 *  7. Emits engine:ready
 */

import { join, resolve } from 'node:path'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger, setLogLevel } from '../utils/logger.js'
import { createEventBus } from './event-bus.js'
import { ServiceRegistry } from './di.js'
import type { TypedEventBus } from './event-bus.js'
import type { Engine, EngineOptions } from './engine.js'
import { createDatabaseService } from '../persistence/database.js'
import { listInstructions, markInstructionDelivered } from '../persistence/queries/instructions.js'
import type { InstructionFilter, OutboxInstruction } from '../persistence/queries/instructions.js'
import type { CadenceConfig } from '../modules/config/config-schema.js'
import { createContinuationDispatcher } from '../modules/dispatch/continuation-dispatcher-impl.js'
import type { ContinuationDispatcher } from '../modules/dispatch/continuation-dispatcher.js'
import { createIntentTracker } from '../modules/intent/intent-tracker-impl.js'
import type { IntentTracker } from '../modules/intent/intent-tracker.js'
import { createMemoryOrchestrator } from '../modules/memory/memory-orchestrator-impl.js'
import type { MemoryOrchestrator } from '../modules/memory/memory-orchestrator.js'
import { HashingEmbedder } from '../modules/pattern-store/embedder.js'
import { FileFallbackStore } from '../modules/pattern-store/file-fallback-store.js'
import { ResilientPatternStore } from '../modules/pattern-store/resilient-pattern-store.js'
import { SqlitePatternStore } from '../modules/pattern-store/sqlite-pattern-store.js'
import { createPhaseMachine } from '../modules/phase-machine/phase-machine-impl.js'
import type { PhaseMachine } from '../modules/phase-machine/phase-machine.js'
import { createReviewChain } from '../modules/review-chain/review-chain-impl.js'
import { CapabilityRegistry } from '../modules/routing/capability-registry.js'
import { HealthCheckRegistry } from '../modules/routing/health-checks.js'
import { WorkerSelector } from '../modules/routing/worker-selector.js'
import { FileArtifactResolver } from '../modules/triangulation/artifact-resolver.js'
import { createTriangulationEngine } from '../modules/triangulation/triangulation-engine-impl.js'

const logger = createLogger('engine')

/** Database file name inside global.data_dir */
export const DATABASE_FILE = 'cadence.db'

/** Name of the health check the memory-enhanced worker variants depend on */
export const PATTERN_STORE_DEPENDENCY = 'pattern-store'

// ---------------------------------------------------------------------------
// EngineImpl
// ---------------------------------------------------------------------------

interface EngineParts {
  eventBus: TypedEventBus
  config: Readonly<CadenceConfig>
  db: BetterSqlite3Database
  registry: ServiceRegistry
  dispatcher: ContinuationDispatcher
  phaseMachine: PhaseMachine
  intent: IntentTracker
  memory: MemoryOrchestrator
}

class EngineImpl implements Engine {
  readonly eventBus: TypedEventBus
  readonly config: Readonly<CadenceConfig>
  readonly dispatcher: ContinuationDispatcher
  readonly phaseMachine: PhaseMachine
  readonly intent: IntentTracker
  readonly memory: MemoryOrchestrator
  private readonly _db: BetterSqlite3Database
  private readonly _registry: ServiceRegistry
  private _ready = false
  private _shutdown = false
  private _sigtermHandler: (() => void) | null = null
  private _sigintHandler: (() => void) | null = null

  constructor(parts: EngineParts) {
    this.eventBus = parts.eventBus
    this.config = parts.config
    this.dispatcher = parts.dispatcher
    this.phaseMachine = parts.phaseMachine
    this.intent = parts.intent
    this.memory = parts.memory
    this._db = parts.db
    this._registry = parts.registry
  }

  get isReady(): boolean {
    return this._ready
  }

  listInstructions(filter: InstructionFilter = {}): OutboxInstruction[] {
    return listInstructions(this._db, filter)
  }

  acknowledgeInstruction(id: string): boolean {
    return markInstructionDelivered(this._db, id)
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true
    this._ready = false

    logger.info('Engine shutdown initiated')
    this.eventBus.emit('engine:shutdown', { reason: 'shutdown() called' })
    this.removeShutdownHandlers()

    await this.dispatcher.idle()
    try {
      await this._registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during engine shutdown')
    }

    logger.info('Engine shutdown complete')
  }

  markReady(): void {
    this._ready = true
  }

  registerShutdownHandlers(): void {
    if (this._sigtermHandler !== null) return

    const makeHandler = (signal: string) => () => {
      logger.info({ signal }, 'Received signal, initiating graceful shutdown')
      this.shutdown()
        .then(() => {
          process.exit(0)
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during signal-triggered shutdown')
          process.exit(1)
        })
    }

    this._sigtermHandler = makeHandler('SIGTERM')
    this._sigintHandler = makeHandler('SIGINT')
    process.once('SIGTERM', this._sigtermHandler)
    process.once('SIGINT', this._sigintHandler)
  }

  removeShutdownHandlers(): void {
    if (this._sigtermHandler !== null) {
      process.removeListener('SIGTERM', this._sigtermHandler)
      this._sigtermHandler = null
    }
    if (this._sigintHandler !== null) {
      process.removeListener('SIGINT', this._sigintHandler)
      this._sigintHandler = null
    }
  }
}

// ---------------------------------------------------------------------------
// createEngine factory
// ---------------------------------------------------------------------------

/**
 * Assemble an engine with every module wired via constructor injection.
 */
export async function createEngine(options: EngineOptions): Promise<Engine> {
  const { config } = options
  setLogLevel(config.global.log_level)
  const rootDir = options.rootDir ?? process.cwd()
  const dataDir = resolve(rootDir, config.global.data_dir)
  const databasePath = options.databasePath ?? join(dataDir, DATABASE_FILE)
  logger.info({ databasePath }, 'Initializing engine')

  const eventBus = createEventBus()

  // The stores below need an open connection at construction time
  const databaseService = createDatabaseService(databasePath)
  await databaseService.initialize()
  const { db } = databaseService

  // Pattern store stack
  const primary = options.primaryStore ?? new SqlitePatternStore(db)
  const fallbackDir =
    config.memory.fallback_dir !== undefined ? resolve(rootDir, config.memory.fallback_dir) : join(dataDir, 'fallback')
  const patternStore = new ResilientPatternStore({
    primary,
    fallback: new FileFallbackStore(fallbackDir),
    eventBus,
    operationTimeoutMs: config.memory.store_timeout_ms,
    flushBaseDelayMs: config.memory.flush_base_delay_ms,
    flushMaxDelayMs: config.memory.flush_max_delay_ms,
  })
  const memory = createMemoryOrchestrator({ store: patternStore, embedder: new HashingEmbedder(), config: config.memory })

  // Review
  const triangulation = createTriangulationEngine({
    config: config.triangulation,
    passThreshold: config.review.pass_threshold,
    resolver: options.resolver ?? new FileArtifactResolver(rootDir),
    evaluators: options.evaluators,
    memory,
    db,
    eventBus,
  })
  const reviewChain = createReviewChain({ config: config.review, triangulation, db, eventBus })

  // Intent and phase progression
  const intent = createIntentTracker({ db, config: config.intent, eventBus })
  const phaseMachine = createPhaseMachine({ db, eventBus })

  // Worker selection; the health check asks the primary store, not the wrapper
  const capabilities = CapabilityRegistry.fromConfig(config.workers)
  const health = new HealthCheckRegistry(config.dispatch.health_check_timeout_ms)
  health.register({ name: PATTERN_STORE_DEPENDENCY, check: () => primary.ping() })
  const selector = new WorkerSelector({ registry: capabilities, health, tierOrder: config.dispatch.tier_order })

  const dispatcher = createContinuationDispatcher({
    db,
    config,
    phaseMachine,
    reviewChain,
    intent,
    memory,
    selector,
    registry: capabilities,
    eventBus,
    sink: options.sink,
  })

  // Database first so it shuts down last
  const registry = new ServiceRegistry()
  registry.register('database', databaseService)
  registry.register('patternStore', patternStore)

  const engine = new EngineImpl({ eventBus, config, db, registry, dispatcher, phaseMachine, intent, memory })

  try {
    await registry.initializeAll()
  } catch (err) {
    logger.error({ err }, 'Service initialization failed, cleaning up')
    try {
      await registry.shutdownAll()
    } catch (shutdownErr) {
      logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
    }
    throw err
  }

  if (options.handleSignals === true) {
    engine.registerShutdownHandlers()
  }

  engine.markReady()
  eventBus.emit('engine:ready', {})
  logger.info('Engine ready')
  return engine
}
