/**
 * Cadence - Main module exports
 * Public API surface for embedding the engine
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Engine
export { createEngine, DATABASE_FILE, PATTERN_STORE_DEPENDENCY } from './core/engine-impl.js'
export type { Engine, EngineOptions } from './core/engine.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { EngineEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Configuration
export * from './modules/config/index.js'

// Persistence
export { createDatabaseService, openMemoryDatabase, IN_MEMORY_DATABASE } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
export type { Escalation, EscalationFilter, EscalationKind, EscalationStatus } from './persistence/queries/escalations.js'
export type { InstructionFilter, InstructionStatus, OutboxInstruction } from './persistence/queries/instructions.js'

// Modules
export * from './modules/dispatch/index.js'
export * from './modules/intent/index.js'
export * from './modules/memory/index.js'
export * from './modules/pattern-store/index.js'
export * from './modules/phase-machine/index.js'
export * from './modules/review-chain/index.js'
export * from './modules/routing/index.js'
export * from './modules/triangulation/index.js'
