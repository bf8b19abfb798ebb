/**
 * Engine event bus. Modules publish what happened (phase moves, gate
 * verdicts, escalations, fallback writes); the CLI and tests listen.
 *
 * Handlers run synchronously inside emit(). Anything slow belongs in the
 * dispatcher's namespace queue, not in a handler.
 */

import { EventEmitter } from 'node:events'
import type { EngineEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/** Handler for one engine event */
export type EngineEventHandler<K extends keyof EngineEvents> = (payload: EngineEvents[K]) => void

/** Publish/subscribe over the `EngineEvents` map */
export interface TypedEventBus {
  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void
  on<K extends keyof EngineEvents>(event: K, handler: EngineEventHandler<K>): void
  /** No-op for a handler that was never registered */
  off<K extends keyof EngineEvents>(event: K, handler: EngineEventHandler<K>): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * @example
 * const bus = createEventBus()
 * bus.on('phase:advanced', ({ namespace, to }) => {
 *   process.stdout.write(`${namespace} entered ${to}\n`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    // One listener per namespace is common in long-running embedders
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof EngineEvents>(event: K, handler: EngineEventHandler<K>): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof EngineEvents>(event: K, handler: EngineEventHandler<K>): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
