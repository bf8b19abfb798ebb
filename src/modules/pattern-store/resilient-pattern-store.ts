/**
 * ResilientPatternStore: a primary PatternStore backed by the local
 * fallback queue.
 *
 * Writes:
 *  - go to the primary while it answers and the fallback queue is empty
 *  - otherwise append to the fallback queue (a failure of the primary is
 *    wrapped as TransientStoreError and logged, never thrown)
 *  - a background flusher replays the queue into the primary with
 *    exponential backoff until it is empty; a write that timed out but still
 *    reached the primary is skipped there by its write id
 *
 * Reads fail fast with TransientStoreError while the primary is unreachable;
 * callers degrade instead of waiting.
 *
 * Pruning runs inside an exclusive maintenance window: writes issued while
 * it runs wait for it to finish.
 */

import type { BaseService } from '../../core/di.js'
import { TransientStoreError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { backoffDelay, errorMessage, withTimeout } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { FallbackBatch, FileFallbackStore } from './file-fallback-store.js'
import { fallbackKey } from './file-fallback-store.js'
import type { PatternStore } from './pattern-store.js'
import type { MemoryRecord, PatternWrite, RetentionPolicy, ScoredRecord } from './types.js'

const logger = createLogger('pattern-store:resilient')

export interface ResilientPatternStoreOptions {
  primary: PatternStore
  fallback: FileFallbackStore
  eventBus?: TypedEventBus
  /** Timeout of each primary call (default 2000ms) */
  operationTimeoutMs?: number
  /** First flush retry delay (default 500ms) */
  flushBaseDelayMs?: number
  /** Upper bound of the flush retry delay (default 60000ms) */
  flushMaxDelayMs?: number
}

export class ResilientPatternStore implements PatternStore, BaseService {
  private readonly _primary: PatternStore
  private readonly _fallback: FileFallbackStore
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _timeoutMs: number
  private readonly _baseDelayMs: number
  private readonly _maxDelayMs: number

  private _pending = 0
  private _flushAttempt = 0
  private _flushTimer: NodeJS.Timeout | null = null
  private _closed = false
  /** Serialises every fallback-queue mutation, including flushes */
  private _queueLock: Promise<void> = Promise.resolve()
  private _maintenance: Promise<void> | null = null

  constructor(options: ResilientPatternStoreOptions) {
    this._primary = options.primary
    this._fallback = options.fallback
    this._eventBus = options.eventBus
    this._timeoutMs = options.operationTimeoutMs ?? 2_000
    this._baseDelayMs = options.flushBaseDelayMs ?? 500
    this._maxDelayMs = options.flushMaxDelayMs ?? 60_000
  }

  /** Writes waiting in the fallback queue */
  get pendingCount(): number {
    return this._pending
  }

  /** Pick up writes queued by an earlier process and schedule their flush */
  async initialize(): Promise<void> {
    this._closed = false
    this._pending = await this._fallback.size()
    if (this._pending > 0) {
      logger.info({ pending: this._pending }, 'Found queued pattern writes from a previous run')
      this._scheduleFlush()
    }
  }

  async shutdown(): Promise<void> {
    this._closed = true
    if (this._flushTimer !== null) {
      clearTimeout(this._flushTimer)
      this._flushTimer = null
    }
    await this._queueLock
  }

  async upsert(tags: string[], write: PatternWrite): Promise<MemoryRecord> {
    if (this._maintenance !== null) {
      await this._maintenance
    }

    return this._withQueueLock(async () => {
      // Keep per-record order: once anything is queued, later writes queue too
      if (this._pending === 0) {
        try {
          return await this._callPrimary('upsert', () => this._primary.upsert(tags, write))
        } catch (err) {
          const reason = err instanceof TransientStoreError ? err.message : errorMessage(err)
          logger.warn({ recordId: write.id, reason }, 'Pattern store write failed; queued locally')
        }
      }

      const key = fallbackKey(write.namespace, tags)
      const record = await this._fallback.upsert(tags, write)
      this._pending += 1
      this._eventBus?.emit('memory:fallback', { key, reason: 'primary pattern store unavailable' })
      this._scheduleFlush()
      return record
    })
  }

  async query(tags: string[], embedding: number[], topK: number, namespace?: string): Promise<ScoredRecord[]> {
    return this._callPrimary('query', () => this._primary.query(tags, embedding, topK, namespace))
  }

  async get(id: string): Promise<MemoryRecord | undefined> {
    return this._callPrimary('get', () => this._primary.get(id))
  }

  async prune(policy: RetentionPolicy): Promise<number> {
    while (this._maintenance !== null) {
      await this._maintenance
    }

    let release: () => void = () => undefined
    this._maintenance = new Promise<void>((resolve) => {
      release = resolve
    })
    try {
      // Let in-flight writes settle before the window opens
      await this._queueLock
      const removed = await this._callPrimary('prune', () => this._primary.prune(policy))
      this._eventBus?.emit('memory:pruned', { removed })
      return removed
    } finally {
      this._maintenance = null
      release()
    }
  }

  async ping(): Promise<void> {
    await this._callPrimary('ping', () => this._primary.ping())
  }

  /**
   * Replay the fallback queue into the primary now.
   * @returns number of writes flushed
   */
  async flushNow(): Promise<number> {
    return this._withQueueLock(() => this._flush())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _flush(): Promise<number> {
    const batches = await this._fallback.claim()
    let flushed = 0
    let failure: unknown = null

    for (const batch of batches) {
      // Batches after a failure stay claimed for the next flush
      if (failure !== null) break
      let applied = 0
      try {
        for (const { tags, write } of batch.entries) {
          await this._callPrimary('upsert', () => this._primary.upsert(tags, write))
          applied += 1
        }
      } catch (err) {
        failure = err
      }
      flushed += applied
      if (applied < batch.entries.length) {
        const rest: FallbackBatch = { key: batch.key, entries: batch.entries.slice(applied) }
        await this._fallback.release(rest)
      } else {
        await this._fallback.complete(batch.key)
      }
    }

    this._pending = Math.max(0, this._pending - flushed)
    if (flushed > 0) {
      logger.info({ flushed, remaining: this._pending }, 'Flushed queued pattern writes')
      this._eventBus?.emit('memory:flushed', { count: flushed })
    }
    if (failure !== null) {
      throw new TransientStoreError('Pattern store flush incomplete', {
        flushed,
        remaining: this._pending,
        reason: errorMessage(failure),
      })
    }
    return flushed
  }

  private _scheduleFlush(): void {
    if (this._closed || this._flushTimer !== null || this._pending === 0) return
    const delay = backoffDelay(this._flushAttempt, this._baseDelayMs, this._maxDelayMs)
    this._flushTimer = setTimeout(() => {
      this._flushTimer = null
      this.flushNow().then(
        () => {
          this._flushAttempt = 0
        },
        (err: unknown) => {
          this._flushAttempt += 1
          logger.debug({ attempt: this._flushAttempt, reason: errorMessage(err) }, 'Pattern flush retry scheduled')
          this._scheduleFlush()
        },
      )
    }, delay)
    // A pending flush must not keep the process alive
    this._flushTimer.unref()
  }

  private async _callPrimary<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this._timeoutMs, `pattern store ${operation}`)
    } catch (err) {
      if (err instanceof TransientStoreError) throw err
      throw new TransientStoreError(`Pattern store ${operation} failed: ${errorMessage(err)}`, {
        operation,
        cause: errorMessage(err),
      })
    }
  }

  private _withQueueLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this._queueLock.then(fn)
    this._queueLock = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }
}
