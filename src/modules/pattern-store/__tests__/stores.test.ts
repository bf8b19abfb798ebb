/**
 * Unit tests for the SQLite store, the file fallback queue and the resilient
 * wrapper that combines them.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, readdirSync, rmSync, writeFileSync, appendFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openMemoryDatabase } from '../../../persistence/database.js'
import { createEventBus } from '../../../core/event-bus.js'
import { TransientStoreError } from '../../../core/errors.js'
import { SqlitePatternStore } from '../sqlite-pattern-store.js'
import { FileFallbackStore, fallbackKey } from '../file-fallback-store.js'
import { ResilientPatternStore } from '../resilient-pattern-store.js'
import type { PatternStore } from '../pattern-store.js'
import type { MemoryRecord, PatternWrite, RetentionPolicy, ScoredRecord } from '../types.js'

let writeSeq = 0

function write(overrides: Partial<PatternWrite> = {}): PatternWrite {
  writeSeq += 1
  return {
    id: 'rec-1',
    writeId: `w-${writeSeq}`,
    namespace: 'demo',
    patternText: 'prefer small endpoints',
    embedding: [1, 0, 0],
    outcome: 'success',
    alpha: 0.5,
    at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}

/** Primary store that can be switched off */
class FlakyStore implements PatternStore {
  down = false
  calls = 0
  constructor(private readonly inner: PatternStore) {}

  private check(): void {
    this.calls += 1
    if (this.down) throw new Error('connection refused')
  }
  async upsert(tags: string[], w: PatternWrite): Promise<MemoryRecord> {
    this.check()
    return this.inner.upsert(tags, w)
  }
  async query(tags: string[], e: number[], k: number, ns?: string): Promise<ScoredRecord[]> {
    this.check()
    return this.inner.query(tags, e, k, ns)
  }
  async get(id: string): Promise<MemoryRecord | undefined> {
    this.check()
    return this.inner.get(id)
  }
  async prune(policy: RetentionPolicy): Promise<number> {
    this.check()
    return this.inner.prune(policy)
  }
  async ping(): Promise<void> {
    this.check()
  }
}

/** Primary store whose first upsert lands only after `delayMs` */
class SlowFirstWriteStore extends FlakyStore {
  private slowed = false
  constructor(inner: PatternStore, private readonly delayMs: number) {
    super(inner)
  }
  override async upsert(tags: string[], w: PatternWrite): Promise<MemoryRecord> {
    if (!this.slowed) {
      this.slowed = true
      await new Promise((r) => setTimeout(r, this.delayMs))
    }
    return super.upsert(tags, w)
  }
}

let db: BetterSqlite3Database
let dir: string

beforeEach(() => {
  db = openMemoryDatabase()
  dir = mkdtempSync(join(tmpdir(), 'cadence-fallback-'))
})

afterEach(() => {
  db.close()
  rmSync(dir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// SqlitePatternStore
// ---------------------------------------------------------------------------

describe('SqlitePatternStore', () => {
  it('folds writes into one record and indexes its tags', async () => {
    const store = new SqlitePatternStore(db)
    await store.upsert(['specification', 'worker:spec'], write())
    const record = await store.upsert(['specification'], write({ outcome: 'failure' }))

    expect(record.confidenceScore).toBe(0.375)
    expect(record.tags).toEqual(['specification', 'worker:spec'])
    expect(await store.get('rec-1')).toEqual(record)
  })

  it('queries by tag overlap and namespace', async () => {
    const store = new SqlitePatternStore(db)
    await store.upsert(['spec'], write({ id: 'a', namespace: 'demo', embedding: [1, 0, 0] }))
    await store.upsert(['spec'], write({ id: 'b', namespace: 'other', embedding: [0.8, 0.6, 0] }))
    await store.upsert(['spec'], write({ id: 'g', namespace: null, embedding: [0, 1, 0] }))
    await store.upsert(['arch'], write({ id: 'c', namespace: 'demo', embedding: [1, 0, 0] }))

    const all = await store.query(['spec'], [1, 0, 0], 10)
    expect(all.map((r) => r.record.id)).toEqual(['a', 'b', 'g'])

    const scoped = await store.query(['spec'], [1, 0, 0], 10, 'demo')
    expect(scoped.map((r) => r.record.id)).toEqual(['a', 'g'])

    expect(await store.query([], [1, 0, 0], 10)).toEqual([])
  })

  it('prunes by age and by count', async () => {
    const store = new SqlitePatternStore(db)
    await store.upsert(['t'], write({ id: 'old', at: '2025-01-01T00:00:00.000Z' }))
    await store.upsert(['t'], write({ id: 'mid', at: '2026-01-10T00:00:00.000Z' }))
    await store.upsert(['t'], write({ id: 'new', at: '2026-01-20T00:00:00.000Z' }))

    const removedByAge = await store.prune({ maxAgeDays: 30, maxRecords: 0, now: new Date('2026-01-25T00:00:00.000Z') })
    expect(removedByAge).toBe(1)
    expect(await store.get('old')).toBeUndefined()

    const removedByCount = await store.prune({ maxAgeDays: 0, maxRecords: 1 })
    expect(removedByCount).toBe(1)
    expect(await store.get('mid')).toBeUndefined()
    expect(await store.get('new')).toBeDefined()

    const tagRows = db.prepare('SELECT COUNT(*) AS n FROM memory_record_tags').get() as { n: number }
    expect(tagRows.n).toBe(1)
    const ledgerRows = db.prepare('SELECT COUNT(*) AS n FROM memory_applied_writes').get() as { n: number }
    expect(ledgerRows.n).toBe(1)
  })

  it('applies each write id once', async () => {
    const store = new SqlitePatternStore(db)
    const first = write()
    await store.upsert(['spec'], first)
    const again = await store.upsert(['spec'], first)

    expect(again.successCount).toBe(1)
    expect(again.confidenceScore).toBe(0.75)
  })
})

// ---------------------------------------------------------------------------
// FileFallbackStore
// ---------------------------------------------------------------------------

describe('FileFallbackStore', () => {
  it('keys logs by namespace and first tag', () => {
    expect(fallbackKey('demo', ['spec', 'x'])).toBe('demo__spec')
    expect(fallbackKey(null, ['worker:a/b'])).toBe('global__worker_a_b')
    expect(fallbackKey('demo', [])).toBe('demo__untagged')
  })

  it('folds queued writes for reads', async () => {
    const fallback = new FileFallbackStore(join(dir, 'queue'))
    await fallback.upsert(['spec'], write())
    const record = await fallback.upsert(['spec'], write({ outcome: 'failure' }))

    expect(record.confidenceScore).toBe(0.375)
    expect(await fallback.size()).toBe(2)
    const hits = await fallback.query(['spec'], [1, 0, 0], 5)
    expect(hits.map((h) => h.record.id)).toEqual(['rec-1'])
  })

  it('reports an empty queue when the directory does not exist', async () => {
    const fallback = new FileFallbackStore(join(dir, 'missing'))
    expect(await fallback.pending()).toEqual([])
  })

  it('claims logs in order and deletes them once complete', async () => {
    const fallback = new FileFallbackStore(dir)
    await fallback.append(['spec'], write({ at: '2026-01-01T00:00:00.000Z' }))
    await fallback.append(['spec'], write({ at: '2026-01-02T00:00:00.000Z' }))

    const batches = await fallback.claim()
    expect(batches).toHaveLength(1)
    expect(batches[0]?.entries.map((e) => e.write.at)).toEqual([
      '2026-01-01T00:00:00.000Z',
      '2026-01-02T00:00:00.000Z',
    ])
    expect(readdirSync(dir)).toEqual(['demo__spec.flushing'])
    // Claimed entries stay visible until the flush completes
    expect(await fallback.size()).toBe(2)

    await fallback.complete('demo__spec')
    expect(await fallback.size()).toBe(0)
    expect(readdirSync(dir)).toEqual([])
  })

  it('keeps unapplied entries claimed ahead of newer writes', async () => {
    const fallback = new FileFallbackStore(dir)
    await fallback.append(['spec'], write({ at: '2026-01-01T00:00:00.000Z' }))
    await fallback.append(['spec'], write({ at: '2026-01-02T00:00:00.000Z' }))
    const [batch] = await fallback.claim()
    if (batch === undefined) throw new Error('expected a batch')

    await fallback.release({ key: batch.key, entries: batch.entries.slice(1) })
    await fallback.append(['spec'], write({ at: '2026-01-03T00:00:00.000Z' }))

    const [again] = await fallback.claim()
    expect(again?.entries.map((e) => e.write.at)).toEqual([
      '2026-01-02T00:00:00.000Z',
      '2026-01-03T00:00:00.000Z',
    ])
    expect(readdirSync(dir)).toEqual(['demo__spec.flushing'])
  })

  it('folds a repeated write id once', async () => {
    const fallback = new FileFallbackStore(dir)
    const first = write()
    await fallback.append(['spec'], first)
    await fallback.append(['spec'], first)

    expect((await fallback.get('rec-1'))?.successCount).toBe(1)
  })

  it('skips malformed lines', async () => {
    const fallback = new FileFallbackStore(dir)
    await fallback.append(['spec'], write())
    appendFileSync(join(dir, 'demo__spec.ndjson'), 'not json\n{"tags":[]}\n')
    writeFileSync(join(dir, 'ignored.txt'), 'noise')

    expect(await fallback.size()).toBe(1)
  })
})

// ---------------------------------------------------------------------------
// ResilientPatternStore
// ---------------------------------------------------------------------------

describe('ResilientPatternStore', () => {
  let primary: FlakyStore
  let fallback: FileFallbackStore
  let store: ResilientPatternStore

  beforeEach(() => {
    primary = new FlakyStore(new SqlitePatternStore(db))
    fallback = new FileFallbackStore(dir)
    store = new ResilientPatternStore({
      primary,
      fallback,
      eventBus: createEventBus(),
      operationTimeoutMs: 200,
      flushBaseDelayMs: 60_000,
    })
  })

  afterEach(async () => {
    await store.shutdown()
  })

  it('writes straight to the primary while it is healthy', async () => {
    await store.upsert(['spec'], write())
    expect(store.pendingCount).toBe(0)
    expect((await store.get('rec-1'))?.successCount).toBe(1)
  })

  it('queues writes locally during an outage and flushes them in order', async () => {
    const bus = createEventBus()
    const fallbackEvents: string[] = []
    const flushed: number[] = []
    bus.on('memory:fallback', ({ key }) => fallbackEvents.push(key))
    bus.on('memory:flushed', ({ count }) => flushed.push(count))
    store = new ResilientPatternStore({ primary, fallback, eventBus: bus, flushBaseDelayMs: 60_000 })

    await store.upsert(['spec'], write())
    primary.down = true
    await store.upsert(['spec'], write({ outcome: 'failure' }))
    expect(store.pendingCount).toBe(1)
    expect(fallbackEvents).toEqual(['demo__spec'])

    // Still queued while the primary is back but the queue is not empty
    primary.down = false
    await store.upsert(['spec'], write({ outcome: 'success' }))
    expect(store.pendingCount).toBe(2)

    expect(await store.flushNow()).toBe(2)
    expect(flushed).toEqual([2])
    expect(store.pendingCount).toBe(0)

    // 0.5 → 0.75 (success) → 0.375 (failure) → 0.6875 (success)
    const record = await store.get('rec-1')
    expect(record?.confidenceScore).toBe(0.6875)
    expect(record?.successCount).toBe(2)
    expect(record?.failureCount).toBe(1)
  })

  it('keeps unflushed writes when the primary is still down', async () => {
    primary.down = true
    await store.upsert(['spec'], write())
    await expect(store.flushNow()).rejects.toBeInstanceOf(TransientStoreError)
    expect(store.pendingCount).toBe(1)
    expect(await fallback.size()).toBe(1)
  })

  it('fails reads fast during an outage', async () => {
    primary.down = true
    await expect(store.query(['spec'], [1, 0, 0], 5)).rejects.toBeInstanceOf(TransientStoreError)
    await expect(store.ping()).rejects.toBeInstanceOf(TransientStoreError)
  })

  it('times out a hanging primary', async () => {
    const hanging: PatternStore = {
      upsert: () => new Promise<MemoryRecord>(() => undefined),
      query: () => new Promise<ScoredRecord[]>(() => undefined),
      get: () => new Promise<MemoryRecord | undefined>(() => undefined),
      prune: () => new Promise<number>(() => undefined),
      ping: () => new Promise<void>(() => undefined),
    }
    store = new ResilientPatternStore({ primary: hanging, fallback, operationTimeoutMs: 20, flushBaseDelayMs: 60_000 })
    await expect(store.get('x')).rejects.toBeInstanceOf(TransientStoreError)
    await store.upsert(['spec'], write())
    expect(store.pendingCount).toBe(1)
  })

  it('holds writes until a prune finishes', async () => {
    const order: string[] = []
    let finishPrune: () => void = () => undefined
    const slowPrune = vi.spyOn(primary, 'prune').mockImplementation(
      () =>
        new Promise<number>((resolve) => {
          finishPrune = () => {
            order.push('prune-done')
            resolve(0)
          }
        }),
    )

    const pruning = store.prune({ maxAgeDays: 1, maxRecords: 0 })
    await new Promise((r) => setImmediate(r))
    const writing = store.upsert(['spec'], write()).then(() => order.push('write-done'))
    await new Promise((r) => setImmediate(r))
    expect(order).toEqual([])

    finishPrune()
    await Promise.all([pruning, writing])
    expect(order).toEqual(['prune-done', 'write-done'])
    expect(slowPrune).toHaveBeenCalledTimes(1)
  })

  it('picks up writes queued by an earlier process', async () => {
    await fallback.append(['spec'], write())
    await store.initialize()
    expect(store.pendingCount).toBe(1)
    expect(await store.flushNow()).toBe(1)
  })

  it('replays a log left claimed by an interrupted flush', async () => {
    await fallback.append(['spec'], write())
    await fallback.claim()
    await fallback.append(['spec'], write({ outcome: 'failure' }))

    await store.initialize()
    expect(store.pendingCount).toBe(2)
    expect(await store.flushNow()).toBe(2)
    expect(readdirSync(dir)).toEqual([])

    const record = await store.get('rec-1')
    expect(record?.successCount).toBe(1)
    expect(record?.failureCount).toBe(1)
  })

  it('does not apply twice a write that timed out but still landed', async () => {
    const slow = new SlowFirstWriteStore(new SqlitePatternStore(db), 60)
    store = new ResilientPatternStore({ primary: slow, fallback, operationTimeoutMs: 20, flushBaseDelayMs: 60_000 })

    await store.upsert(['spec'], write({ alpha: 0.5 }))
    expect(store.pendingCount).toBe(1)
    await new Promise((r) => setTimeout(r, 80))

    expect(await store.flushNow()).toBe(1)
    const record = await store.get('rec-1')
    expect(record?.successCount).toBe(1)
    expect(record?.confidenceScore).toBe(0.75)
  })

  it('leaves later logs claimed when a flush stops early', async () => {
    primary.down = true
    await store.upsert(['arch'], write({ id: 'a' }))
    await store.upsert(['spec'], write({ id: 's' }))
    await expect(store.flushNow()).rejects.toBeInstanceOf(TransientStoreError)

    expect(readdirSync(dir).sort()).toEqual(['demo__arch.flushing', 'demo__spec.flushing'])
    expect(store.pendingCount).toBe(2)

    primary.down = false
    expect(await store.flushNow()).toBe(2)
    expect(readdirSync(dir)).toEqual([])
  })
})
