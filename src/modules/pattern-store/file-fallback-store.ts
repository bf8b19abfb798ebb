/**
 * FileFallbackStore: local, append-only NDJSON queue of pattern writes.
 *
 * Each (namespace, primary tag) pair has its own log file. Writes for one
 * record always land in the same file, so replaying a file front to back
 * preserves their order. Reads fold the queued writes into records, which
 * lets the fallback stand in for the primary store behind the same interface.
 *
 * A flush claims a log by renaming it to `<key>.flushing` and deletes it only
 * once every entry reached the primary. A claimed log left behind by a crash
 * is replayed by the next flush; write ids make the replay idempotent.
 */

import { appendFile, mkdir, readdir, readFile, rename, unlink, writeFile } from 'fs/promises'
import { join } from 'path'
import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import type { PatternStore } from './pattern-store.js'
import { applyPatternWrite, rankBySimilarity } from './records.js'
import type { MemoryRecord, PatternWrite, RetentionPolicy, ScoredRecord } from './types.js'

const logger = createLogger('pattern-store:fallback')

const LOG_SUFFIX = '.ndjson'
const CLAIMED_SUFFIX = '.flushing'

const QueuedWriteSchema = z.object({
  tags: z.array(z.string()),
  write: z.object({
    id: z.string(),
    writeId: z.string(),
    namespace: z.string().nullable(),
    patternText: z.string(),
    embedding: z.array(z.number()),
    outcome: z.enum(['success', 'failure']),
    alpha: z.number(),
    at: z.string(),
  }),
})

/** One queued upsert */
export type QueuedWrite = z.infer<typeof QueuedWriteSchema>

/** Queued writes of one log file, in append order */
export interface FallbackBatch {
  key: string
  entries: QueuedWrite[]
}

function sanitize(part: string): string {
  return part.replace(/[^A-Za-z0-9._-]/g, '_')
}

/** Log key of a write: originating namespace plus its first tag */
export function fallbackKey(namespace: string | null, tags: string[]): string {
  return `${sanitize(namespace ?? 'global')}__${sanitize(tags[0] ?? 'untagged')}`
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export class FileFallbackStore implements PatternStore {
  private readonly _dir: string

  constructor(dir: string) {
    this._dir = dir
  }

  get directory(): string {
    return this._dir
  }

  /** Append a write to its log and return the record as the queue sees it */
  async upsert(tags: string[], write: PatternWrite): Promise<MemoryRecord> {
    await this.append(tags, write)
    const record = await this.get(write.id)
    return record ?? applyPatternWrite(undefined, tags, write)
  }

  async append(tags: string[], write: PatternWrite): Promise<string> {
    const key = fallbackKey(write.namespace, tags)
    await mkdir(this._dir, { recursive: true })
    const entry: QueuedWrite = { tags, write }
    await appendFile(this._file(key), `${JSON.stringify(entry)}\n`, 'utf-8')
    return key
  }

  async query(tags: string[], embedding: number[], topK: number, namespace?: string): Promise<ScoredRecord[]> {
    const records = [...(await this._foldAll()).values()].filter(
      (r) => namespace === undefined || r.namespace === null || r.namespace === namespace,
    )
    return rankBySimilarity(records, tags, embedding, topK)
  }

  async get(id: string): Promise<MemoryRecord | undefined> {
    return (await this._foldAll()).get(id)
  }

  /** The queue is drained into the primary store, never pruned */
  async prune(_policy: RetentionPolicy): Promise<number> {
    return 0
  }

  async ping(): Promise<void> {
    await mkdir(this._dir, { recursive: true })
  }

  /** Queued writes per log file, claimed entries first, without removing them */
  async pending(): Promise<FallbackBatch[]> {
    const batches: FallbackBatch[] = []
    for (const key of await this._keys()) {
      const claimed = await this._readLog(this._claimedFile(key), key)
      const open = await this._readLog(this._file(key), key)
      const entries = [...claimed, ...open]
      if (entries.length > 0) batches.push({ key, entries })
    }
    return batches
  }

  /** Number of queued writes across all logs */
  async size(): Promise<number> {
    return (await this.pending()).reduce((sum, batch) => sum + batch.entries.length, 0)
  }

  /**
   * Move every open log into its claimed file and return the claimed writes.
   * Writes queued after an earlier, interrupted flush are appended behind the
   * entries that flush left claimed.
   */
  async claim(): Promise<FallbackBatch[]> {
    for (const key of await this._keys()) {
      const raw = await this._readRaw(this._file(key))
      if (raw === null) continue
      if ((await this._readRaw(this._claimedFile(key))) === null) {
        await rename(this._file(key), this._claimedFile(key))
      } else {
        await appendFile(this._claimedFile(key), raw, 'utf-8')
        await unlink(this._file(key))
      }
    }

    const batches: FallbackBatch[] = []
    for (const key of await this._keys()) {
      const entries = await this._readLog(this._claimedFile(key), key)
      if (entries.length > 0) batches.push({ key, entries })
      else await this.complete(key)
    }
    return batches
  }

  /** Delete a claimed log once all of its entries were applied */
  async complete(key: string): Promise<void> {
    try {
      await unlink(this._claimedFile(key))
    } catch (err) {
      if (!isMissing(err)) throw err
    }
  }

  /** Replace a claimed log with the entries that were not applied */
  async release(batch: FallbackBatch): Promise<void> {
    if (batch.entries.length === 0) {
      await this.complete(batch.key)
      return
    }
    const tmp = `${this._claimedFile(batch.key)}.tmp`
    const lines = batch.entries.map((entry) => `${JSON.stringify(entry)}\n`).join('')
    await writeFile(tmp, lines, 'utf-8')
    await rename(tmp, this._claimedFile(batch.key))
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _file(key: string): string {
    return join(this._dir, `${key}${LOG_SUFFIX}`)
  }

  private _claimedFile(key: string): string {
    return join(this._dir, `${key}${CLAIMED_SUFFIX}`)
  }

  private async _keys(): Promise<string[]> {
    let names: string[]
    try {
      names = await readdir(this._dir)
    } catch (err) {
      if (isMissing(err)) return []
      throw err
    }
    const keys = new Set<string>()
    for (const name of names) {
      if (name.endsWith(LOG_SUFFIX)) keys.add(name.slice(0, -LOG_SUFFIX.length))
      else if (name.endsWith(CLAIMED_SUFFIX)) keys.add(name.slice(0, -CLAIMED_SUFFIX.length))
    }
    return [...keys].sort()
  }

  private async _readRaw(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8')
    } catch (err) {
      if (isMissing(err)) return null
      throw err
    }
  }

  private async _readLog(path: string, key: string): Promise<QueuedWrite[]> {
    const raw = (await this._readRaw(path)) ?? ''
    const entries: QueuedWrite[] = []
    for (const line of raw.split('\n')) {
      if (line.trim() === '') continue
      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        logger.warn({ key }, 'Skipping unreadable fallback log line')
        continue
      }
      const result = QueuedWriteSchema.safeParse(parsed)
      if (result.success) {
        entries.push(result.data)
      } else {
        logger.warn({ key, issues: result.error.issues }, 'Skipping malformed fallback log entry')
      }
    }
    return entries
  }

  private async _foldAll(): Promise<Map<string, MemoryRecord>> {
    const records = new Map<string, MemoryRecord>()
    const seen = new Set<string>()
    for (const batch of await this.pending()) {
      for (const { tags, write } of batch.entries) {
        if (seen.has(write.writeId)) continue
        seen.add(write.writeId)
        records.set(write.id, applyPatternWrite(records.get(write.id), tags, write))
      }
    }
    return records
  }
}
