/**
 * NamespaceQueue: per-namespace FIFO with a global concurrency cap.
 *
 * Jobs of one namespace run strictly one at a time in arrival order.
 * Different namespaces run concurrently, at most `maxConcurrency` at once.
 * A namespace gives up its slot after each job and rejoins the back of the
 * ready list, so a busy namespace cannot starve the others.
 */

import { createLogger } from '../../utils/logger.js'

const logger = createLogger('dispatch:queue')

type Job = () => Promise<void>

export class NamespaceQueue {
  private readonly _maxConcurrency: number
  private readonly _jobs = new Map<string, Job[]>()
  private readonly _ready: string[] = []
  private readonly _active = new Set<string>()
  private _idleWaiters: (() => void)[] = []

  constructor(maxConcurrency: number) {
    this._maxConcurrency = Math.max(1, maxConcurrency)
  }

  /**
   * Run `task` once every earlier job of `namespace` has settled.
   * The returned promise settles with the task's own result.
   */
  run<T>(namespace: string, task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const job: Job = async () => {
        try {
          resolve(await task())
        } catch (err) {
          reject(err)
        }
      }
      const jobs = this._jobs.get(namespace)
      if (jobs === undefined) {
        this._jobs.set(namespace, [job])
      } else {
        jobs.push(job)
      }
      if (!this._active.has(namespace) && !this._ready.includes(namespace)) {
        this._ready.push(namespace)
      }
      this._pump()
    })
  }

  /** Jobs waiting to start */
  get pending(): number {
    let count = 0
    for (const jobs of this._jobs.values()) count += jobs.length
    return count
  }

  /** Namespaces with a job in flight */
  get running(): number {
    return this._active.size
  }

  /** Resolves once no job is queued or running */
  onIdle(): Promise<void> {
    if (this._isIdle()) return Promise.resolve()
    return new Promise((resolve) => this._idleWaiters.push(resolve))
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _isIdle(): boolean {
    return this._active.size === 0 && this._ready.length === 0
  }

  private _pump(): void {
    while (this._active.size < this._maxConcurrency) {
      const namespace = this._ready.shift()
      if (namespace === undefined) break
      const job = this._jobs.get(namespace)?.shift()
      if (job === undefined) continue
      this._active.add(namespace)
      logger.trace({ namespace, active: this._active.size }, 'Job started')
      void job().then(() => this._release(namespace))
    }
    if (this._isIdle()) {
      const waiters = this._idleWaiters
      this._idleWaiters = []
      waiters.forEach((resolve) => resolve())
    }
  }

  private _release(namespace: string): void {
    this._active.delete(namespace)
    const remaining = this._jobs.get(namespace)
    if (remaining !== undefined && remaining.length > 0) {
      this._ready.push(namespace)
    } else {
      this._jobs.delete(namespace)
    }
    this._pump()
  }
}
