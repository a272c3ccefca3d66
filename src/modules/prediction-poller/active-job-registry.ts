/**
 * ActiveJobRegistry — the set of jobs currently being polled.
 *
 * Whoever removes an entry owns its terminal event: the polling loop and
 * cancel() both go through `claim()`, and only the caller that gets the entry
 * back may publish. This is what keeps terminal events to exactly one per job.
 */

import { JobAlreadyActiveError } from '../../core/errors.js'
import type { JobId } from '../../core/types.js'

export class ActiveJobRegistry<T> {
  private readonly _entries: Map<JobId, T> = new Map()

  /**
   * @throws {JobAlreadyActiveError} if the job is already registered.
   */
  add(jobId: JobId, entry: T): void {
    if (this._entries.has(jobId)) {
      throw new JobAlreadyActiveError(jobId)
    }
    this._entries.set(jobId, entry)
  }

  has(jobId: JobId): boolean {
    return this._entries.has(jobId)
  }

  /** Remove and return the entry, or undefined if someone else got there first */
  claim(jobId: JobId): T | undefined {
    const entry = this._entries.get(jobId)
    if (entry === undefined) return undefined
    this._entries.delete(jobId)
    return entry
  }

  /** Remove and return every entry */
  claimAll(): T[] {
    const entries = [...this._entries.values()]
    this._entries.clear()
    return entries
  }

  ids(): JobId[] {
    return [...this._entries.keys()]
  }

  get size(): number {
    return this._entries.size
  }
}
