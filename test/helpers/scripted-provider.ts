/**
 * In-process JobStatusProvider driven by per-job scripts.
 *
 * Each script is a list of steps returned by successive getJob() calls; the
 * last step repeats forever. A step is a snapshot, an Error (getJob rejects
 * with it), or a function producing the snapshot, for tests that need to hold
 * a response until they release it.
 */

import { vi } from 'vitest'
import type { JobId, Parameters } from '../../src/core/types.js'
import type { JobSnapshot, JobStatusProvider } from '../../src/modules/job-provider/job-status-provider.js'

export type ScriptStep = JobSnapshot | Error | (() => Promise<JobSnapshot>)

const STILL_RUNNING: ScriptStep[] = [{ status: 'processing' }]

export class ScriptedProvider implements JobStatusProvider {
  private readonly _scripts = new Map<JobId, ScriptStep[]>()
  private readonly _queued: ScriptStep[][] = []
  private _seq = 0

  readonly createJob = vi.fn(async (_model: string, _params: Parameters): Promise<JobId> => {
    this._seq += 1
    const jobId = `job-${String(this._seq)}`
    this._scripts.set(jobId, this._queued.shift() ?? [...STILL_RUNNING])
    return jobId
  })

  readonly getJob = vi.fn(async (jobId: JobId): Promise<JobSnapshot> => {
    const script = this._scripts.get(jobId) ?? [...STILL_RUNNING]
    const step = script.length > 1 ? script.shift() : script[0]
    this._scripts.set(jobId, script)
    if (step === undefined) return { status: 'processing' }
    if (step instanceof Error) throw step
    if (typeof step === 'function') return step()
    return { id: jobId, ...step }
  })

  readonly cancelJob = vi.fn(async (_jobId: JobId): Promise<void> => undefined)

  /** Script the next job createJob() hands out */
  enqueue(...steps: ScriptStep[]): this {
    this._queued.push(steps)
    return this
  }

  /** Script an existing job id */
  script(jobId: JobId, ...steps: ScriptStep[]): this {
    this._scripts.set(jobId, steps)
    return this
  }
}
