/**
 * JobStatusProvider — the generation service's job API as the lifecycle sees it.
 *
 * The concrete client (transport, authentication, request shapes) lives outside
 * this package; adapters implement this interface over it.
 */

import type { JobId, Parameters } from '../../core/types.js'

/** Status strings the poller acts on; anything else counts as still running */
export type KnownJobStatus = 'starting' | 'processing' | 'succeeded' | 'failed' | 'canceled'

/** Statuses after which the provider never reports anything else */
export type TerminalJobStatus = Extract<KnownJobStatus, 'succeeded' | 'failed' | 'canceled'>

/** One observation of a job */
export interface JobSnapshot {
  id?: JobId
  /** Provider status; usually a KnownJobStatus, but any string is accepted */
  status: string
  /** Raw output: absent, a single value, or a list */
  output?: unknown
  error?: string | null
  /** Extra metadata the provider returns with the job (metrics, versions) */
  metadata?: Record<string, unknown>
}

export interface JobStatusProvider {
  /** Create a job and resolve with its id */
  createJob(model: string, params: Parameters): Promise<JobId>
  getJob(jobId: JobId): Promise<JobSnapshot>
  cancelJob(jobId: JobId): Promise<void>
}

export function isTerminalJobStatus(status: string): status is TerminalJobStatus {
  return status === 'succeeded' || status === 'failed' || status === 'canceled'
}
