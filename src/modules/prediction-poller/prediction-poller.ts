/**
 * PredictionPoller — interface and supporting types for job polling.
 *
 * Watches external jobs until they reach a terminal state. Start and progress
 * observations go to the event bus with origin "poller"; terminal outcomes go
 * to the attached outcome sink, or to the bus when no sink is attached.
 */

import type { BaseService } from '../../core/di.js'
import type { JobId, Parameters } from '../../core/types.js'
import type { JobOutcomeSink } from './job-outcome.js'

// ---------------------------------------------------------------------------
// PollOutcome
// ---------------------------------------------------------------------------

/**
 * How a watch ended.
 *  - succeeded / failed / canceled: the job reached that terminal state
 *    (failed also covers transport errors and cancel failures)
 *  - timed_out: the attempt budget ran out
 *  - stopped: polling was ended by stopAll() without a terminal event
 */
export type PollOutcome = 'succeeded' | 'failed' | 'canceled' | 'timed_out' | 'stopped'

// ---------------------------------------------------------------------------
// PredictionPoller interface
// ---------------------------------------------------------------------------

export interface PredictionPoller extends BaseService {
  /**
   * Create a job on the provider without watching it.
   *
   * @throws {ExternalServiceError} with operation "create" when the provider rejects.
   */
  createJob(model: string, params: Parameters): Promise<JobId>

  /**
   * Route terminal outcomes to `sink` instead of publishing them. The sink's
   * owner becomes responsible for the job's terminal event. Pass null to
   * detach.
   *
   * @throws {ConfigurationError} when a different sink is already attached.
   */
  setOutcomeSink(sink: JobOutcomeSink | null): void

  /**
   * Start polling an existing job. Publishes generation.started, queries the
   * provider immediately, then once per interval until the job is terminal.
   *
   * The returned promise resolves once the job's terminal outcome has been
   * delivered (or polling was stopped); it never rejects because of the job.
   *
   * Rejects with JobAlreadyActiveError when the job is already being watched.
   */
  watch(jobId: JobId): Promise<PollOutcome>

  /**
   * createJob() followed by watch(). Resolves with the job id as soon as the
   * job is created; the watch runs in the background.
   */
  start(model: string, params: Parameters): Promise<JobId>

  /**
   * Cancel a watched job on the provider and deliver a canceled outcome.
   * Resolves false when the job is not being watched.
   *
   * @throws {ExternalServiceError} with operation "cancel" after delivering a
   *   failed outcome when the provider refuses the cancellation.
   */
  cancel(jobId: JobId): Promise<boolean>

  /**
   * Best-effort cancellation of a job that is not being watched, used to
   * clean up after an aborted order creation. Never rejects.
   */
  discard(jobId: JobId): Promise<void>

  isActive(jobId: JobId): boolean

  activeJobIds(): JobId[]

  /** End every polling loop without delivering terminal outcomes */
  stopAll(): void
}
