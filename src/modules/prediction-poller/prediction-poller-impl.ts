/**
 * PredictionPollerImpl — concrete implementation of PredictionPoller.
 *
 * One polling loop per watched job. A loop queries the provider, reports
 * what it saw, and sleeps on an abort signal so cancel() and stopAll() end it
 * without waiting out the interval. A terminal outcome is delivered only by
 * whoever claims the job from the ActiveJobRegistry.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { createEvent } from '../../core/event-bus.types.js'
import type { FailureReason } from '../../core/event-bus.types.js'
import { ConfigurationError, ExternalServiceError, JobTimeoutError, toErrorMessage } from '../../core/errors.js'
import type { JobId, Parameters } from '../../core/types.js'
import { createDeferred, sleep } from '../../utils/helpers.js'
import type { Deferred } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { DEFAULT_POLLING } from '../config/defaults.js'
import { isTerminalJobStatus } from '../job-provider/job-status-provider.js'
import type { JobSnapshot, JobStatusProvider, TerminalJobStatus } from '../job-provider/job-status-provider.js'
import { ActiveJobRegistry } from './active-job-registry.js'
import { publishOutcome } from './job-outcome.js'
import type { JobOutcome, JobOutcomeSink } from './job-outcome.js'
import { normalizeOutput } from './output-normalizer.js'
import type { PollOutcome, PredictionPoller } from './prediction-poller.js'

const logger = createLogger('prediction-poller')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PredictionPollerOptions {
  /** Wait between two queries for the same job (default 1000) */
  pollIntervalMs?: number
  /** Non-terminal responses tolerated before the job times out (default 60) */
  maxAttempts?: number
}

// ---------------------------------------------------------------------------
// Internal tracking type
// ---------------------------------------------------------------------------

interface ActiveJobEntry {
  jobId: JobId
  /** Non-terminal responses seen so far */
  attempts: number
  startedAt: Date
  abort: AbortController
  done: Deferred<PollOutcome>
}

// ---------------------------------------------------------------------------
// PredictionPollerImpl
// ---------------------------------------------------------------------------

export class PredictionPollerImpl implements PredictionPoller {
  private readonly _eventBus: TypedEventBus
  private readonly _provider: JobStatusProvider
  private readonly _pollIntervalMs: number
  private readonly _maxAttempts: number
  private readonly _registry = new ActiveJobRegistry<ActiveJobEntry>()
  private _sink: JobOutcomeSink | null = null

  constructor(eventBus: TypedEventBus, provider: JobStatusProvider, options: PredictionPollerOptions = {}) {
    this._eventBus = eventBus
    this._provider = provider
    this._pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLLING.interval_ms
    this._maxAttempts = options.maxAttempts ?? DEFAULT_POLLING.max_attempts
  }

  // ---------------------------------------------------------------------------
  // BaseService lifecycle
  // ---------------------------------------------------------------------------

  async initialize(): Promise<void> {
    logger.info(
      { pollIntervalMs: this._pollIntervalMs, maxAttempts: this._maxAttempts },
      'PredictionPoller.initialize()',
    )
  }

  async shutdown(): Promise<void> {
    logger.info({ active: this._registry.size }, 'PredictionPoller.shutdown()')
    this.stopAll()
  }

  // ---------------------------------------------------------------------------
  // PredictionPoller interface
  // ---------------------------------------------------------------------------

  setOutcomeSink(sink: JobOutcomeSink | null): void {
    if (sink !== null && this._sink !== null && this._sink !== sink) {
      throw new ConfigurationError('PredictionPoller already has an outcome sink attached')
    }
    this._sink = sink
  }

  async createJob(model: string, params: Parameters): Promise<JobId> {
    let jobId: JobId
    try {
      jobId = await this._provider.createJob(model, params)
    } catch (err) {
      logger.error({ err, model }, 'Failed to create prediction')
      throw new ExternalServiceError('create', `Failed to create prediction: ${toErrorMessage(err)}`, { model })
    }
    logger.debug({ jobId, model }, 'Prediction created')
    return jobId
  }

  async watch(jobId: JobId): Promise<PollOutcome> {
    const entry: ActiveJobEntry = {
      jobId,
      attempts: 0,
      startedAt: new Date(),
      abort: new AbortController(),
      done: createDeferred<PollOutcome>(),
    }
    this._registry.add(jobId, entry)

    this._eventBus.publish(createEvent('generation.started', jobId, { jobId }, 'poller'))
    logger.debug({ jobId }, 'Polling started')

    this._runLoop(entry).catch((err: unknown) => {
      // The loop handles provider failures itself; anything here is a bug
      logger.error({ err, jobId }, 'Polling loop crashed')
      this._fail(entry, toErrorMessage(err), 'transport', 'failed')
    })

    return entry.done.promise
  }

  async start(model: string, params: Parameters): Promise<JobId> {
    const jobId = await this.createJob(model, params)
    this.watch(jobId).catch((err: unknown) => {
      logger.error({ err, jobId }, 'Failed to watch prediction')
    })
    return jobId
  }

  async cancel(jobId: JobId): Promise<boolean> {
    const entry = this._registry.claim(jobId)
    if (entry === undefined) {
      logger.debug({ jobId }, 'cancel: job is not being polled')
      return false
    }
    entry.abort.abort()

    try {
      await this._provider.cancelJob(jobId)
    } catch (err) {
      const error = new ExternalServiceError('cancel', `Failed to cancel prediction: ${toErrorMessage(err)}`, {
        jobId,
      })
      logger.error({ err, jobId }, error.message)
      this._deliver({ kind: 'failed', jobId, error: error.message, reason: 'cancel' })
      entry.done.resolve('failed')
      throw error
    }

    logger.info({ jobId }, 'Prediction canceled')
    this._deliver({ kind: 'canceled', jobId })
    entry.done.resolve('canceled')
    return true
  }

  async discard(jobId: JobId): Promise<void> {
    try {
      await this._provider.cancelJob(jobId)
      logger.debug({ jobId }, 'Discarded unwatched prediction')
    } catch (err) {
      logger.warn({ err, jobId }, 'Failed to discard prediction')
    }
  }

  isActive(jobId: JobId): boolean {
    return this._registry.has(jobId)
  }

  activeJobIds(): JobId[] {
    return this._registry.ids()
  }

  stopAll(): void {
    const entries = this._registry.claimAll()
    for (const entry of entries) {
      entry.abort.abort()
      entry.done.resolve('stopped')
    }
    if (entries.length > 0) {
      logger.info({ count: entries.length }, 'Stopped all polling loops')
    }
  }

  // ---------------------------------------------------------------------------
  // Polling loop
  // ---------------------------------------------------------------------------

  private async _runLoop(entry: ActiveJobEntry): Promise<void> {
    const { jobId } = entry

    for (;;) {
      let snapshot: JobSnapshot
      try {
        snapshot = await this._provider.getJob(jobId)
      } catch (err) {
        const error = new ExternalServiceError('get', toErrorMessage(err), { jobId })
        logger.warn({ err, jobId, attempts: entry.attempts }, 'Prediction status query failed')
        this._fail(entry, error.message, 'transport', 'failed')
        return
      }

      // Canceled or stopped while the query was in flight
      if (entry.abort.signal.aborted) return

      if (isTerminalJobStatus(snapshot.status)) {
        this._settle(entry, snapshot, snapshot.status)
        return
      }

      entry.attempts += 1
      this._eventBus.publish(
        createEvent(
          'generation.progress',
          jobId,
          { jobId, providerStatus: snapshot.status, attempt: entry.attempts },
          'poller',
        ),
      )

      if (entry.attempts >= this._maxAttempts) {
        const timeout = new JobTimeoutError(jobId, entry.attempts)
        logger.warn({ jobId, attempts: entry.attempts }, timeout.message)
        this._fail(entry, timeout.message, 'timeout', 'timed_out')
        return
      }

      const elapsed = await sleep(this._pollIntervalMs, entry.abort.signal)
      if (!elapsed) return
    }
  }

  // ---------------------------------------------------------------------------
  // Terminal transitions
  // ---------------------------------------------------------------------------

  private _settle(entry: ActiveJobEntry, snapshot: JobSnapshot, status: TerminalJobStatus): void {
    switch (status) {
      case 'succeeded':
        this._complete(entry, snapshot)
        break
      case 'failed':
        this._fail(entry, providerError(snapshot), 'provider', 'failed')
        break
      case 'canceled':
        if (this._registry.claim(entry.jobId) !== undefined) {
          logger.info({ jobId: entry.jobId }, 'Prediction canceled by provider')
          this._deliver({ kind: 'canceled', jobId: entry.jobId })
          entry.done.resolve('canceled')
        }
        break
    }
  }

  private _complete(entry: ActiveJobEntry, snapshot: JobSnapshot): void {
    if (this._registry.claim(entry.jobId) === undefined) return

    const outputs: readonly string[] = Object.freeze(normalizeOutput(snapshot.output))
    logger.info(
      { jobId: entry.jobId, outputs: outputs.length, attempts: entry.attempts, durationMs: Date.now() - entry.startedAt.getTime() },
      'Prediction succeeded',
    )
    this._deliver(
      snapshot.metadata === undefined
        ? { kind: 'completed', jobId: entry.jobId, outputs }
        : { kind: 'completed', jobId: entry.jobId, outputs, metadata: snapshot.metadata },
    )
    entry.done.resolve('succeeded')
  }

  private _fail(entry: ActiveJobEntry, error: string, reason: FailureReason, outcome: PollOutcome): void {
    if (this._registry.claim(entry.jobId) === undefined) return

    logger.info({ jobId: entry.jobId, reason, error }, 'Prediction failed')
    this._deliver({ kind: 'failed', jobId: entry.jobId, error, reason })
    entry.done.resolve(outcome)
  }

  /** Hand the outcome to the sink, or publish it when there is none or the sink throws */
  private _deliver(outcome: JobOutcome): void {
    const sink = this._sink
    if (sink !== null) {
      try {
        sink(outcome)
        return
      } catch (err) {
        logger.error({ err, jobId: outcome.jobId, kind: outcome.kind }, 'Outcome sink failed; publishing outcome directly')
      }
    }
    publishOutcome(this._eventBus, outcome, 'poller')
  }
}

function providerError(snapshot: JobSnapshot): string {
  const error = snapshot.error
  return typeof error === 'string' && error.trim().length > 0 ? error : 'Unknown error'
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createPredictionPoller(
  eventBus: TypedEventBus,
  provider: JobStatusProvider,
  options: PredictionPollerOptions = {},
): PredictionPoller {
  return new PredictionPollerImpl(eventBus, provider, options)
}
