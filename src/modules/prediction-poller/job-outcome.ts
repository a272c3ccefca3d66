/**
 * JobOutcome — the terminal result of one watched job.
 *
 * The poller hands each outcome to its attached sink, or publishes it on the
 * bus when none is attached. Either way exactly one terminal generation event
 * reaches bus subscribers per job.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { createEvent } from '../../core/event-bus.types.js'
import type { EventOrigin, FailureReason } from '../../core/event-bus.types.js'
import type { JobId } from '../../core/types.js'

export type JobOutcome =
  | { kind: 'completed'; jobId: JobId; outputs: readonly string[]; metadata?: Record<string, unknown> }
  | { kind: 'failed'; jobId: JobId; error: string; reason: FailureReason }
  | { kind: 'canceled'; jobId: JobId }

/** Receives terminal outcomes synchronously, on the poller's call stack */
export type JobOutcomeSink = (outcome: JobOutcome) => void

/** Publish an outcome as its plain generation event */
export function publishOutcome(eventBus: TypedEventBus, outcome: JobOutcome, origin: EventOrigin): void {
  const { jobId } = outcome
  switch (outcome.kind) {
    case 'completed':
      eventBus.publish(
        createEvent(
          'generation.completed',
          jobId,
          outcome.metadata === undefined
            ? { jobId, outputs: outcome.outputs }
            : { jobId, outputs: outcome.outputs, metadata: outcome.metadata },
          origin,
        ),
      )
      break
    case 'failed':
      eventBus.publish(createEvent('generation.failed', jobId, { jobId, error: outcome.error, reason: outcome.reason }, origin))
      break
    case 'canceled':
      eventBus.publish(createEvent('generation.canceled', jobId, { jobId }, origin))
      break
  }
}
