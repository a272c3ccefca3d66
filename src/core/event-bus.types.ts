/**
 * LifecycleEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {domain}.{verb} (e.g. "generation.completed").
 * Payloads are defined inline with JSDoc for each event; every event travels
 * inside an immutable EventEnvelope.
 */

import type { Artifact, Generation, JobId, Order, OrderStatus } from './types.js'

// ---------------------------------------------------------------------------
// Shared payload subtypes
// ---------------------------------------------------------------------------

/** Why a generation ended in failure */
export type FailureReason = 'provider' | 'transport' | 'timeout' | 'cancel'

/** Which component published an event */
export type EventOrigin = 'poller' | 'orchestrator'

/** Entity type an event is about */
export type SubjectType = 'order' | 'generation'

// ---------------------------------------------------------------------------
// LifecycleEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events published on the lifecycle event bus.
 * Use `EventKind` (keyof LifecycleEvents) to constrain event keys.
 */
export interface LifecycleEvents {
  // -------------------------------------------------------------------------
  // Order events (always published by the orchestrator)
  // -------------------------------------------------------------------------

  /** An order was persisted with status PENDING */
  'order.created': { order: Order }

  /** An order moved between non-terminal statuses */
  'order.status_changed': { order: Order; previousStatus: OrderStatus }

  /** Every generation of the order is terminal and at least one completed */
  'order.fulfilled': { order: Order; generations: readonly Generation[] }

  /** The order failed, either during creation or because its generations failed */
  'order.failed': { order: Order; error: string }

  /** The order was canceled */
  'order.canceled': { order: Order }

  // -------------------------------------------------------------------------
  // Generation events
  // -------------------------------------------------------------------------

  /** The poller began watching a job */
  'generation.started': { jobId: JobId }

  /** The provider reported a non-terminal status */
  'generation.progress': { jobId: JobId; providerStatus: string; attempt: number }

  /**
   * The job succeeded. Published once per job: by the orchestrator, with the
   * persisted generation and its artifacts, when it owns the job; by the
   * poller, with the normalized outputs only, otherwise.
   */
  'generation.completed': {
    jobId: JobId
    outputs: readonly string[]
    /** Metadata the provider returned alongside the output */
    metadata?: Record<string, unknown>
    generation?: Generation
    artifacts?: readonly Artifact[]
  }

  /** The job failed, timed out, or could not be queried or canceled */
  'generation.failed': {
    jobId: JobId
    error: string
    reason: FailureReason
    generation?: Generation
  }

  /** The job was canceled */
  'generation.canceled': { jobId: JobId; generation?: Generation }
}

/** Every event kind the bus understands */
export type EventKind = keyof LifecycleEvents

export const ORDER_EVENT_KINDS = [
  'order.created',
  'order.status_changed',
  'order.fulfilled',
  'order.failed',
  'order.canceled',
] as const satisfies readonly EventKind[]

export const GENERATION_EVENT_KINDS = [
  'generation.started',
  'generation.progress',
  'generation.completed',
  'generation.failed',
  'generation.canceled',
] as const satisfies readonly EventKind[]

export const EVENT_KINDS: readonly EventKind[] = [...ORDER_EVENT_KINDS, ...GENERATION_EVENT_KINDS]

// ---------------------------------------------------------------------------
// Envelope
// ---------------------------------------------------------------------------

/** Immutable envelope carrying one event */
export interface EventEnvelope<K extends EventKind> {
  readonly kind: K
  readonly subjectId: string
  readonly subjectType: SubjectType
  readonly timestamp: Date
  readonly origin: EventOrigin
  readonly payload: LifecycleEvents[K]
}

/** Handler for a single event kind */
export type EventHandler<K extends EventKind> = (event: EventEnvelope<K>) => void

/**
 * Build a frozen envelope for `kind`. The payload is frozen all the way down,
 * so no subscriber can change what later subscribers see.
 *
 * @example
 * const event = createEvent('order.created', order.id, { order }, 'orchestrator')
 */
export function createEvent<K extends EventKind>(
  kind: K,
  subjectId: string,
  payload: LifecycleEvents[K],
  origin: EventOrigin,
): EventEnvelope<K> {
  const envelope: EventEnvelope<K> = {
    kind,
    subjectId,
    subjectType: subjectTypeOf(kind),
    timestamp: new Date(),
    origin,
    payload,
  }
  freezeDeep(envelope)
  return envelope
}

function freezeDeep(value: unknown): void {
  if (typeof value !== 'object' || value === null || value instanceof Date || Object.isFrozen(value)) return
  Object.freeze(value)
  for (const child of Object.values(value)) {
    freezeDeep(child)
  }
}

function subjectTypeOf(kind: EventKind): SubjectType {
  return kind.startsWith('order.') ? 'order' : 'generation'
}
