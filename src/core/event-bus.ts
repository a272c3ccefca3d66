/**
 * TypedEventBus — typed internal pub/sub for decoupled module communication.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS — handlers run on the publisher's call stack
 *    before publish() returns.
 *  - A throwing handler never stops delivery to the remaining handlers and
 *    never reaches the publisher; the failure is logged as a SubscriberError.
 *  - Handlers for one kind are kept in a Set: subscribing the same handler
 *    twice delivers once, and delivery follows registration order.
 *  - Zero circular dependencies: EventBus cannot depend on any module.
 */

import { SubscriberError } from './errors.js'
import type { EventEnvelope, EventHandler, EventKind } from './event-bus.types.js'
import { EVENT_KINDS } from './event-bus.types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('event-bus')

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event kinds and payload types are enforced by the `LifecycleEvents` map.
 */
export interface TypedEventBus {
  /**
   * Deliver an event to every handler currently registered for `event.kind`.
   * Never throws because of a subscriber.
   */
  publish<K extends EventKind>(event: EventEnvelope<K>): void

  /**
   * Register a handler for one event kind. Registering the same handler again
   * for the same kind is a no-op.
   */
  subscribe<K extends EventKind>(kind: K, handler: EventHandler<K>): void

  /**
   * Remove a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  unsubscribe<K extends EventKind>(kind: K, handler: EventHandler<K>): void

  /** Drop every handler for `kind`, or for all kinds when omitted */
  clearSubscribers(kind?: EventKind): void

  /** Number of handlers registered for `kind` */
  subscriberCount(kind: EventKind): number
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

type HandlerRegistry = { [K in EventKind]: Set<EventHandler<K>> }

function createRegistry(): HandlerRegistry {
  return {
    'order.created': new Set(),
    'order.status_changed': new Set(),
    'order.fulfilled': new Set(),
    'order.failed': new Set(),
    'order.canceled': new Set(),
    'generation.started': new Set(),
    'generation.progress': new Set(),
    'generation.completed': new Set(),
    'generation.failed': new Set(),
    'generation.canceled': new Set(),
  }
}

/**
 * Concrete implementation of TypedEventBus backed by one handler Set per kind.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.subscribe('generation.completed', (event) => {
 *   console.log(`Job ${event.payload.jobId} produced ${event.payload.outputs.length} outputs`)
 * })
 * bus.publish(createEvent('generation.completed', 'job-1', { jobId: 'job-1', outputs: [] }, 'poller'))
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _handlers: HandlerRegistry = createRegistry()

  publish<K extends EventKind>(event: EventEnvelope<K>): void {
    logger.debug(
      { kind: event.kind, subjectId: event.subjectId, subjectType: event.subjectType, origin: event.origin },
      'Publishing event',
    )

    // Snapshot so handlers may subscribe/unsubscribe while we deliver
    const handlers = [...this._handlers[event.kind]]
    for (const handler of handlers) {
      try {
        handler(event)
      } catch (err) {
        const failure = new SubscriberError(event.kind, handlerName(handler), err)
        logger.error(
          { err, kind: event.kind, handler: handlerName(handler), subjectId: event.subjectId },
          failure.message,
        )
      }
    }
  }

  subscribe<K extends EventKind>(kind: K, handler: EventHandler<K>): void {
    this._handlers[kind].add(handler)
    logger.debug({ kind, handler: handlerName(handler) }, 'Added event subscriber')
  }

  unsubscribe<K extends EventKind>(kind: K, handler: EventHandler<K>): void {
    if (this._handlers[kind].delete(handler)) {
      logger.debug({ kind, handler: handlerName(handler) }, 'Removed event subscriber')
    }
  }

  clearSubscribers(kind?: EventKind): void {
    const kinds = kind === undefined ? EVENT_KINDS : [kind]
    for (const k of kinds) {
      this._handlers[k].clear()
    }
  }

  subscriberCount(kind: EventKind): number {
    return this._handlers[kind].size
  }
}

function handlerName(handler: { name: string }): string {
  return handler.name.length > 0 ? handler.name : '<anonymous>'
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus()
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
