/**
 * generation-lifecycle — main module exports
 * Public API surface for embedding applications
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Status rules
export * from './core/status-rules.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'

// Composition root
export { createLifecycle } from './core/lifecycle-impl.js'
export type { Lifecycle, LifecycleOptions } from './core/lifecycle.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export { createEventBus, TypedEventBusImpl } from './core/event-bus.js'
export type {
  LifecycleEvents,
  EventKind,
  EventEnvelope,
  EventHandler,
  EventOrigin,
  SubjectType,
  FailureReason,
} from './core/event-bus.types.js'
export { createEvent, EVENT_KINDS, ORDER_EVENT_KINDS, GENERATION_EVENT_KINDS } from './core/event-bus.types.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Configuration
export * from './modules/config/index.js'

// Collaborator contracts
export * from './modules/job-provider/index.js'
export * from './modules/persistence/index.js'
export * from './modules/artifacts/index.js'

// Coordination services
export * from './modules/prediction-poller/index.js'
export * from './modules/lifecycle-orchestrator/index.js'
