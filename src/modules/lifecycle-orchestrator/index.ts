/**
 * Lifecycle Orchestrator module — barrel exports
 */

export type {
  LifecycleOrchestrator,
  LifecycleOrchestratorOptions,
  CreateOrderResult,
} from './lifecycle-orchestrator.js'
export { LifecycleOrchestratorImpl, createLifecycleOrchestrator } from './lifecycle-orchestrator-impl.js'
export { deriveOrderStatus, summarizeFailure } from './order-status.js'
export type { TerminalOrderStatus } from './order-status.js'
export { KeyedSerialQueue } from './keyed-serial-queue.js'
