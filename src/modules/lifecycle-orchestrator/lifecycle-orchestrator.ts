/**
 * LifecycleOrchestrator — interface and supporting types.
 *
 * Sequences Order → Generation → Artifact creation, keeps persisted state in
 * step with poller events and decides when an Order is finished.
 */

import type { BaseService } from '../../core/di.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { JobId, Order, OrderId, Parameters } from '../../core/types.js'
import type { ArtifactMaterializer } from '../artifacts/artifact-materializer.js'
import type { ArtifactStore, GenerationStore, OrderStore } from '../persistence/persistence-gateway.js'
import type { PredictionPoller } from '../prediction-poller/prediction-poller.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface LifecycleOrchestratorOptions {
  eventBus: TypedEventBus
  poller: PredictionPoller
  /** Required by createOrder and addGeneration */
  orders?: OrderStore
  /** Required by createOrder, addGeneration and every event reaction */
  generations?: GenerationStore
  /** Without it, outputs of completed generations are not recorded */
  artifacts?: ArtifactStore
  /** Defaults to the reference materializer (output URL as file reference) */
  materializer?: ArtifactMaterializer
}

export interface CreateOrderResult {
  /** The order as of the end of creation (status PROCESSING) */
  order: Order
  jobId: JobId
}

// ---------------------------------------------------------------------------
// LifecycleOrchestrator interface
// ---------------------------------------------------------------------------

export interface LifecycleOrchestrator extends BaseService {
  /**
   * Persist an order, start its first generation and begin watching the job.
   *
   * @throws {ConfigurationError} when the order or generation store is missing.
   * @throws {OrderCreationError} naming the step that failed. Anything persisted
   *   before the failure is marked FAILED and order.failed is published. An
   *   order canceled while its job was being created stays CANCELED; the job
   *   is discarded and the error names the "mark-processing" step.
   */
  createOrder(model: string, prompt: string, parameters: Parameters, projectId?: string | null): Promise<CreateOrderResult>

  /**
   * Start another generation under an active order. Overrides are merged over
   * the order's base parameters.
   *
   * @throws {InvalidTransitionError} when the order is already terminal.
   */
  addGeneration(orderId: OrderId, parameterOverrides?: Parameters): Promise<JobId>

  /**
   * Cancel a tracked generation through the poller. Resolves false for job ids
   * this orchestrator is not tracking.
   */
  cancelGeneration(jobId: JobId): Promise<boolean>

  /**
   * Cancel every tracked generation of an order; an order with nothing in
   * flight is marked CANCELED directly. Resolves with the number of
   * generations canceled.
   *
   * @throws {InvalidTransitionError} when the order is already terminal.
   */
  cancelOrder(orderId: OrderId): Promise<number>

  /** Job ids whose terminal event has not been handled yet */
  trackedJobIds(): JobId[]

  /** Resolves once no watched job and no event reaction is in flight */
  whenIdle(): Promise<void>
}
