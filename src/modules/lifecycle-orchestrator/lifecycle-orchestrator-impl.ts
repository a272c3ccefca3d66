/**
 * LifecycleOrchestratorImpl — concrete implementation of LifecycleOrchestrator.
 *
 * Owns the poller's outcome sink and listens to its progress events (origin
 * "poller"), and turns them into persisted state: artifacts, generation
 * statuses and, once every generation of an order is terminal, the order's
 * final status. It is the only publisher of terminal generation events for the
 * jobs it tracks. Everything that changes one order's status (event
 * reactions, the PROCESSING step of createOrder, cancelOrder) runs through a
 * KeyedSerialQueue, so an order never moves backwards and is finalized once.
 *
 * Tracking: a job id is tracked from just before its poller starts until its
 * terminal outcome arrives. Outcomes for untracked ids (jobs watched by someone
 * else) are published as they are; progress for untracked ids is ignored.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { createEvent } from '../../core/event-bus.types.js'
import type { EventEnvelope } from '../../core/event-bus.types.js'
import {
  ConfigurationError,
  InvalidTransitionError,
  JobAlreadyActiveError,
  OrderCreationError,
  PersistenceError,
  toErrorMessage,
} from '../../core/errors.js'
import type { OrderCreationStep } from '../../core/errors.js'
import {
  canCancelOrder,
  canTransitionGeneration,
  canTransitionOrder,
  isOrderActive,
  isOrderTerminal,
} from '../../core/status-rules.js'
import type {
  Artifact,
  Generation,
  GenerationStatus,
  JobId,
  Order,
  OrderId,
  OrderStatus,
  Parameters,
} from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { createReferenceMaterializer } from '../artifacts/artifact-materializer.js'
import type { ArtifactMaterializer } from '../artifacts/artifact-materializer.js'
import type { ArtifactStore, GenerationStore, OrderStore } from '../persistence/persistence-gateway.js'
import { publishOutcome } from '../prediction-poller/job-outcome.js'
import type { JobOutcome, JobOutcomeSink } from '../prediction-poller/job-outcome.js'
import type { PredictionPoller } from '../prediction-poller/prediction-poller.js'
import { KeyedSerialQueue } from './keyed-serial-queue.js'
import type { CreateOrderResult, LifecycleOrchestrator, LifecycleOrchestratorOptions } from './lifecycle-orchestrator.js'
import { deriveOrderStatus, summarizeFailure } from './order-status.js'

const logger = createLogger('lifecycle-orchestrator')

interface RequiredStores {
  orders: OrderStore
  generations: GenerationStore
}

// ---------------------------------------------------------------------------
// LifecycleOrchestratorImpl
// ---------------------------------------------------------------------------

export class LifecycleOrchestratorImpl implements LifecycleOrchestrator {
  private readonly _eventBus: TypedEventBus
  private readonly _poller: PredictionPoller
  private readonly _orders: OrderStore | undefined
  private readonly _generations: GenerationStore | undefined
  private readonly _artifacts: ArtifactStore | undefined
  private readonly _materializer: ArtifactMaterializer

  /** jobId → owning orderId, until the job's terminal event is handled */
  private readonly _tracked: Map<JobId, OrderId> = new Map()
  /** Jobs already moved to IN_PROGRESS */
  private readonly _inProgress: Set<JobId> = new Set()
  /** Watch promises and queued reactions, awaited by whenIdle() */
  private readonly _pending: Set<Promise<void>> = new Set()
  private readonly _queue = new KeyedSerialQueue<OrderId>()

  // Bound handlers for clean unsubscription
  private readonly _onProgress: (event: EventEnvelope<'generation.progress'>) => void
  private readonly _onOutcome: JobOutcomeSink

  constructor(options: LifecycleOrchestratorOptions) {
    this._eventBus = options.eventBus
    this._poller = options.poller
    this._orders = options.orders
    this._generations = options.generations
    this._artifacts = options.artifacts
    this._materializer = options.materializer ?? createReferenceMaterializer()

    this._onProgress = (event) => {
      if (event.origin !== 'poller') return
      const { jobId, providerStatus } = event.payload
      if (providerStatus !== 'processing' || this._inProgress.has(jobId)) return
      const orderId = this._tracked.get(jobId)
      if (orderId === undefined) return
      this._inProgress.add(jobId)
      this._schedule(orderId, jobId, () => this._markInProgress(jobId))
    }

    this._onOutcome = (outcome) => {
      const orderId = this._untrack(outcome.jobId, outcome.kind)
      if (orderId === undefined) {
        publishOutcome(this._eventBus, outcome, 'poller')
        return
      }
      // The reaction runs later; keep the outputs as delivered
      const delivered: JobOutcome =
        outcome.kind === 'completed' ? { ...outcome, outputs: Object.freeze([...outcome.outputs]) } : outcome
      this._schedule(orderId, outcome.jobId, () => this._handleOutcome(orderId, delivered))
    }
  }

  // ---------------------------------------------------------------------------
  // BaseService lifecycle
  // ---------------------------------------------------------------------------

  async initialize(): Promise<void> {
    logger.info('LifecycleOrchestrator.initialize()')
    this._eventBus.subscribe('generation.progress', this._onProgress)
    this._poller.setOutcomeSink(this._onOutcome)
  }

  async shutdown(): Promise<void> {
    logger.info({ tracked: this._tracked.size }, 'LifecycleOrchestrator.shutdown()')
    this._eventBus.unsubscribe('generation.progress', this._onProgress)
    this._poller.stopAll()
    await this.whenIdle()
    this._poller.setOutcomeSink(null)
    this._tracked.clear()
    this._inProgress.clear()
  }

  // ---------------------------------------------------------------------------
  // Order creation
  // ---------------------------------------------------------------------------

  async createOrder(
    model: string,
    prompt: string,
    parameters: Parameters,
    projectId: string | null = null,
  ): Promise<CreateOrderResult> {
    const { orders, generations } = this._requireStores('createOrder')

    let order: Order
    try {
      order = await orders.createOrder({ model, prompt, baseParameters: { ...parameters }, projectId, status: 'PENDING' })
    } catch (err) {
      logger.error({ err, model }, 'Failed to persist order')
      throw new OrderCreationError('persist-order', err, { model })
    }
    this._eventBus.publish(createEvent('order.created', order.id, { order }, 'orchestrator'))
    logger.info({ orderId: order.id, model }, 'Order created')

    const orderId = order.id
    let step: OrderCreationStep = 'create-job'
    let jobId: JobId | null = null
    let generationPersisted = false
    try {
      const createdJobId = await this._poller.createJob(model, parameters)
      jobId = createdJobId

      step = 'persist-generation'
      await generations.createGeneration({ jobId: createdJobId, orderId, model, prompt, parameters, status: 'STARTING' })
      generationPersisted = true

      // The order may have been canceled while the job was being created
      step = 'mark-processing'
      const processing = await this._queue.run(orderId, async () => {
        const updated = await this._moveOrder(orders, orderId, 'PROCESSING')
        step = 'watch-job'
        this._watch(orderId, createdJobId)
        return updated
      })

      return { order: processing, jobId: createdJobId }
    } catch (err) {
      logger.error({ err, orderId: order.id, jobId, step }, 'Order creation failed')
      await this._abortCreation(order, jobId, generationPersisted, `Order creation failed at step "${step}": ${toErrorMessage(err)}`)
      throw new OrderCreationError(step, err, { orderId: order.id, jobId })
    }
  }

  async addGeneration(orderId: OrderId, parameterOverrides: Parameters = {}): Promise<JobId> {
    const { orders, generations } = this._requireStores('addGeneration')

    return this._queue.run(orderId, async () => {
      const order = await orders.getOrder(orderId)
      if (order === null) {
        throw new PersistenceError('getOrder', `Order ${orderId} not found`, { orderId })
      }
      if (!isOrderActive(order)) {
        throw new InvalidTransitionError('order', orderId, order.status, 'PROCESSING')
      }

      const parameters: Parameters = { ...order.baseParameters, ...parameterOverrides }
      const jobId = await this._poller.createJob(order.model, parameters)
      try {
        await generations.createGeneration({
          jobId,
          orderId,
          model: order.model,
          prompt: order.prompt,
          parameters,
          status: 'STARTING',
        })
      } catch (err) {
        await this._poller.discard(jobId)
        throw err
      }

      this._watch(orderId, jobId)
      logger.info({ orderId, jobId }, 'Generation added to order')
      return jobId
    })
  }

  // ---------------------------------------------------------------------------
  // Cancellation
  // ---------------------------------------------------------------------------

  async cancelGeneration(jobId: JobId): Promise<boolean> {
    if (!this._tracked.has(jobId)) {
      logger.debug({ jobId }, 'cancelGeneration: job is not tracked')
      return false
    }
    return this._poller.cancel(jobId)
  }

  async cancelOrder(orderId: OrderId): Promise<number> {
    const { orders } = this._requireStores('cancelOrder')
    return this._queue.run(orderId, () => this._cancelOrder(orders, orderId))
  }

  private async _cancelOrder(orders: OrderStore, orderId: OrderId): Promise<number> {
    const order = await orders.getOrder(orderId)
    if (order === null) {
      throw new PersistenceError('getOrder', `Order ${orderId} not found`, { orderId })
    }
    if (!canCancelOrder(order)) {
      throw new InvalidTransitionError('order', orderId, order.status, 'CANCELED')
    }

    const jobIds = [...this._tracked].filter(([, owner]) => owner === orderId).map(([jobId]) => jobId)
    if (jobIds.length === 0) {
      const canceled = await this._moveOrder(orders, orderId, 'CANCELED')
      logger.info({ orderId }, 'Order canceled')
      this._eventBus.publish(createEvent('order.canceled', orderId, { order: canceled }, 'orchestrator'))
      return 0
    }

    let canceled = 0
    const errors: unknown[] = []
    for (const jobId of jobIds) {
      try {
        if (await this._poller.cancel(jobId)) canceled += 1
      } catch (err) {
        errors.push(err)
      }
    }
    if (errors.length > 0) {
      throw new AggregateError(errors, `Failed to cancel ${String(errors.length)} generation(s) of order ${orderId}`)
    }
    logger.info({ orderId, canceled }, 'Order cancellation requested')
    return canceled
  }

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------

  trackedJobIds(): JobId[] {
    return [...this._tracked.keys()]
  }

  async whenIdle(): Promise<void> {
    while (this._pending.size > 0) {
      await Promise.allSettled([...this._pending])
    }
  }

  // ---------------------------------------------------------------------------
  // Tracking and scheduling
  // ---------------------------------------------------------------------------

  private _watch(orderId: OrderId, jobId: JobId): void {
    if (this._poller.isActive(jobId)) {
      throw new JobAlreadyActiveError(jobId)
    }
    this._tracked.set(jobId, orderId)

    const watching: Promise<void> = this._poller
      .watch(jobId)
      .then(
        (outcome) => {
          logger.debug({ orderId, jobId, outcome }, 'Stopped watching job')
        },
        (err: unknown) => {
          this._tracked.delete(jobId)
          logger.error({ err, orderId, jobId }, 'Failed to watch job')
        },
      )
      .then(() => {
        this._pending.delete(watching)
      })
    this._pending.add(watching)
  }

  private _untrack(jobId: JobId, kind: string): OrderId | undefined {
    const orderId = this._tracked.get(jobId)
    if (orderId === undefined) {
      logger.debug({ jobId, kind }, 'Ignoring event for untracked job')
      return undefined
    }
    this._tracked.delete(jobId)
    this._inProgress.delete(jobId)
    return orderId
  }

  private _schedule(orderId: OrderId, jobId: JobId, task: () => Promise<void>): void {
    const run: Promise<void> = this._queue
      .run(orderId, task)
      .catch((err: unknown) => {
        logger.error({ err, orderId, jobId }, 'Failed to apply generation event')
      })
      .then(() => {
        this._pending.delete(run)
      })
    this._pending.add(run)
  }

  private _requireStores(operation: string): RequiredStores {
    if (this._orders === undefined || this._generations === undefined) {
      throw new ConfigurationError(`${operation} requires both an order store and a generation store`, { operation })
    }
    return { orders: this._orders, generations: this._generations }
  }

  // ---------------------------------------------------------------------------
  // Order status changes (run inside the per-order queue)
  // ---------------------------------------------------------------------------

  /**
   * Re-read the order and move it to `status`. Throws InvalidTransitionError
   * when the order already moved somewhere `status` cannot follow.
   */
  private async _moveOrder(orders: OrderStore, orderId: OrderId, status: OrderStatus): Promise<Order> {
    const current = await orders.getOrder(orderId)
    if (current === null) {
      throw new PersistenceError('getOrder', `Order ${orderId} not found`, { orderId })
    }
    if (!canTransitionOrder(current.status, status)) {
      throw new InvalidTransitionError('order', orderId, current.status, status)
    }

    const updated = await orders.updateOrderStatus(orderId, status)
    if (status === 'PROCESSING') {
      this._eventBus.publish(
        createEvent('order.status_changed', orderId, { order: updated, previousStatus: current.status }, 'orchestrator'),
      )
    }
    return updated
  }

  // ---------------------------------------------------------------------------
  // Event reactions (run inside the per-order queue)
  // ---------------------------------------------------------------------------

  private async _markInProgress(jobId: JobId): Promise<void> {
    const generation = await this._settleGeneration(jobId, 'IN_PROGRESS')
    if (generation !== null) {
      logger.debug({ jobId }, 'Generation in progress')
    }
  }

  /**
   * Record a terminal outcome and publish its generation event. The event is
   * published even when recording fails; it then carries no generation.
   */
  private async _handleOutcome(orderId: OrderId, outcome: JobOutcome): Promise<void> {
    const { jobId } = outcome
    switch (outcome.kind) {
      case 'completed': {
        const recorded = await this._record(jobId, 'COMPLETED', () =>
          this._completeGeneration(jobId, outcome.outputs, outcome.metadata),
        )
        const outputs = [...outcome.outputs]
        const base = outcome.metadata === undefined ? { jobId, outputs } : { jobId, outputs, metadata: outcome.metadata }
        logger.info({ orderId, jobId, artifacts: recorded?.artifacts.length ?? 0 }, 'Generation completed')
        this._eventBus.publish(
          createEvent('generation.completed', jobId, recorded === null ? base : { ...base, ...recorded }, 'orchestrator'),
        )
        break
      }
      case 'failed': {
        const { error, reason } = outcome
        const generation = await this._record(jobId, 'FAILED', () => this._settleGeneration(jobId, 'FAILED', error))
        logger.warn({ orderId, jobId, reason, error }, 'Generation failed')
        this._eventBus.publish(
          createEvent(
            'generation.failed',
            jobId,
            generation === null ? { jobId, error, reason } : { jobId, error, reason, generation },
            'orchestrator',
          ),
        )
        break
      }
      case 'canceled': {
        const generation = await this._record(jobId, 'CANCELLED', () => this._settleGeneration(jobId, 'CANCELLED'))
        logger.info({ orderId, jobId }, 'Generation canceled')
        this._eventBus.publish(
          createEvent('generation.canceled', jobId, generation === null ? { jobId } : { jobId, generation }, 'orchestrator'),
        )
        break
      }
    }
    await this._evaluateOrder(orderId)
  }

  private async _record<T>(jobId: JobId, status: GenerationStatus, write: () => Promise<T | null>): Promise<T | null> {
    try {
      return await write()
    } catch (err) {
      logger.error({ err, jobId, status }, 'Failed to record generation outcome')
      return null
    }
  }

  private async _completeGeneration(
    jobId: JobId,
    outputs: readonly string[],
    metadata: Record<string, unknown> | undefined,
  ): Promise<{ generation: Generation; artifacts: Artifact[] } | null> {
    const store = this._generationStoreFor(jobId, 'COMPLETED')
    if (store === null) return null
    const current = await this._loadTransitionable(store, jobId, 'COMPLETED')
    if (current === null) return null

    const artifacts = await this._recordArtifacts(current, outputs)
    const generation = await store.updateGenerationStatus(jobId, 'COMPLETED', null, metadata ?? null)
    return { generation, artifacts }
  }

  /**
   * Materialize and persist one artifact per output. A failing output is
   * logged and skipped so the remaining outputs are still recorded.
   */
  private async _recordArtifacts(generation: Generation, outputs: readonly string[]): Promise<Artifact[]> {
    if (outputs.length === 0) return []
    if (this._artifacts === undefined) {
      logger.warn({ jobId: generation.id, outputs: outputs.length }, 'No artifact store configured; outputs not recorded')
      return []
    }

    const artifacts: Artifact[] = []
    for (const output of outputs) {
      try {
        const draft = await this._materializer.materialize(output, generation)
        artifacts.push(await this._artifacts.createArtifact(draft))
      } catch (err) {
        logger.error({ err, jobId: generation.id, output }, 'Failed to record artifact')
      }
    }
    return artifacts
  }

  /**
   * Move a generation to `status` when the transition is allowed.
   * Resolves null when there is no generation store, no such generation, or
   * the generation already moved past `status`.
   */
  private async _settleGeneration(
    jobId: JobId,
    status: GenerationStatus,
    error: string | null = null,
  ): Promise<Generation | null> {
    const store = this._generationStoreFor(jobId, status)
    if (store === null) return null
    const current = await this._loadTransitionable(store, jobId, status)
    if (current === null) return null
    return store.updateGenerationStatus(jobId, status, error)
  }

  private _generationStoreFor(jobId: JobId, status: GenerationStatus): GenerationStore | null {
    if (this._generations === undefined) {
      logger.warn({ jobId, status }, 'No generation store configured; status not recorded')
      return null
    }
    return this._generations
  }

  private async _loadTransitionable(
    store: GenerationStore,
    jobId: JobId,
    status: GenerationStatus,
  ): Promise<Generation | null> {
    const current = await store.getGeneration(jobId)
    if (current === null) {
      logger.warn({ jobId, status }, 'Generation not found')
      return null
    }
    if (!canTransitionGeneration(current.status, status)) {
      logger.debug({ jobId, from: current.status, to: status }, 'Skipping generation status change')
      return null
    }
    return current
  }

  /**
   * Re-check an order after one of its generations reached a terminal state,
   * and finalize it once every generation has.
   */
  private async _evaluateOrder(orderId: OrderId): Promise<void> {
    if (this._orders === undefined || this._generations === undefined) return

    const order = await this._orders.getOrder(orderId)
    if (order === null) {
      logger.debug({ orderId }, 'Order not found; nothing to evaluate')
      return
    }
    if (isOrderTerminal(order.status)) return

    const generations = await this._generations.listGenerationsByOrder(orderId)
    const next = deriveOrderStatus(generations)
    if (next === null) return
    if (!canTransitionOrder(order.status, next)) {
      logger.warn({ orderId, from: order.status, to: next }, 'Order cannot take derived status')
      return
    }

    const updated = await this._orders.updateOrderStatus(orderId, next)
    logger.info({ orderId, status: next, generations: generations.length }, 'Order finished')

    switch (next) {
      case 'FULFILLED':
        this._eventBus.publish(createEvent('order.fulfilled', orderId, { order: updated, generations }, 'orchestrator'))
        break
      case 'FAILED':
        this._eventBus.publish(
          createEvent('order.failed', orderId, { order: updated, error: summarizeFailure(generations) }, 'orchestrator'),
        )
        break
      case 'CANCELED':
        this._eventBus.publish(createEvent('order.canceled', orderId, { order: updated }, 'orchestrator'))
        break
    }
  }

  /**
   * Leave nothing half-created: discard the job, fail the generation and the
   * order, and tell subscribers. Every step is best effort, and an order that
   * was canceled in the meantime keeps its status.
   */
  private async _abortCreation(
    order: Order,
    jobId: JobId | null,
    generationPersisted: boolean,
    message: string,
  ): Promise<void> {
    if (jobId !== null) {
      await this._poller.discard(jobId)
      if (generationPersisted) {
        try {
          await this._generations?.updateGenerationStatus(jobId, 'FAILED', message)
        } catch (err) {
          logger.error({ err, jobId }, 'Failed to mark generation FAILED after aborted creation')
        }
      }
    }

    const orders = this._orders
    if (orders === undefined) return
    try {
      await this._queue.run(order.id, async () => {
        const current = await orders.getOrder(order.id)
        if (current === null || !canTransitionOrder(current.status, 'FAILED')) {
          logger.info({ orderId: order.id, status: current?.status }, 'Order left as is after aborted creation')
          return
        }
        const failed = await orders.updateOrderStatus(order.id, 'FAILED')
        this._eventBus.publish(createEvent('order.failed', order.id, { order: failed, error: message }, 'orchestrator'))
      })
    } catch (err) {
      logger.error({ err, orderId: order.id }, 'Failed to mark order FAILED after aborted creation')
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createLifecycleOrchestrator(options: LifecycleOrchestratorOptions): LifecycleOrchestrator {
  return new LifecycleOrchestratorImpl(options)
}
