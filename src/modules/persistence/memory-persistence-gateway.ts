/**
 * MemoryPersistenceGateway — in-process PersistenceGateway.
 *
 * Keeps orders, generations and artifacts in Maps and hands out copies, so
 * callers can never mutate stored records behind the gateway's back. Backs the
 * test suite and embedders that do not need durable storage.
 */

import { PersistenceError } from '../../core/errors.js'
import type {
  Artifact,
  ArtifactId,
  ArtifactPatch,
  Generation,
  GenerationStatus,
  JobId,
  Order,
  OrderId,
  OrderStatus,
} from '../../core/types.js'
import type { NewArtifact, NewGeneration, NewOrder, PersistenceGateway } from './persistence-gateway.js'

export class MemoryPersistenceGateway implements PersistenceGateway {
  private readonly _orders = new Map<OrderId, Order>()
  private readonly _generations = new Map<JobId, Generation>()
  private readonly _artifacts = new Map<ArtifactId, Artifact>()
  private _orderSeq = 0
  private _artifactSeq = 0

  // -------------------------------------------------------------------------
  // Orders
  // -------------------------------------------------------------------------

  async createOrder(input: NewOrder): Promise<Order> {
    this._orderSeq += 1
    const order: Order = {
      id: `ord_${String(this._orderSeq)}`,
      model: input.model,
      prompt: input.prompt,
      baseParameters: { ...input.baseParameters },
      status: input.status,
      projectId: input.projectId,
      createdAt: new Date(),
    }
    this._orders.set(order.id, order)
    return structuredClone(order)
  }

  async getOrder(orderId: OrderId): Promise<Order | null> {
    const order = this._orders.get(orderId)
    return order === undefined ? null : structuredClone(order)
  }

  async updateOrderStatus(orderId: OrderId, status: OrderStatus): Promise<Order> {
    const order = this._requireOrder('updateOrderStatus', orderId)
    order.status = status
    return structuredClone(order)
  }

  // -------------------------------------------------------------------------
  // Generations
  // -------------------------------------------------------------------------

  async createGeneration(input: NewGeneration): Promise<Generation> {
    if (this._generations.has(input.jobId)) {
      throw new PersistenceError('createGeneration', `Generation ${input.jobId} already exists`, {
        jobId: input.jobId,
      })
    }
    this._requireOrder('createGeneration', input.orderId)

    const generation: Generation = {
      id: input.jobId,
      orderId: input.orderId,
      model: input.model,
      prompt: input.prompt,
      parameters: { ...input.parameters },
      status: input.status,
      error: null,
      returnParameters: null,
      createdAt: new Date(),
    }
    this._generations.set(generation.id, generation)
    return structuredClone(generation)
  }

  async getGeneration(jobId: JobId): Promise<Generation | null> {
    const generation = this._generations.get(jobId)
    return generation === undefined ? null : structuredClone(generation)
  }

  async updateGenerationStatus(
    jobId: JobId,
    status: GenerationStatus,
    error: string | null = null,
    returnParameters: Record<string, unknown> | null = null,
  ): Promise<Generation> {
    const generation = this._generations.get(jobId)
    if (generation === undefined) {
      throw new PersistenceError('updateGenerationStatus', `Generation ${jobId} not found`, { jobId })
    }
    generation.status = status
    if (error !== null) generation.error = error
    if (returnParameters !== null) generation.returnParameters = { ...returnParameters }
    return structuredClone(generation)
  }

  async listGenerationsByOrder(orderId: OrderId): Promise<Generation[]> {
    return [...this._generations.values()]
      .filter((generation) => generation.orderId === orderId)
      .map((generation) => structuredClone(generation))
  }

  // -------------------------------------------------------------------------
  // Artifacts
  // -------------------------------------------------------------------------

  async createArtifact(input: NewArtifact): Promise<Artifact> {
    if (!this._generations.has(input.generationId)) {
      throw new PersistenceError('createArtifact', `Generation ${input.generationId} not found`, {
        generationId: input.generationId,
      })
    }

    this._artifactSeq += 1
    const artifact: Artifact = {
      id: `art_${String(this._artifactSeq)}`,
      generationId: input.generationId,
      kind: input.kind,
      fileRef: input.fileRef,
      width: input.width,
      height: input.height,
      format: input.format,
      fileSize: input.fileSize,
      favorite: false,
      metadata: { ...input.metadata },
      createdAt: new Date(),
    }
    this._artifacts.set(artifact.id, artifact)
    return structuredClone(artifact)
  }

  async listArtifactsByGeneration(generationId: JobId): Promise<Artifact[]> {
    return [...this._artifacts.values()]
      .filter((artifact) => artifact.generationId === generationId)
      .map((artifact) => structuredClone(artifact))
  }

  async updateArtifact(artifactId: ArtifactId, patch: ArtifactPatch): Promise<Artifact> {
    const artifact = this._artifacts.get(artifactId)
    if (artifact === undefined) {
      throw new PersistenceError('updateArtifact', `Artifact ${artifactId} not found`, { artifactId })
    }
    if (patch.favorite !== undefined) artifact.favorite = patch.favorite
    if (patch.metadata !== undefined) artifact.metadata = { ...artifact.metadata, ...patch.metadata }
    return structuredClone(artifact)
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _requireOrder(operation: string, orderId: OrderId): Order {
    const order = this._orders.get(orderId)
    if (order === undefined) {
      throw new PersistenceError(operation, `Order ${orderId} not found`, { orderId })
    }
    return order
  }
}

export function createMemoryPersistenceGateway(): MemoryPersistenceGateway {
  return new MemoryPersistenceGateway()
}
