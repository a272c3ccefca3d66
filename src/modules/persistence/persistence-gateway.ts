/**
 * Persistence contracts consumed by the lifecycle orchestrator.
 *
 * Storage (schema, migrations, transactions) belongs to the implementer. The
 * orchestrator only relies on these calls resolving quickly and rejecting when
 * a record cannot be read or written.
 */

import type {
  Artifact,
  ArtifactId,
  ArtifactKind,
  ArtifactPatch,
  Generation,
  GenerationStatus,
  JobId,
  Order,
  OrderId,
  OrderStatus,
  Parameters,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Creation inputs
// ---------------------------------------------------------------------------

export interface NewOrder {
  model: string
  prompt: string
  baseParameters: Parameters
  projectId: string | null
  status: OrderStatus
}

export interface NewGeneration {
  /** External job id; becomes the Generation id */
  jobId: JobId
  orderId: OrderId
  model: string
  prompt: string
  parameters: Parameters
  status: GenerationStatus
}

export interface NewArtifact {
  generationId: JobId
  kind: ArtifactKind
  fileRef: string
  width: number | null
  height: number | null
  format: string | null
  fileSize: number | null
  metadata: Record<string, unknown>
}

// ---------------------------------------------------------------------------
// Stores
// ---------------------------------------------------------------------------

export interface OrderStore {
  createOrder(input: NewOrder): Promise<Order>
  getOrder(orderId: OrderId): Promise<Order | null>
  /** Resolves with the updated order */
  updateOrderStatus(orderId: OrderId, status: OrderStatus): Promise<Order>
}

export interface GenerationStore {
  createGeneration(input: NewGeneration): Promise<Generation>
  getGeneration(jobId: JobId): Promise<Generation | null>
  /**
   * Resolves with the updated generation. `error` and `returnParameters` are
   * only written when given.
   */
  updateGenerationStatus(
    jobId: JobId,
    status: GenerationStatus,
    error?: string | null,
    returnParameters?: Record<string, unknown> | null,
  ): Promise<Generation>
  listGenerationsByOrder(orderId: OrderId): Promise<Generation[]>
}

export interface ArtifactStore {
  createArtifact(input: NewArtifact): Promise<Artifact>
  listArtifactsByGeneration(generationId: JobId): Promise<Artifact[]>
  /** Favorite flag and metadata are the only fields an artifact may change */
  updateArtifact(artifactId: ArtifactId, patch: ArtifactPatch): Promise<Artifact>
}

/** Full persistence surface: orders, generations and artifacts */
export interface PersistenceGateway extends OrderStore, GenerationStore, ArtifactStore {}
