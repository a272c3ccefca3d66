/**
 * Core domain types for the generation lifecycle.
 * Shared type definitions used across all modules.
 */

/** Identifier of an Order, assigned by the persistence gateway */
export type OrderId = string

/** Identifier of an external job; doubles as the Generation id */
export type JobId = string

/** Identifier of an Artifact, assigned by the persistence gateway */
export type ArtifactId = string

/** Opaque key/value parameter map forwarded to the generation service */
export type Parameters = Record<string, unknown>

// ---------------------------------------------------------------------------
// Order
// ---------------------------------------------------------------------------

export const ORDER_STATUSES = ['PENDING', 'PROCESSING', 'FULFILLED', 'FAILED', 'CANCELED'] as const

/** Status of a user-level order */
export type OrderStatus = (typeof ORDER_STATUSES)[number]

/** A user-initiated generation request that may spawn one or more Generations */
export interface Order {
  id: OrderId
  model: string
  prompt: string
  baseParameters: Parameters
  status: OrderStatus
  projectId: string | null
  createdAt: Date
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export const GENERATION_STATUSES = [
  'STARTING',
  'IN_PROGRESS',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
] as const

/** Status of a single external job */
export type GenerationStatus = (typeof GENERATION_STATUSES)[number]

/** One external asynchronous job spawned to fulfill (part of) an Order */
export interface Generation {
  /** The external job id */
  id: JobId
  orderId: OrderId
  model: string
  prompt: string
  parameters: Parameters
  status: GenerationStatus
  error: string | null
  /** Metadata returned by the generation service, if any */
  returnParameters: Record<string, unknown> | null
  createdAt: Date
}

// ---------------------------------------------------------------------------
// Artifact
// ---------------------------------------------------------------------------

export type ArtifactKind = 'image' | 'video' | 'audio'

/** One concrete output file produced by a completed Generation */
export interface Artifact {
  id: ArtifactId
  generationId: JobId
  kind: ArtifactKind
  /** Local path or remote URL where the output lives */
  fileRef: string
  width: number | null
  height: number | null
  format: string | null
  fileSize: number | null
  favorite: boolean
  metadata: Record<string, unknown>
  createdAt: Date
}

/** Fields an Artifact may change after creation */
export interface ArtifactPatch {
  favorite?: boolean
  metadata?: Record<string, unknown>
}
