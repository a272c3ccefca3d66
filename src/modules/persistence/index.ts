/**
 * Persistence module — barrel export.
 *
 * Public API:
 *  - store contracts (OrderStore, GenerationStore, ArtifactStore, PersistenceGateway)
 *  - MemoryPersistenceGateway, the in-process implementation
 */

export type {
  ArtifactStore,
  GenerationStore,
  NewArtifact,
  NewGeneration,
  NewOrder,
  OrderStore,
  PersistenceGateway,
} from './persistence-gateway.js'
export { MemoryPersistenceGateway, createMemoryPersistenceGateway } from './memory-persistence-gateway.js'
