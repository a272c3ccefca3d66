/**
 * Tests for MemoryPersistenceGateway
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { PersistenceError } from '../../../core/errors.js'
import { MemoryPersistenceGateway } from '../memory-persistence-gateway.js'
import type { NewArtifact } from '../persistence-gateway.js'

function artifactDraft(generationId: string, fileRef = 'http://x/img.png'): NewArtifact {
  return {
    generationId,
    kind: 'image',
    fileRef,
    width: null,
    height: null,
    format: 'png',
    fileSize: null,
    metadata: { sourceUrl: fileRef },
  }
}

describe('MemoryPersistenceGateway', () => {
  let gateway: MemoryPersistenceGateway

  beforeEach(async () => {
    gateway = new MemoryPersistenceGateway()
    await gateway.createOrder({ model: 'model-x', prompt: 'a cat', baseParameters: { width: 512 }, projectId: null, status: 'PENDING' })
  })

  // -------------------------------------------------------------------------
  // Orders
  // -------------------------------------------------------------------------

  describe('orders', () => {
    it('assigns sequential ids', async () => {
      const second = await gateway.createOrder({
        model: 'model-x',
        prompt: 'a dog',
        baseParameters: {},
        projectId: 'proj-1',
        status: 'PENDING',
      })

      expect(second.id).toBe('ord_2')
      expect(second.projectId).toBe('proj-1')
    })

    it('returns copies that cannot change the stored record', async () => {
      const order = await gateway.getOrder('ord_1')
      if (order === null) throw new Error('order missing')
      order.status = 'FAILED'
      order.baseParameters.width = 1

      const stored = await gateway.getOrder('ord_1')
      expect(stored?.status).toBe('PENDING')
      expect(stored?.baseParameters).toEqual({ width: 512 })
    })

    it('returns null for an unknown order', async () => {
      await expect(gateway.getOrder('ord_404')).resolves.toBeNull()
    })

    it('updates the status', async () => {
      const updated = await gateway.updateOrderStatus('ord_1', 'PROCESSING')

      expect(updated.status).toBe('PROCESSING')
      expect((await gateway.getOrder('ord_1'))?.status).toBe('PROCESSING')
    })

    it('rejects updates to an unknown order', async () => {
      await expect(gateway.updateOrderStatus('ord_404', 'FAILED')).rejects.toThrow('Order ord_404 not found')
    })
  })

  // -------------------------------------------------------------------------
  // Generations
  // -------------------------------------------------------------------------

  describe('generations', () => {
    beforeEach(async () => {
      await gateway.createGeneration({
        jobId: 'job-1',
        orderId: 'ord_1',
        model: 'model-x',
        prompt: 'a cat',
        parameters: { width: 512 },
        status: 'STARTING',
      })
    })

    it('keys generations by job id', async () => {
      const generation = await gateway.getGeneration('job-1')

      expect(generation).toMatchObject({ id: 'job-1', orderId: 'ord_1', status: 'STARTING', error: null, returnParameters: null })
    })

    it('rejects a duplicate job id', async () => {
      const creating = gateway.createGeneration({
        jobId: 'job-1',
        orderId: 'ord_1',
        model: 'model-x',
        prompt: 'a cat',
        parameters: {},
        status: 'STARTING',
      })

      await expect(creating).rejects.toBeInstanceOf(PersistenceError)
      await expect(creating).rejects.toThrow('Generation job-1 already exists')
    })

    it('rejects a generation for an unknown order', async () => {
      const creating = gateway.createGeneration({
        jobId: 'job-2',
        orderId: 'ord_404',
        model: 'model-x',
        prompt: 'a cat',
        parameters: {},
        status: 'STARTING',
      })

      await expect(creating).rejects.toThrow('Order ord_404 not found')
    })

    it('writes error and return parameters only when given', async () => {
      await gateway.updateGenerationStatus('job-1', 'FAILED', 'quota exceeded')
      const updated = await gateway.updateGenerationStatus('job-1', 'FAILED')

      expect(updated.error).toBe('quota exceeded')
      expect(updated.returnParameters).toBeNull()
    })

    it('stores return parameters', async () => {
      const updated = await gateway.updateGenerationStatus('job-1', 'COMPLETED', null, { predict_time: 2 })

      expect(updated.returnParameters).toEqual({ predict_time: 2 })
    })

    it('lists generations of one order', async () => {
      await gateway.createOrder({ model: 'model-y', prompt: 'a dog', baseParameters: {}, projectId: null, status: 'PENDING' })
      await gateway.createGeneration({
        jobId: 'job-2',
        orderId: 'ord_2',
        model: 'model-y',
        prompt: 'a dog',
        parameters: {},
        status: 'STARTING',
      })

      const generations = await gateway.listGenerationsByOrder('ord_1')

      expect(generations.map((generation) => generation.id)).toEqual(['job-1'])
    })
  })

  // -------------------------------------------------------------------------
  // Artifacts
  // -------------------------------------------------------------------------

  describe('artifacts', () => {
    beforeEach(async () => {
      await gateway.createGeneration({
        jobId: 'job-1',
        orderId: 'ord_1',
        model: 'model-x',
        prompt: 'a cat',
        parameters: {},
        status: 'COMPLETED',
      })
    })

    it('creates artifacts that are not favorites', async () => {
      const artifact = await gateway.createArtifact(artifactDraft('job-1'))

      expect(artifact).toMatchObject({ id: 'art_1', generationId: 'job-1', favorite: false, format: 'png' })
      expect(await gateway.listArtifactsByGeneration('job-1')).toHaveLength(1)
    })

    it('rejects an artifact for an unknown generation', async () => {
      await expect(gateway.createArtifact(artifactDraft('job-404'))).rejects.toThrow('Generation job-404 not found')
    })

    it('updates the favorite flag and merges metadata', async () => {
      await gateway.createArtifact(artifactDraft('job-1'))

      const updated = await gateway.updateArtifact('art_1', { favorite: true, metadata: { rating: 5 } })

      expect(updated.favorite).toBe(true)
      expect(updated.metadata).toEqual({ sourceUrl: 'http://x/img.png', rating: 5 })
    })

    it('rejects updates to an unknown artifact', async () => {
      await expect(gateway.updateArtifact('art_404', { favorite: true })).rejects.toThrow('Artifact art_404 not found')
    })
  })
})
