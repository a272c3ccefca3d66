/**
 * End-to-end tests for createLifecycle
 *
 * Real event bus, poller and orchestrator against the scripted provider and
 * the in-memory gateway. A zero poll interval lets every job run to its
 * terminal state on real timers.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createLifecycle } from '../src/core/lifecycle-impl.js'
import type { Lifecycle } from '../src/core/lifecycle.js'
import { EVENT_KINDS } from '../src/core/event-bus.types.js'
import type { EventEnvelope, EventKind } from '../src/core/event-bus.types.js'
import { ConfigurationError, OrderCreationError } from '../src/core/errors.js'
import type { LifecycleConfig } from '../src/modules/config/config-schema.js'
import { createDeferred } from '../src/utils/helpers.js'
import { createLogger, setLogLevel } from '../src/utils/logger.js'
import { MemoryPersistenceGateway } from '../src/modules/persistence/memory-persistence-gateway.js'
import { ScriptedProvider } from './helpers/scripted-provider.js'

function testConfig(intervalMs: number, maxAttempts = 60): LifecycleConfig {
  return {
    config_format_version: '1',
    polling: { interval_ms: intervalMs, max_attempts: maxAttempts },
    log_level: 'warn',
  }
}

function record(lifecycle: Lifecycle): EventEnvelope<EventKind>[] {
  const events: EventEnvelope<EventKind>[] = []
  for (const kind of EVENT_KINDS) {
    lifecycle.eventBus.subscribe(kind, (event) => {
      events.push(event)
    })
  }
  return events
}

function kinds(events: EventEnvelope<EventKind>[]): EventKind[] {
  return events.map((event) => event.kind)
}

describe('createLifecycle', () => {
  let provider: ScriptedProvider
  let gateway: MemoryPersistenceGateway
  let lifecycle: Lifecycle | undefined

  beforeEach(() => {
    provider = new ScriptedProvider()
    gateway = new MemoryPersistenceGateway()
    lifecycle = undefined
  })

  afterEach(async () => {
    await lifecycle?.shutdown()
  })

  async function start(config: LifecycleConfig): Promise<{ lifecycle: Lifecycle; events: EventEnvelope<EventKind>[] }> {
    const created = await createLifecycle({ provider, persistence: gateway, config })
    lifecycle = created
    return { lifecycle: created, events: record(created) }
  }

  it('fulfills an order whose job succeeds immediately', async () => {
    provider.enqueue({ status: 'succeeded', output: 'http://x/img.png' })
    const { lifecycle, events } = await start(testConfig(0))

    const { order, jobId } = await lifecycle.orchestrator.createOrder('model-x', 'a cat', {})
    await lifecycle.orchestrator.whenIdle()

    expect(jobId).toBe('job-1')
    expect(order.status).toBe('PROCESSING')
    expect((await gateway.getOrder(order.id))?.status).toBe('FULFILLED')
    expect((await gateway.getGeneration(jobId))?.status).toBe('COMPLETED')

    const artifacts = await gateway.listArtifactsByGeneration(jobId)
    expect(artifacts.map((artifact) => artifact.fileRef)).toEqual(['http://x/img.png'])

    expect(kinds(events)).toEqual([
      'order.created',
      'order.status_changed',
      'generation.started',
      'generation.completed',
      'order.fulfilled',
    ])
    expect(events[3]).toMatchObject({
      origin: 'orchestrator',
      payload: { jobId, outputs: ['http://x/img.png'], generation: { status: 'COMPLETED' } },
    })
    expect(
      events
        .filter((event) => event.subjectType === 'order')
        .map((event) => ('order' in event.payload ? event.payload.order.status : null)),
    ).toEqual(['PENDING', 'PROCESSING', 'FULFILLED'])
  })

  it('fails the order when the provider reports a failed job', async () => {
    provider.enqueue({ status: 'failed', error: 'quota exceeded' })
    const { lifecycle, events } = await start(testConfig(0))

    const { order, jobId } = await lifecycle.orchestrator.createOrder('model-x', 'a cat', {})
    await lifecycle.orchestrator.whenIdle()

    const generation = await gateway.getGeneration(jobId)
    expect(generation?.status).toBe('FAILED')
    expect(generation?.error).toBe('quota exceeded')
    expect((await gateway.getOrder(order.id))?.status).toBe('FAILED')
    expect(kinds(events).slice(2)).toEqual(['generation.started', 'generation.failed', 'order.failed'])
    expect(events[3]).toMatchObject({ origin: 'orchestrator', payload: { error: 'quota exceeded', reason: 'provider' } })
  })

  it('moves the generation through IN_PROGRESS before completing', async () => {
    provider.enqueue(
      { status: 'starting' },
      { status: 'processing' },
      { status: 'succeeded', output: ['http://x/a.png', 'http://x/b.png'] },
    )
    const updates = vi.spyOn(gateway, 'updateGenerationStatus')
    const { lifecycle } = await start(testConfig(0))

    const { jobId } = await lifecycle.orchestrator.createOrder('model-x', 'a cat', {})
    await lifecycle.orchestrator.whenIdle()

    expect(updates.mock.calls.map((call) => call[1])).toEqual(['IN_PROGRESS', 'COMPLETED'])
    expect(await gateway.listArtifactsByGeneration(jobId)).toHaveLength(2)
  })

  it('fails the order when the job exhausts the configured attempts', async () => {
    const { lifecycle, events } = await start(testConfig(0, 2))

    const { order } = await lifecycle.orchestrator.createOrder('model-x', 'a cat', {})
    await lifecycle.orchestrator.whenIdle()

    expect(provider.getJob).toHaveBeenCalledTimes(2)
    expect((await gateway.getOrder(order.id))?.status).toBe('FAILED')
    const failed = events.find((event) => event.kind === 'order.failed')
    expect(failed?.payload).toMatchObject({ error: 'Prediction job-1 timed out after 2 polling attempts' })
  })

  it('cancels a running generation', async () => {
    const { lifecycle, events } = await start(testConfig(60_000))

    const { order, jobId } = await lifecycle.orchestrator.createOrder('model-x', 'a cat', {})
    await expect(lifecycle.orchestrator.cancelGeneration(jobId)).resolves.toBe(true)
    await lifecycle.orchestrator.whenIdle()

    expect(provider.cancelJob).toHaveBeenCalledWith(jobId)
    expect((await gateway.getGeneration(jobId))?.status).toBe('CANCELLED')
    expect((await gateway.getOrder(order.id))?.status).toBe('CANCELED')
    expect(kinds(events).slice(2)).toEqual(['generation.started', 'generation.canceled', 'order.canceled'])
  })

  it('delivers each terminal generation event once', async () => {
    provider.enqueue({ status: 'processing' }, { status: 'succeeded', output: ['http://x/a.png', 'http://x/b.png'] })
    const { lifecycle } = await start(testConfig(0))
    const completed: EventEnvelope<'generation.completed'>[] = []
    lifecycle.eventBus.subscribe('generation.completed', (event) => {
      completed.push(event)
    })

    await lifecycle.orchestrator.createOrder('model-x', 'a cat', {})
    await lifecycle.orchestrator.whenIdle()

    expect(completed).toHaveLength(1)
    expect(completed[0]?.origin).toBe('orchestrator')
    expect(completed[0]?.payload.artifacts).toHaveLength(2)
    expect(Object.isFrozen(completed[0]?.payload.outputs)).toBe(true)
  })

  it('leaves an order canceled while its job was being created', async () => {
    const created = createDeferred<string>()
    provider.createJob.mockImplementationOnce(() => created.promise)
    const { lifecycle, events } = await start(testConfig(60_000))
    const cancellations: Promise<number>[] = []
    lifecycle.eventBus.subscribe('order.created', (event) => {
      cancellations.push(lifecycle.orchestrator.cancelOrder(event.payload.order.id))
    })

    const creating = lifecycle.orchestrator.createOrder('model-x', 'a cat', {}).catch((err: unknown) => err)
    await vi.waitFor(() => {
      expect(kinds(events)).toEqual(['order.created', 'order.canceled'])
    })
    await expect(Promise.all(cancellations)).resolves.toEqual([0])
    created.resolve('job-1')

    await expect(creating).resolves.toBeInstanceOf(OrderCreationError)
    await expect(creating).resolves.toHaveProperty('step', 'mark-processing')
    expect((await gateway.getOrder('ord_1'))?.status).toBe('CANCELED')
    expect(provider.cancelJob).toHaveBeenCalledWith('job-1')
    expect(lifecycle.poller.activeJobIds()).toEqual([])
    expect(kinds(events)).toEqual(['order.created', 'order.canceled'])
  })

  it('applies the configured log level to loggers of the whole process', async () => {
    const earlier = createLogger('earlier', { level: 'warn', pretty: false })

    try {
      await start({ ...testConfig(0), log_level: 'error' })
      expect(earlier.level).toBe('error')
    } finally {
      setLogLevel('warn')
    }
  })

  it('stops polling on shutdown and shuts down only once', async () => {
    const { lifecycle } = await start(testConfig(60_000))
    const { jobId } = await lifecycle.orchestrator.createOrder('model-x', 'a cat', {})
    expect(lifecycle.poller.isActive(jobId)).toBe(true)

    const first = lifecycle.shutdown()
    const second = lifecycle.shutdown()

    expect(second).toBe(first)
    await first
    expect(lifecycle.poller.activeJobIds()).toEqual([])
    expect(lifecycle.orchestrator.trackedJobIds()).toEqual([])
  })

  it('rejects order creation without persistence', async () => {
    const bare = await createLifecycle({ provider, config: testConfig(0) })
    lifecycle = bare

    await expect(bare.orchestrator.createOrder('model-x', 'a cat', {})).rejects.toBeInstanceOf(ConfigurationError)
    expect(provider.createJob).not.toHaveBeenCalled()
  })
})
