/**
 * Tests for the general helpers
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createDeferred, sleep } from '../src/utils/helpers.js'

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should resolve true after the full delay', async () => {
    vi.useFakeTimers()
    const sleeping = sleep(500)

    await vi.advanceTimersByTimeAsync(500)

    await expect(sleeping).resolves.toBe(true)
  })

  it('should resolve false as soon as the signal aborts', async () => {
    vi.useFakeTimers()
    const controller = new AbortController()
    const sleeping = sleep(10_000, controller.signal)

    controller.abort()

    await expect(sleeping).resolves.toBe(false)
    expect(vi.getTimerCount()).toBe(0)
  })

  it('should resolve false immediately for an already aborted signal', async () => {
    vi.useFakeTimers()
    const controller = new AbortController()
    controller.abort()

    await expect(sleep(10_000, controller.signal)).resolves.toBe(false)
    expect(vi.getTimerCount()).toBe(0)
  })

  it('should ignore an abort after the delay elapsed', async () => {
    vi.useFakeTimers()
    const controller = new AbortController()
    const sleeping = sleep(100, controller.signal)

    await vi.advanceTimersByTimeAsync(100)
    controller.abort()

    await expect(sleeping).resolves.toBe(true)
  })
})

describe('createDeferred', () => {
  it('should resolve the promise from the outside', async () => {
    const deferred = createDeferred<string>()

    deferred.resolve('done')

    await expect(deferred.promise).resolves.toBe('done')
  })

  it('should keep the first value when resolved twice', async () => {
    const deferred = createDeferred<number>()

    deferred.resolve(1)
    deferred.resolve(2)

    await expect(deferred.promise).resolves.toBe(1)
  })
})
