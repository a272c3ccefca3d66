/**
 * General utility helpers for the generation lifecycle
 */

/**
 * Sleep for a given number of milliseconds.
 * Resolves `true` when the full interval elapsed and `false` as soon as
 * `signal` aborts; never rejects, and never leaves a timer behind.
 * @param ms - Milliseconds to sleep
 * @param signal - Optional abort signal that ends the sleep early
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted === true) {
      resolve(false)
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve(false)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/** A promise together with the function that resolves it */
export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
}

/**
 * Create a promise that is resolved from the outside.
 */
export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>((res) => {
    resolve = res
  })
  return { promise, resolve }
}
