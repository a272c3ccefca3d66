/**
 * KeyedSerialQueue — runs async tasks one at a time per key.
 *
 * Tasks for the same key run in submission order, each starting after the
 * previous one settles; tasks for different keys run independently. A failed
 * task rejects its own promise and does not stall the queue.
 */

const noop = (): void => undefined

export class KeyedSerialQueue<K = string> {
  private readonly _tails: Map<K, Promise<void>> = new Map()

  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve()
    const result = previous.then(() => task())

    const tail: Promise<void> = result.then(noop, noop).then(() => {
      if (this._tails.get(key) === tail) this._tails.delete(key)
    })
    this._tails.set(key, tail)

    return result
  }

  /** Keys with queued or running work */
  get activeKeys(): K[] {
    return [...this._tails.keys()]
  }
}
