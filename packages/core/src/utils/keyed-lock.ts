/**
 * Keyed Lock
 *
 * Serialises async work per key (conversation id, owner id). Work under
 * different keys runs concurrently. Each key keeps only the tail of its
 * queue; the entry is dropped once the queue drains.
 */

export class KeyedLock {
  private tails = new Map<string, Promise<void>>()

  /** Run `task` after every task previously queued under `key` has settled */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const current = previous.then(task)
    const tail = current.then(
      () => undefined,
      () => undefined,
    )
    this.tails.set(key, tail)

    try {
      return await current
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size
  }
}
