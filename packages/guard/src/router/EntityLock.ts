/**
 * Per-entity FIFO mutex. Two actions on the same entity never interleave between
 * validate and commit; actions on different entities run freely.
 */
export class EntityLock {
  private queues: Map<string, Array<() => void>> = new Map()

  /** Resolves when the lock for `key` is held. */
  acquire(key: string): Promise<void> {
    const queue = this.queues.get(key) || []
    return new Promise<void>((resolve) => {
      queue.push(resolve)
      this.queues.set(key, queue)
      // only waiter: take it now
      if (queue.length === 1) resolve()
    })
  }

  release(key: string): void {
    const queue = this.queues.get(key)
    if (!queue || queue.length === 0) return
    queue.shift()
    if (queue.length === 0) {
      this.queues.delete(key)
    } else {
      queue[0]()
    }
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key)
    try {
      return await fn()
    } finally {
      this.release(key)
    }
  }

  pending(key: string): number {
    return this.queues.get(key)?.length ?? 0
  }
}
