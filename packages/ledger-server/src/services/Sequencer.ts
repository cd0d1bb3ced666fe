/**
 * Sequencer
 * - Single process-wide FIFO mutex
 * - Every mutating ledger operation runs to completion before the next one starts,
 *   so read-modify-write sequences (tally -> threshold -> promote) are atomic
 */
export class Sequencer {
  private queue: Array<() => void> = []

  /** Acquire the lock (FIFO). Resolves when the lock is held. */
  private acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push(resolve)
      // If we're the only waiter, acquire immediately
      if (this.queue.length === 1) resolve()
    })
  }

  /** Release the lock and wake the next waiter. */
  private release() {
    if (this.queue.length === 0) return
    this.queue.shift()
    const next = this.queue[0]
    if (next) next()
  }

  async run<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }

  /** Number of operations holding or waiting for the lock. */
  get depth(): number {
    return this.queue.length
  }
}

export default Sequencer
