/**
 * One-permit semaphore guarding the on-disk vector index. Callers queue in
 * arrival order and run one at a time.
 */
export class IndexLock {
  private locked = false
  private waiting: Array<() => void> = []

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }

  get isLocked(): boolean {
    return this.locked
  }

  get pending(): number {
    return this.waiting.length
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return Promise.resolve()
    }

    return new Promise(resolve => {
      this.waiting.push(resolve)
    })
  }

  private release(): void {
    const next = this.waiting.shift()
    if (next) {
      // Hand the permit straight to the next caller; `locked` stays true
      next()
      return
    }
    this.locked = false
  }
}
