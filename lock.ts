/**
 * A single exclusive critical section for async work.
 *
 * Callers are admitted strictly in the order they called `runExclusive`.
 * The lock is not reentrant: code already running inside a task must call
 * the unlocked helpers it needs directly instead of acquiring again.
 */
export class Lock {
  private tail: Promise<void> = Promise.resolve()
  private holders = 0

  get isLocked(): boolean {
    return this.holders > 0
  }

  /**
   * Run `task` once every earlier task has settled
   * @returns Whatever `task` resolves to; its rejection is passed through
   */
  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => {}
    const released = new Promise<void>((resolve) => {
      release = resolve
    })
    const previous = this.tail
    this.tail = previous.then(() => released)

    await previous
    this.holders++
    try {
      return await task()
    } finally {
      this.holders--
      release()
    }
  }
}
