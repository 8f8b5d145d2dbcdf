/**
 * KeyedMutex - Serializes async tasks that share a key
 *
 * Tasks on the same key run one after another in call order; tasks on
 * different keys do not wait for each other. A key's entry is dropped
 * once its last task settles.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const run = previous.then(task)

    // The stored tail never rejects, so the next task always gets its turn
    const tail = run.then(
      () => undefined,
      () => undefined
    )
    this.tails.set(key, tail)

    try {
      return await run
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  /**
   * Number of keys with a task queued or running
   */
  get size(): number {
    return this.tails.size
  }
}
