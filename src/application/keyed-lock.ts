/**
 * Serializes async critical sections per key.
 *
 * Tasks for the same key run one after another in call order; tasks for
 * different keys do not wait on each other. A failing task releases the
 * key like a successful one.
 */
export class KeyedLock {
  private readonly tails: Map<string, Promise<void>> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** For testing: number of keys with a queued or running task. */
  get size(): number {
    return this.tails.size;
  }
}
