/**
 * Serialises async work per key. Tasks for the same key run one after
 * another in call order; tasks for different keys run concurrently.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

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

  /**
   * Resolves once every task queued before this call has settled
   */
  async drain(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }
}
