/**
 * KeyedSerialQueue - one promise chain per key.
 *
 * Tasks for the same key run strictly in submission order; tasks for
 * different keys run concurrently. A rejected task does not break the
 * chain for the tasks behind it.
 */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly inFlight = new Set<Promise<void>>();

  /**
   * Enqueue a task for `key`. The returned promise settles with the task.
   */
  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    this.inFlight.add(tail);

    void tail.then(() => {
      this.inFlight.delete(tail);
      // Only drop the key if nothing was queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }

  /**
   * Resolve once every task submitted so far (and anything they enqueue)
   * has settled.
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
