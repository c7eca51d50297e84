/**
 * In-process mutual exclusion scoped by key. Tasks sharing a key run one after
 * another in call order; tasks with different keys do not wait on each other.
 *
 * Same shape as a distributed `withLock(key, callback)`, without the round trip:
 * a single process owns the state, so a promise chain per key is enough.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => task());
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
