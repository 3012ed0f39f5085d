/**
 * Async mutual exclusion per string key.
 * Callers for the same key run one at a time in arrival order;
 * different keys never wait on each other.
 */
export default class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  public async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => fn());
    // the tail never rejects, so the next caller always gets its turn
    const tail = run.then(() => undefined, () => undefined);
    this.tails.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  public isLocked(key: string) {
    return this.tails.has(key);
  }
}
