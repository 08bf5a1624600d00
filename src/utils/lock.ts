/**
 * Promise-chain locks. Callers queue behind the previous holder; a rejected
 * holder never poisons the chain for the next one.
 */
export class KeyedMutex<TKey> {
  private readonly chains = new Map<TKey, Promise<void>>();

  async runExclusive<T>(key: TKey, fn: () => T | Promise<T>): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const next = new Promise<void>((r) => {
      release = r;
    });
    const chain = prev.then(() => next);
    this.chains.set(key, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      queueMicrotask(() => {
        if (this.chains.get(key) === chain) this.chains.delete(key);
      });
    }
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.chains.values()]);
  }
}

const TABLE = "table";

/** Single coarse lock guarding a whole in-memory table. */
export class Mutex {
  private readonly inner = new KeyedMutex<typeof TABLE>();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.inner.runExclusive(TABLE, fn);
  }
}
