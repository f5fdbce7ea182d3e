// ---------------------------------------------------------------------------
// Per-key async mutex
// ---------------------------------------------------------------------------

/**
 * Serializes async critical sections that share a key while letting
 * different keys run concurrently. Each key holds the tail of a promise
 * chain; the entry is dropped once nothing is queued behind it, so the
 * table only ever contains keys with work in flight.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      unlock();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
