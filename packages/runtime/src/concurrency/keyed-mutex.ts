// Fine-grained locks keyed by string (user id, domain tag)

/**
 * One FIFO mutex per key. Unrelated keys never wait on each other.
 * Idle keys are forgotten, so the map only holds keys with holders or waiters.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` while holding the lock for `key`.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Run `fn` while holding every lock in `keys`. Keys are taken in sorted
   * order so two callers with overlapping key sets cannot deadlock.
   */
  async runExclusiveMany<T>(keys: string[], fn: () => Promise<T> | T): Promise<T> {
    const ordered = Array.from(new Set(keys)).sort();
    const releases: Array<() => void> = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  /**
   * Wait for the lock on `key`; resolves with its release function.
   */
  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseFn: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      releaseFn = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      releaseFn();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Keys currently held or awaited
   */
  get size(): number {
    return this.tails.size;
  }
}
