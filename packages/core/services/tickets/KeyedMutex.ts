/**
 * Per-key async mutual exclusion.
 *
 * Callers sharing a key run one at a time in FIFO order; different keys
 * never wait on each other. Entries are dropped as soon as a key is idle,
 * so the map only holds keys with a current holder.
 *
 * @example
 * ```typescript
 * const locks = new KeyedMutex();
 * await locks.runExclusive(`ticket:${id}`, async () => {
 *   // read, decide, write
 * });
 * ```
 */

interface KeyState {
  waiters: Array<() => void>;
}

export class KeyedMutex {
  private held = new Map<string, KeyState>();

  /**
   * Acquire the lock for `key`. Resolves with a release function that must
   * be called exactly once.
   */
  async acquire(key: string): Promise<() => void> {
    const state = this.held.get(key);
    if (!state) {
      this.held.set(key, { waiters: [] });
      return this.releaser(key);
    }

    return new Promise<() => void>((resolve) => {
      state.waiters.push(() => resolve(this.releaser(key)));
    });
  }

  /** Run `fn` while holding the lock for `key`; released on every exit path */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  /** Number of keys currently held */
  get size(): number {
    return this.held.size;
  }

  private releaser(key: string): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const state = this.held.get(key);
      if (!state) return;

      const next = state.waiters.shift();
      if (next) {
        // Hand the lock directly to the next waiter
        next();
      } else {
        this.held.delete(key);
      }
    };
  }
}
