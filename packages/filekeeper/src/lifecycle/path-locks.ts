/**
 * Path Locks
 *
 * In-process keyed mutex. Operations on one path run one at a time, in
 * arrival order; operations on different paths run freely.
 */

export class PathLocks {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Wait for the key and return its release function
   */
  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Hold several keys at once. Keys are taken in sorted order so two
   * callers with overlapping sets cannot deadlock.
   */
  async withLocks<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
