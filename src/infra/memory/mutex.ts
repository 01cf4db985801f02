export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  isLocked(): boolean {
    return this.locked || this.queue.length > 0;
  }

  async lock(): Promise<() => void> {
    return new Promise((resolve) => {
      const release = () => {
        const next = this.queue.shift();
        if (next) {
          next();
        } else {
          this.locked = false;
        }
      };

      if (this.locked) {
        this.queue.push(() => resolve(release));
      } else {
        this.locked = true;
        resolve(release);
      }
    });
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.lock();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * One mutex per key (account group id for movement creation). Idle, unlocked
 * entries are evicted after `ttlMs`.
 */
export class MutexMap<K = string> {
  private readonly map = new Map<K, { mutex: Mutex; lastUsed: number }>();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private destroyed = false;

  constructor(
    private readonly ttlMs = 5 * 60 * 1000,
    cleanupEveryMs = 60_000
  ) {
    this.cleanupInterval = setInterval(() => {
      if (!this.destroyed) {
        this.cleanup();
      }
    }, cleanupEveryMs);
    this.cleanupInterval.unref();
  }

  get(key: K): Mutex {
    const existing = this.map.get(key);
    if (existing) {
      existing.lastUsed = Date.now();
      return existing.mutex;
    }
    const created = { mutex: new Mutex(), lastUsed: Date.now() };
    this.map.set(key, created);
    return created.mutex;
  }

  get size(): number {
    return this.map.size;
  }

  cleanup(now = Date.now()): void {
    const toDelete: K[] = [];

    for (const [key, value] of this.map.entries()) {
      if (now - value.lastUsed > this.ttlMs && !value.mutex.isLocked()) {
        toDelete.push(key);
      }
    }

    // A waiter may have queued between the two passes
    for (const key of toDelete) {
      const value = this.map.get(key);
      if (value && !value.mutex.isLocked()) {
        this.map.delete(key);
      }
    }
  }

  destroy(): void {
    this.destroyed = true;
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.map.clear();
  }
}
