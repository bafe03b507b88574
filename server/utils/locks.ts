/**
 * Per-key mutual exclusion. Payments on one loan, and reservations on one
 * customer, must never interleave.
 */

class Mutex {
  private queue: Array<() => void> = [];
  private locked = false;

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }

  private acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve();
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release() {
    this.locked = false;
    const next = this.queue.shift();
    if (next) next();
  }
}

export class KeyedMutexes {
  private map = new Map<string, Mutex>();

  private get(key: string): Mutex {
    let m = this.map.get(key);
    if (!m) {
      m = new Mutex();
      this.map.set(key, m);
    }
    return m;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const m = this.get(key);
    try {
      return await m.runExclusive(fn);
    } finally {
      if (m.idle && this.map.get(key) === m) this.map.delete(key);
    }
  }

  get size(): number {
    return this.map.size;
  }
}
