// Promise-chain mutexes for the index write path and per-session exchanges

/**
 * Serializes async critical sections in call order.
 * A rejected section releases the lock and rethrows to its own caller only.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>(resolve => { release = resolve; });
    this.pending++;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}

/**
 * One Mutex per key, created on demand and dropped once idle, so
 * unrelated keys never wait on each other.
 */
export class KeyedMutex {
  private locks = new Map<string, Mutex>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    try {
      return await lock.runExclusive(fn);
    } finally {
      if (!lock.isLocked && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }

  get size(): number {
    return this.locks.size;
  }
}
