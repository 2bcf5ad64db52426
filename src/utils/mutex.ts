/**
 * Serializes async work. A failed task does not poison the chain: the next
 * waiter runs regardless of how the previous one settled.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  lock<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(fn, fn);
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}

/** One Mutex per key, dropped once nobody is waiting on it. */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; pending: number }>();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), pending: 0 };
      this.locks.set(key, entry);
    }
    entry.pending += 1;

    const held = entry;
    try {
      return await held.mutex.lock(fn);
    } finally {
      held.pending -= 1;
      if (held.pending === 0 && this.locks.get(key) === held) {
        this.locks.delete(key);
      }
    }
  }

  get size(): number {
    return this.locks.size;
  }
}
