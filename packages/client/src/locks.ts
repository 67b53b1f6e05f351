/**
 * @notekeep/client - Write coordination primitives
 */

/**
 * Serializes tasks per key. Tasks on different keys run concurrently.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Hold every key for the duration of `task`. Keys are taken in sorted
   * order, so two multi-key holders cannot deadlock.
   */
  async runExclusiveAll<T>(
    keys: Iterable<string>,
    task: () => Promise<T>
  ): Promise<T> {
    const ordered = Array.from(new Set(keys)).sort();
    const acquire = (index: number): Promise<T> =>
      index >= ordered.length
        ? task()
        : this.runExclusive(ordered[index], () => acquire(index + 1));
    return acquire(0);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * Gate that normal writers pass through concurrently and that one exclusive
 * task can close: it waits for writers already inside to finish and holds
 * new ones until it is done.
 */
export class WriteBarrier {
  private active = 0;
  private closed: Promise<void> | null = null;
  private reopen: (() => void) | null = null;
  private drained: (() => void) | null = null;

  async enter<T>(task: () => Promise<T>): Promise<T> {
    while (this.closed) {
      await this.closed;
    }
    this.active += 1;
    try {
      return await task();
    } finally {
      this.active -= 1;
      if (this.active === 0 && this.drained) {
        const drained = this.drained;
        this.drained = null;
        drained();
      }
    }
  }

  async exclusive<T>(task: () => Promise<T>): Promise<T> {
    while (this.closed) {
      await this.closed;
    }
    this.closed = new Promise<void>((resolve) => {
      this.reopen = resolve;
    });

    try {
      if (this.active > 0) {
        await new Promise<void>((resolve) => {
          this.drained = resolve;
        });
      }
      return await task();
    } finally {
      const reopen = this.reopen;
      this.closed = null;
      this.reopen = null;
      reopen?.();
    }
  }

  get isClosed(): boolean {
    return this.closed !== null;
  }
}
