/**
 * In-process mutex: callers run one at a time in arrival order. A failed
 * holder releases the lock like a successful one.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending += 1;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending -= 1;
      release();
    }
  }

  /** Holders plus waiters. */
  get size(): number {
    return this.pending;
  }
}
