/**
 * ASYNC LOCK
 * ==========
 *
 * FIFO mutex for jobs that must not overlap (the scoring batch). A caller
 * that finds the lock held waits for every earlier holder, then runs.
 */

export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  isLocked(): boolean {
    return this.pending > 0;
  }

  /** Callers waiting behind the current holder. */
  queued(): number {
    return Math.max(0, this.pending - 1);
  }
}
