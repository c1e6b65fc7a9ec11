/**
 * Exclusive async lock built on a promise chain: each section starts once
 * the previous one has settled, in call order.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private held = false;

  withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    this.waiting++;
    const section = this.tail.then(async () => {
      this.waiting--;
      this.held = true;
      try {
        return await fn();
      } finally {
        this.held = false;
      }
    });
    // a failed section still hands the lock on
    this.tail = section.then(
      () => undefined,
      () => undefined,
    );
    return section;
  }

  get isLocked(): boolean {
    return this.held;
  }

  /** Sections queued but not yet running. */
  get pending(): number {
    return this.waiting;
  }
}
