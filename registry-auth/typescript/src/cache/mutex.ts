/**
 * Async mutual exclusion for interleaved callers.
 * @module cache/mutex
 */

/**
 * FIFO mutex. Waiters are granted the lock in arrival order.
 */
export class Mutex {
  private locked = false;
  private readonly waiting: Array<() => void> = [];

  /**
   * Acquires the lock, waiting if it is held.
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  /**
   * Releases the lock, handing it straight to the next waiter if any.
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  /**
   * Runs `fn` while holding the lock. The lock is released whether `fn`
   * resolves or rejects.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Whether the lock is currently held.
   */
  isLocked(): boolean {
    return this.locked;
  }
}
