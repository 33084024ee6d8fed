/**
 * Async Lock
 *
 * In-process mutex for the cooperative (async) regime.
 *
 * Hard rules:
 * - Only one holder at a time
 * - Waiters acquire in FIFO order
 * - Release happens even when the critical section throws
 *
 * @module @flowkit/engine/streams
 */

export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;
  private waiting = 0;

  /** Whether a holder is inside the critical section */
  get isLocked(): boolean {
    return this.held;
  }

  /** Number of callers queued behind the current holder */
  get queueLength(): number {
    return this.waiting;
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => current);

    this.waiting += 1;
    await previous;
    this.waiting -= 1;
    this.held = true;

    try {
      return await fn();
    } finally {
      this.held = false;
      release();
    }
  }
}
