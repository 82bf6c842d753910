/**
 * Async mutual exclusion lock.
 * Waiters are granted the lock in FIFO order.
 */
export class Mutex {
  private locked = false;
  private waitingQueue: Array<() => void> = [];

  /**
   * Acquire the lock
   * @returns A release function; calling it more than once has no effect
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise((resolve) => {
      this.waitingQueue.push(() => resolve(this.createRelease()));
    });
  }

  /**
   * Run a function while holding the lock
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the lock
   */
  getQueueLength(): number {
    return this.waitingQueue.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Hand the lock straight to the next waiter
      const next = this.waitingQueue.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}
