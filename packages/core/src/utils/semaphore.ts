/**
 * Counting semaphore for async admission control.
 *
 * `acquire()` resolves with a release function once a permit is free.
 * Waiters are served FIFO. Releasing twice is a no-op.
 *
 * ```ts
 * const release = await semaphore.acquire();
 * try {
 *   await download();
 * } finally {
 *   release();
 * }
 * ```
 */
export class Semaphore {
  private permits: number;
  private readonly waiters: Array<() => void> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.permits = capacity;
  }

  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.waiters.push(() => resolve(this.createRelease()));
    });
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand the permit straight to the next waiter
        next();
      } else {
        this.permits++;
      }
    };
  }

  get available(): number {
    return this.permits;
  }
}
