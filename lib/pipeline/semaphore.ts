/**
 * Counting semaphore used for the item worker pool and for the per-dependency
 * call limits.
 */

export class Semaphore {
  private queue: Array<(acquired: boolean) => void> = [];
  private activeCount = 0;

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`Semaphore size must be a positive integer, got ${maxConcurrent}`);
    }
  }

  get active(): number {
    return this.activeCount;
  }

  get waiting(): number {
    return this.queue.length;
  }

  get capacity(): number {
    return this.maxConcurrent;
  }

  /**
   * Resolves true once a slot is held, or false if `signal` aborts first.
   * A caller that receives true must call release().
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    if (this.activeCount < this.maxConcurrent) {
      this.activeCount++;
      return Promise.resolve(true);
    }

    return new Promise<boolean>(resolve => {
      const waiter = (acquired: boolean) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(acquired);
      };
      const onAbort = () => {
        const index = this.queue.indexOf(waiter);
        if (index >= 0) {
          this.queue.splice(index, 1);
          resolve(false);
        }
      };

      this.queue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter; activeCount is unchanged.
      next(true);
      return;
    }
    if (this.activeCount > 0) {
      this.activeCount--;
    }
  }

  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T | undefined> {
    const acquired = await this.acquire(signal);
    if (!acquired) {
      return undefined;
    }
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
