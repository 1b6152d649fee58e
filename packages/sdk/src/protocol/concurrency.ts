/**
 * Concurrency Primitives
 *
 * FIFO semaphore and mutex over promises. Waiters are admitted strictly in
 * arrival order.
 */

export class Semaphore {
  private active = 0;
  private readonly waiters: (() => void)[] = [];

  /**
   * @param limit - Number of tasks allowed to run at once; `Infinity` admits every task immediately.
   */
  constructor(private readonly limit: number) {
    if (!(limit >= 1)) {
      throw new RangeError(`Semaphore limit must be at least 1, got ${limit}`);
    }
  }

  /** Tasks currently holding a slot. */
  get running(): number {
    return this.active;
  }

  /** Tasks waiting for a slot. */
  get pending(): number {
    return this.waiters.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // the slot passes straight to the next waiter
      next();
    } else {
      this.active--;
    }
  }
}

/**
 * Mutual exclusion for async sections.
 */
export class Mutex {
  private readonly semaphore = new Semaphore(1);

  get locked(): boolean {
    return this.semaphore.running > 0;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.semaphore.run(task);
  }
}
