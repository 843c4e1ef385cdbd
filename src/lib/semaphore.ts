/**
 * Counting semaphore bounding how many tasks of one job run at the same time.
 * Waiters are woken in FIFO order.
 */
export class Semaphore {
  private permits: number;
  private waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least 1 permit, got ${permits}`);
    }
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Permit passes straight to the waiter.
      next();
    } else {
      this.permits++;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get pending(): number {
    return this.waiters.length;
  }
}

/**
 * Runs `task` over every input with at most `limit` in flight and waits for
 * every task to settle, whether or not others rejected. Results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  inputs: readonly T[],
  limit: number,
  task: (input: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const semaphore = new Semaphore(limit);
  return Promise.allSettled(inputs.map((input, index) => semaphore.run(() => task(input, index))));
}
