/**
 * Promise-chain mutual exclusion for serialising async operations in one process.
 */
export class AsyncMutex {
  private queue: Promise<void> = Promise.resolve();

  /**
   * Run `fn` while holding the lock; waits for every earlier caller to finish first.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.queue;
    this.queue = gate;

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
