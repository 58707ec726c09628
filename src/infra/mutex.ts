/**
 * Promise-chained mutex serialising asynchronous critical sections. Callers
 * queue in arrival order; an operation that throws still releases the lock.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    const release = this.enqueue();
    try {
      await previous;
      return await operation();
    } finally {
      release();
    }
  }

  private enqueue(): () => void {
    let release: () => void = () => undefined;
    const wait = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = this.tail.then(() => wait);
    return release;
  }
}
