/**
 * FIFO async lock. Callers queue behind whoever holds it; a rejected
 * critical section releases the lock like a successful one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  get isLocked(): boolean {
    return this.held;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    this.held = true;
    try {
      return await fn();
    } finally {
      this.held = false;
      release();
    }
  }
}
