/**
 * Minimal async mutex.
 *
 * Callers queue in arrival order; each critical section runs only after the
 * previous one has settled, whether it resolved or threw.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.waiting++;
    try {
      await previous;
      return await fn();
    } finally {
      this.waiting--;
      release();
    }
  }

  /** Number of sections running or queued */
  get pending(): number {
    return this.waiting;
  }
}
