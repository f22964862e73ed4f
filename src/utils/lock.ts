/**
 * FIFO mutual exclusion over async work. Waiters run in arrival order and the
 * lock passes on whether the holder resolved or threw.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  get pending(): number {
    return this.held;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => { release = resolve; });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.held++;

    await previous;
    try {
      return await fn();
    } finally {
      this.held--;
      release();
    }
  }
}
