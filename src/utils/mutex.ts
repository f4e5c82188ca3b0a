// Async mutex: callers run one at a time, in arrival order.

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}
