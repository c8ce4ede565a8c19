/**
 * FIFO single-writer lock built on a promise chain.
 *
 * Each `run` waits for every previously queued task to settle before it
 * starts, so a check-then-act sequence inside one task is atomic with
 * respect to other tasks on the same section.
 */
export class CriticalSection {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  async run<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.queued++;

    try {
      await previous;
      return await task();
    } finally {
      this.queued--;
      release();
    }
  }

  /**
   * Tasks waiting or running
   */
  get pending(): number {
    return this.queued;
  }
}
