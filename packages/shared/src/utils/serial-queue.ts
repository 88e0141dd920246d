/**
 * Runs async tasks one at a time, in submission order.
 *
 * Each task waits for the previous one to settle; a rejected task does not
 * poison the queue for later callers.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }
}
