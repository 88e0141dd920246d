/**
 * Unbounded single-consumer channel between a background producer and an
 * async iterator. A failure is delivered after any buffered values.
 */
export class AsyncChannel<T> implements AsyncIterator<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly waiting: Array<{
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: unknown) => void;
  }> = [];
  private failure: { error: unknown } | null = null;
  private closed = false;

  push(value: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  /**
   * End the channel. With `discard`, values not yet consumed are dropped.
   */
  close(discard = false): void {
    if (discard) {
      this.buffer.length = 0;
      this.failure = null;
    }
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiting.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(error: unknown): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const [first, ...rest] = this.waiting.splice(0);
    if (first) {
      first.reject(error);
    } else {
      this.failure = { error };
    }
    for (const waiter of rest) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item) {
      return Promise.resolve({ value: item.value, done: false });
    }
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }
}
