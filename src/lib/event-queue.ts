/**
 * Unbounded FIFO channel with many producers and a single consumer.
 *
 * Producers push without waiting; the consumer iterates with `for await` and
 * suspends while the queue is empty. Values pushed by one producer come out in
 * the order it pushed them. Nothing is promised about the relative order of
 * values from different producers.
 */
export class EventQueue<T> implements AsyncIterableIterator<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;
  private started = false;

  /**
   * Push a value, waking the consumer if it is waiting.
   * @returns false when the queue is closed and the value was dropped
   */
  push(value: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ done: false, value });
      return true;
    }
    this.buffer.push({ value });
    return true;
  }

  /**
   * Stop accepting values. Values already buffered are still delivered,
   * then iteration completes.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ done: true, value: undefined });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.buffer.shift();
    if (entry) {
      return Promise.resolve({ done: false, value: entry.value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (this.waiting) {
      return Promise.reject(new Error('EventQueue supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  /** Called when a `for await` loop exits early. */
  return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    this.buffer.length = 0;
    return Promise.resolve({ done: true, value: undefined });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    if (this.started) {
      throw new Error('EventQueue can only be iterated once');
    }
    this.started = true;
    return this;
  }
}
