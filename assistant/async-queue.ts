/**
 * Async iterable backed by a push queue.
 *
 * Used as the orchestrator's signal channel and as the bounded frame buffer
 * between the microphone process and the listener. Single consumer.
 */

// ============================================================================
// ASYNC QUEUE
// ============================================================================

export class AsyncQueue<T> implements AsyncIterable<T> {
  private buf: T[] = [];
  private resolve: ((r: IteratorResult<T, undefined>) => void) | null = null;
  private done = false;
  private droppedCount = 0;

  /**
   * @param capacity - When set, pushing onto a full queue drops the oldest item
   */
  constructor(private readonly capacity: number = Infinity) {}

  /** Items discarded because the queue was full */
  get dropped(): number {
    return this.droppedCount;
  }

  get closed(): boolean {
    return this.done;
  }

  get size(): number {
    return this.buf.length;
  }

  push(item: T): void {
    if (this.done) return;
    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: item, done: false });
      return;
    }
    if (this.buf.length >= this.capacity) {
      this.buf.shift();
      this.droppedCount++;
    }
    this.buf.push(item);
  }

  /** End iteration once buffered items are drained */
  close(): void {
    this.done = true;
    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: undefined, done: true });
    }
  }

  /** Read one item, or undefined once closed and drained */
  async next(): Promise<T | undefined> {
    const result = await this.read();
    return result.done ? undefined : result.value;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.read(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private read(): Promise<IteratorResult<T, undefined>> {
    if (this.buf.length > 0) {
      const [item] = this.buf.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.done) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T, undefined>>((r) => {
      this.resolve = r;
    });
  }
}
