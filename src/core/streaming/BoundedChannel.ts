/**
 * Single-consumer async queue with a fixed capacity. A producer awaiting
 * `push` on a full channel is paused until the consumer takes an item.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private closed = false;
  private takers: Array<(result: IteratorResult<T>) => void> = [];
  private spaceWaiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Resolves true once the item is queued, or false if the channel was
   * closed before there was room for it.
   */
  async push(item: T): Promise<boolean> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>(resolve => this.spaceWaiters.push(resolve));
    }
    if (this.closed) return false;

    const taker = this.takers.shift();
    if (taker) {
      taker({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  /** No more pushes; buffered items are still delivered */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.takers.splice(0).forEach(taker => taker({ value: undefined, done: true }));
    this.spaceWaiters.splice(0).forEach(wake => wake());
  }

  /** Close and drop whatever is buffered */
  cancel(): void {
    this.buffer = [];
    this.close();
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.spaceWaiters.shift()?.();
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.takers.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }
}
