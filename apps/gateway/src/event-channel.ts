export type OfferResult = 'accepted' | 'full' | 'closed';

/**
 * Bounded single-consumer FIFO. Producers never wait: `offer` either accepts
 * the item or reports why it did not. The consumer iterates with `for await`
 * and the iteration ends once the channel is closed and drained.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): OfferResult {
    if (this.closed) return 'closed';

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return 'accepted';
    }

    if (this.buffer.length >= this.capacity) return 'full';
    this.buffer.push(item);
    return 'accepted';
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [head] = this.buffer.splice(0, 1);
      return Promise.resolve({ value: head, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
