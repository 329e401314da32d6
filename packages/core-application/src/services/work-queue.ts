type Waiter<T> = (value: T) => void;

/**
 * FIFO queue shared by the pool's workers. It only ever holds work items
 * (paths), never file contents.
 */
export class WorkQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Waiter<T | undefined>[] = [];
  private readonly pushers: Waiter<void>[] = [];
  private closed = false;

  constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) {
    if (!(capacity >= 1)) {
      throw new RangeError(`Queue capacity must be at least 1, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Resolves once the item is queued; waits while the queue is full. */
  async push(item: T): Promise<void> {
    if (this.closed) throw new Error("Cannot push to a closed queue");

    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return;
    }

    while (this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.pushers.push(resolve));
      if (this.closed) throw new Error("Cannot push to a closed queue");
    }

    this.items.push(item);
  }

  /** Next item, or `undefined` once the queue is closed and drained. */
  async take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.pushers.shift()?.();
      return item;
    }

    if (this.closed) return undefined;

    return new Promise<T | undefined>((resolve) => this.takers.push(resolve));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const taker of this.takers.splice(0)) taker(undefined);
    for (const pusher of this.pushers.splice(0)) pusher();
  }
}
