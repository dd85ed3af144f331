/**
 * Bounded FIFO shared by a fixed set of async consumers.
 *
 * `push` never waits: a full queue refuses the item and the caller decides
 * what a refusal means. `take` resolves with the next item, or with
 * `undefined` once the queue is closed and empty.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  constructor(private readonly capacity: () => number) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    if (this.items.length >= this.capacity()) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  take(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Removes and returns the oldest waiting item. */
  dropOldest(): T | undefined {
    return this.items.shift();
  }

  /** Removes and returns everything still waiting. */
  drain(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }

  /** No new items; consumers finish what is queued, then see `undefined`. */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }
}
