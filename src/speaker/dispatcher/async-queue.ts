/**
 * Async Queue
 *
 * Unbounded FIFO whose get() waits for the next item. Closing rejects pending
 * and future get() calls with QueueClosedError; items already queued are
 * discarded.
 */

export class QueueClosedError extends Error {
  constructor() {
    super('Queue is closed');
    this.name = 'QueueClosedError';
  }
}

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
}

export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private closed = false;

  put(item: T): void {
    if (this.closed) {
      throw new QueueClosedError();
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.items.push(item);
    }
  }

  get(): Promise<T> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.items = [];
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(new QueueClosedError());
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }
}
