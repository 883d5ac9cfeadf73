/**
 * subscriber-queue.ts
 * Bounded FIFO between the feed and one SSE connection. Producers never wait.
 */

export class SubscriberQueue<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T | null) => void) | undefined;
  private closed = false;

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /**
   * Enqueue without blocking. Returns false when the queue is full or closed.
   */
  offer(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve(item);
      return true;
    }
    if (this.isFull()) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  /**
   * Evict the oldest queued item. Returns false when the queue was empty.
   */
  dropOldest(): boolean {
    return this.items.shift() !== undefined;
  }

  /**
   * Next item, or null once `timeoutMs` passes or the queue is closed.
   * Only one caller may wait at a time.
   */
  next(timeoutMs: number): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error('SubscriberQueue already has a waiting consumer'));
    }
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve(null);
      }, timeoutMs);
      this.waiter = value => {
        clearTimeout(timer);
        resolve(value);
      };
    });
  }

  close(): void {
    this.closed = true;
    this.items.length = 0;
    const resolve = this.waiter;
    this.waiter = undefined;
    resolve?.(null);
  }
}
