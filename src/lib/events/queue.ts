import type { QueueResult } from './types.js';

interface Waiter<T> {
  resolve: (result: QueueResult<T>) => void;
  reject: (err: unknown) => void;
}

/**
 * Unbounded FIFO between a push-based producer and an awaiting consumer.
 * Values pushed while nobody waits are kept until read.
 */
export class AsyncQueue<T> {
  private readonly values: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  get size(): number {
    return this.values.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve({ done: false, value });
    else this.values.push(value);
  }

  /** End the stream. Buffered values are still delivered first. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve({ done: true });
  }

  /** End the stream with an error. Pending and later reads reject. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = { error };
    for (const waiter of this.waiters.splice(0)) waiter.reject(error);
  }

  next(): Promise<QueueResult<T>> {
    if (this.values.length > 0) {
      const [value] = this.values.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.failure) return Promise.reject(this.failure.error);
    if (this.closed) return Promise.resolve({ done: true });
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
