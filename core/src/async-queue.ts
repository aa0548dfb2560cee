/**
 * AsyncQueue - single-consumer push queue consumed with `for await`.
 *
 * Producers push values (from callbacks, timers, other tasks); the consumer
 * pulls them in push order. `end()` finishes the iteration after the
 * buffered values drain; `fail(err)` makes the next pull throw. Breaking out
 * of the loop (or calling `return()`) closes the queue.
 */

interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: unknown) => void;
}

export class AsyncQueue<T> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { err: unknown } | null = null;

  constructor(signal?: AbortSignal) {
    if (signal) {
      if (signal.aborted) this.closed = true;
      else signal.addEventListener("abort", () => this.end(), { once: true });
    }
  }

  push(value: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve({ value, done: false });
    else this.buffer.push(value);
    return true;
  }

  end(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve({ value: undefined, done: true });
  }

  fail(err: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = { err };
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.failure) return Promise.reject(this.failure.err);
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  return(): Promise<IteratorResult<T>> {
    this.buffer = [];
    this.end();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
