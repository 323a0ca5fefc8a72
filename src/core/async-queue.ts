// Unbounded multi-producer, single-consumer async queue.

interface Waiter<T> {
  resolve: (value: T | null) => void;
  reject: (error: Error) => void;
}

/**
 * FIFO queue whose consumer awaits {@link AsyncQueue.next}.
 *
 * Once closed, buffered values are still handed out; after that `next()`
 * resolves `null`, or rejects with the close reason if one was given.
 */
export class AsyncQueue<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: Error | null = null;

  push(value: T): boolean {
    if (this.closed) {
      return false;
    }

    // If there's a waiter, deliver directly
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(value);
      return true;
    }

    this.buffer.push(value);
    return true;
  }

  next(): Promise<T | null> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) return Promise.resolve(value);
    }

    if (this.closed) {
      return this.failure ? Promise.reject(this.failure) : Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(error?: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = error ?? null;

    // Waiters only exist while the buffer is empty
    for (const waiter of this.waiters) {
      if (this.failure) waiter.reject(this.failure);
      else waiter.resolve(null);
    }
    this.waiters.length = 0;
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }
}
