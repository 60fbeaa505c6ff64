/**
 * Many-producer / single-consumer result queue
 */

export type ReceiveResult<T> = { done: false; value: T } | { done: true };

interface Waiter<T> {
  resolve: (result: ReceiveResult<T>) => void;
  reject: (error: unknown) => void;
}

/**
 * Unbounded async queue. Producers `push`; the single consumer awaits
 * `receive()`, which resolves `{ done: true }` once the channel is closed and
 * drained, or rejects once it has been failed and drained.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiter: Waiter<T> | undefined;
  private closed = false;
  private failure: { error: unknown } | undefined;

  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed result channel');
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.resolve({ done: false, value: item });
      return;
    }
    this.buffer.push(item);
  }

  /**
   * End of stream: no more producers. Buffered items are still delivered.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.settleWaiter();
  }

  /**
   * End of stream with an error the consumer must see
   */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    this.settleWaiter();
  }

  receive(): Promise<ReceiveResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve({ done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('Result channel supports a single consumer'));
    }
    return new Promise<ReceiveResult<T>>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }

  private settleWaiter(): void {
    const waiter = this.waiter;
    if (!waiter) return;
    this.waiter = undefined;
    if (this.failure) {
      waiter.reject(this.failure.error);
    } else {
      waiter.resolve({ done: true });
    }
  }
}
