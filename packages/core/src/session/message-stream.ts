interface Waiter {
  resolve: (result: IteratorResult<Uint8Array>) => void;
  reject: (error: Error) => void;
}

/**
 * Ordered, pull-based stream of reassembled messages. A consumer waiting on `next()` is suspended
 * until a message arrives or the stream ends. A failure is thrown once, after any queued messages;
 * later reads report the end of the stream.
 */
export class MessageStream implements AsyncIterable<Uint8Array> {
  private queue: Uint8Array[] = [];
  private waiters: Waiter[] = [];
  private ended = false;
  private failure: Error | null = null;
  private failureReported = false;

  push(message: Uint8Array): void {
    if (this.ended || this.failure) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: message, done: false });
    } else {
      this.queue.push(message);
    }
  }

  end(): void {
    if (this.ended || this.failure) return;
    this.ended = true;
    this.settleWaiters();
  }

  fail(error: Error): void {
    if (this.ended || this.failure) return;
    this.failure = error;
    this.settleWaiters();
  }

  next(): Promise<IteratorResult<Uint8Array>> {
    const message = this.queue.shift();
    if (message) {
      return Promise.resolve({ value: message, done: false });
    }
    if (this.failure && !this.failureReported) {
      this.failureReported = true;
      return Promise.reject(this.failure);
    }
    if (this.ended || this.failure) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  get isFinished(): boolean {
    return this.ended || this.failure !== null;
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    return {
      next: () => this.next(),
      return: () => Promise.resolve({ value: undefined, done: true }),
    };
  }

  private settleWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (this.failure && !this.failureReported) {
        this.failureReported = true;
        waiter.reject(this.failure);
      } else {
        waiter.resolve({ value: undefined, done: true });
      }
    }
  }
}
