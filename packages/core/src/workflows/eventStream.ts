interface Waiter<T> {
  resolve: (value: IteratorResult<T>) => void;
  reject: (reason: unknown) => void;
}

/**
 * Single-producer, multi-consumer async queue. Iterators share one position:
 * a value is delivered to exactly one `next()` call, and leaving a `for await`
 * early does not close the stream for other consumers.
 */
export class WorkflowEventStream<T> {
  private readonly queue: T[] = [];
  private readonly waiting: Waiter<T>[] = [];
  private done = false;
  private failure?: { error: unknown };

  /** Consumers blocked in `next()`. */
  get pendingConsumers() {
    return this.waiting.length;
  }

  push(value: T) {
    if (this.done) {
      return;
    }

    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
      return;
    }

    this.queue.push(value);
  }

  end() {
    if (this.done) {
      return;
    }

    this.done = true;

    for (const waiter of this.waiting.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /** Ends the stream; consumers reject with `error` once buffered values are drained. */
  fail(error: unknown) {
    if (this.done) {
      return;
    }

    this.done = true;
    this.failure = { error };

    for (const waiter of this.waiting.splice(0)) {
      waiter.reject(error);
    }
  }

  next(): Promise<IteratorResult<T>> {
    const value = this.queue.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }

    if (this.failure) {
      return Promise.reject(this.failure.error);
    }

    if (this.done) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  iterator(onPull?: () => void): AsyncIterableIterator<T> {
    const stream = this;

    return {
      [Symbol.asyncIterator]() {
        return this;
      },
      next(): Promise<IteratorResult<T>> {
        const pending = stream.next();
        onPull?.();
        return pending;
      },
      return(): Promise<IteratorResult<T>> {
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
