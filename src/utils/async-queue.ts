/**
 * Single-consumer push/pull channel. Producers `push` from event callbacks;
 * the consumer pulls with `for await`. `end()` finishes iteration once the
 * backlog is drained, `fail()` makes the next pull throw.
 */
export class AsyncQueue<T extends object> {
  private items: T[] = [];
  private waiters: Array<{ resolve: (r: IteratorResult<T>) => void; reject: (err: unknown) => void }> = [];
  private ended = false;
  private error: unknown = null;

  get isEnded(): boolean {
    return this.ended;
  }

  push(item: T): void {
    if (this.ended) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(err: unknown): void {
    if (this.ended) return;
    this.error = err;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }

  /** Settle pending pulls as done so later pushes stay queued for the next consumer. */
  private releaseWaiters(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve({ value: item, done: false });
    if (this.error !== null) return Promise.reject(this.error);
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  /**
   * Iterate until the queue ends or `signal` aborts. Aborting resolves any
   * pending pull as done, so the consumer's loop exits promptly and items
   * pushed afterwards are kept.
   */
  async *iterate(signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
    if (signal?.aborted) return;
    let release = (): void => {};
    const aborted = new Promise<IteratorResult<T>>((resolve) => {
      release = () => {
        this.releaseWaiters();
        resolve({ value: undefined, done: true });
      };
    });
    signal?.addEventListener('abort', release, { once: true });

    try {
      while (true) {
        const result = await Promise.race([this.next(), aborted]);
        if (result.done || signal?.aborted) return;
        yield result.value;
      }
    } finally {
      signal?.removeEventListener('abort', release);
    }
  }
}
