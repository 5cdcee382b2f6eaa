/**
 * @file packages/core/src/infrastructure/events/async-queue.ts
 * @description Unbounded FIFO with awaitable takes, used for subscriber queues and work queues.
 */

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  cleanup: () => void;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export class AsyncQueue<T> {
  // Boxed so a queued `undefined` is distinguishable from an empty queue.
  private items: Array<{ value: T }> = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueues an item, handing it straight to the oldest waiting taker if there is one.
   * Items pushed after close are dropped.
   */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve({ done: false, value: item });
    } else {
      this.items.push({ value: item });
    }
    return true;
  }

  /**
   * Takes the next item, waiting if the queue is empty. Resolves `done` once the queue
   * is closed and drained, or when `signal` aborts.
   */
  next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    const head = this.items.shift();
    if (head) {
      return Promise.resolve({ done: false, value: head.value });
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(DONE);
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(DONE);
      };
      const waiter: Waiter<T> = {
        resolve,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Non-destructive view of buffered items. */
  peek(): readonly T[] {
    return this.items.map((entry) => entry.value);
  }

  /** Drops buffered items and returns them. */
  clear(): T[] {
    const dropped = this.items.map((entry) => entry.value);
    this.items = [];
    return dropped;
  }

  /**
   * Stops accepting items and releases every waiting taker. Buffered items remain
   * takeable.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.cleanup();
      waiter.resolve(DONE);
    }
  }
}
