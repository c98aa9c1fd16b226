export class QueueTakeAbortedError extends Error {
  constructor() {
    super("queue_take_aborted");
    this.name = "QueueTakeAbortedError";
  }
}

type Waiter<T> = {
  resolve: (item: T) => void;
  detach: () => void;
};

/**
 * Bounded FIFO with a suspending `take`. A consumer waiting in `take` is
 * handed the next offered item directly.
 */
export class JobQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("queue_capacity_invalid");
    }
  }

  get size(): number {
    return this.items.length;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Returns false, without queueing, when the queue is full.
   */
  offer(item: T): boolean {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve(item);
      return true;
    }
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  take(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new QueueTakeAbortedError());
    }
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new QueueTakeAbortedError());
      };
      const waiter: Waiter<T> = {
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }
}
