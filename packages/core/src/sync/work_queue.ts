/**
 * WorkQueue - Bounded Async Queue
 *
 * FIFO buffer of at most `capacity` items shared by one producer and many
 * consumers. `enqueue` suspends while the buffer is full instead of dropping
 * items; `dequeue` suspends while it is empty. Both give up when their abort
 * signal fires. After `close()` the remaining items can still be dequeued,
 * then every consumer receives `undefined`.
 *
 * @module sync/work_queue
 */

export class QueueClosedError extends Error {
  constructor() {
    super("Cannot enqueue on a closed queue");
    this.name = "QueueClosedError";
    Object.setPrototypeOf(this, QueueClosedError.prototype);
  }
}

type Consumer<T> = (item: T | undefined) => void;

export class WorkQueue<T extends object> {
  private readonly capacity: number;
  private readonly items: T[] = [];
  private readonly consumers: Array<Consumer<T>> = [];
  private readonly producers: Array<() => void> = [];
  private closed: boolean = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Items buffered and not yet taken by a consumer */
  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Hands the item to a waiting consumer or buffers it, suspending while the
   * buffer is full.
   *
   * @returns false if `signal` aborted before the item was accepted
   * @throws QueueClosedError if the queue is closed
   */
  async enqueue(item: T, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (this.closed) {
        throw new QueueClosedError();
      }
      if (signal?.aborted) {
        return false;
      }

      const consumer = this.consumers.shift();
      if (consumer) {
        consumer(item);
        return true;
      }

      if (this.items.length < this.capacity) {
        this.items.push(item);
        return true;
      }

      await this.waitForSpace(signal);
    }
  }

  /**
   * Takes the next item, suspending while the queue is empty.
   *
   * @returns undefined once the queue is closed and drained, or when `signal`
   * has aborted and nothing is buffered
   */
  dequeue(signal?: AbortSignal): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) {
      this.producers.shift()?.();
      return Promise.resolve(item);
    }

    if (this.closed || signal?.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      const deliver: Consumer<T> = (next) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(next);
      };
      const onAbort = () => {
        const index = this.consumers.indexOf(deliver);
        if (index >= 0) {
          this.consumers.splice(index, 1);
        }
        resolve(undefined);
      };

      this.consumers.push(deliver);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Stops accepting items. Buffered items stay available to consumers.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const consumer of this.consumers.splice(0)) {
      consumer(undefined);
    }
    for (const producer of this.producers.splice(0)) {
      producer();
    }
  }

  private waitForSpace(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const wake = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      const onAbort = () => {
        const index = this.producers.indexOf(wake);
        if (index >= 0) {
          this.producers.splice(index, 1);
        }
        resolve();
      };

      this.producers.push(wake);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
