export type ChannelTakeResult<T> =
  | { type: "item"; value: T }
  | { type: "timeout" }
  | { type: "aborted" }
  | { type: "closed" };

export interface ChannelTakeOptions {
  /** Give up after this long and resolve with `timeout`. Waits forever when omitted. */
  timeoutMs?: number;
  /** Aborting wakes a pending take immediately with `aborted`. */
  signal?: AbortSignal;
}

type Waiter<T> = (result: ChannelTakeResult<T>) => void;

/**
 * Unbounded FIFO between one producer (the event bus) and one consumer
 * (a relay worker).
 *
 * Closing the channel drops nothing already queued: pending items are still
 * handed out, after which every take resolves with `closed`.
 */
export class EventChannel<T> {
  private queue: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ type: "item", value: item });
    } else {
      this.queue.push(item);
    }
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter({ type: "closed" });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  take(options: ChannelTakeOptions = {}): Promise<ChannelTakeResult<T>> {
    if (this.queue.length > 0) {
      const [value] = this.queue.splice(0, 1);
      return Promise.resolve<ChannelTakeResult<T>>({ type: "item", value });
    }
    if (this.closed) {
      return Promise.resolve<ChannelTakeResult<T>>({ type: "closed" });
    }
    const { timeoutMs, signal } = options;
    if (signal?.aborted) {
      return Promise.resolve<ChannelTakeResult<T>>({ type: "aborted" });
    }

    return new Promise<ChannelTakeResult<T>>((resolve) => {
      let timer: NodeJS.Timeout | null = null;

      const settle: Waiter<T> = (result) => {
        if (timer) {
          clearTimeout(timer);
          timer = null;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };

      const detach = (): void => {
        const index = this.waiters.indexOf(settle);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
      };

      const onAbort = (): void => {
        detach();
        settle({ type: "aborted" });
      };

      this.waiters.push(settle);
      signal?.addEventListener("abort", onAbort, { once: true });
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          detach();
          settle({ type: "timeout" });
        }, timeoutMs);
      }
    });
  }
}
