/**
 * Unbounded FIFO queue with awaitable receive.
 *
 * `put` never blocks. `get` resolves with the next item, or with a timeout or
 * abort outcome when nothing arrives in time. Items are handed to waiters in
 * the order the waiters started waiting.
 */

export type QueueReceiveResult<T> =
  | { kind: "item"; value: T }
  | { kind: "timeout" }
  | { kind: "aborted" };

export interface QueueReceiveOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

type Waiter<T> = (result: QueueReceiveResult<T>) => void;

export class AsyncQueue<T> {
  private items: Array<{ value: T }> = [];
  private waiters: Array<Waiter<T>> = [];

  get size(): number {
    return this.items.length;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  put(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ kind: "item", value: item });
      return;
    }
    this.items.push({ value: item });
  }

  tryGet(): T | undefined {
    return this.items.shift()?.value;
  }

  get(options: QueueReceiveOptions = {}): Promise<QueueReceiveResult<T>> {
    const head = this.items.shift();
    if (head) {
      return Promise.resolve({ kind: "item", value: head.value });
    }
    const signal = options.signal;
    if (signal?.aborted) {
      return Promise.resolve({ kind: "aborted" });
    }

    return new Promise<QueueReceiveResult<T>>((resolve) => {
      let timer: NodeJS.Timeout | null = null;

      const settle = (result: QueueReceiveResult<T>) => {
        if (timer) {
          clearTimeout(timer);
          timer = null;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };

      const waiter: Waiter<T> = (result) => settle(result);

      const detach = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
      };

      const onAbort = () => {
        detach();
        settle({ kind: "aborted" });
      };

      if (options.timeoutMs !== undefined && Number.isFinite(options.timeoutMs)) {
        timer = setTimeout(() => {
          timer = null;
          detach();
          settle({ kind: "timeout" });
        }, Math.max(0, options.timeoutMs));
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Removes and returns every queued item. Pending waiters keep waiting. */
  drain(): T[] {
    return this.items.splice(0).map((entry) => entry.value);
  }
}
