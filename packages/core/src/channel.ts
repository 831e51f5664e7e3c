/**
 * Single-consumer async channel.
 *
 * Carries requests and responses between the engine and background work.
 * Closing the channel is how a peer says "stop": pending and future
 * receivers see `{ status: "closed" }` once the queued values are drained.
 */

export type ReceiveResult<T> =
  | { status: "ok"; value: T }
  | { status: "timeout" }
  | { status: "closed" };

export type TryReceiveResult<T> =
  | { status: "ok"; value: T }
  | { status: "empty" }
  | { status: "closed" };

interface Waiter<T> {
  resolve: (result: ReceiveResult<T>) => void;
  timeoutId: ReturnType<typeof setTimeout> | null;
}

export class Channel<T> {
  /** Boxed: payloads may themselves be undefined */
  private queue: Array<{ value: T }> = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  /**
   * Deliver a value. Returns false if the channel is closed.
   */
  send(value: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timeoutId) clearTimeout(waiter.timeoutId);
      waiter.resolve({ status: "ok", value });
    } else {
      this.queue.push({ value });
    }
    return true;
  }

  /**
   * Take a queued value without waiting.
   */
  tryReceive(): TryReceiveResult<T> {
    const boxed = this.queue.shift();
    if (boxed) return { status: "ok", value: boxed.value };
    return this.closed ? { status: "closed" } : { status: "empty" };
  }

  /**
   * Wait for a value. Without `timeoutMs` this waits until a value arrives
   * or the channel closes.
   */
  receive(timeoutMs?: number): Promise<ReceiveResult<T>> {
    const immediate = this.tryReceive();
    if (immediate.status !== "empty") return Promise.resolve(immediate);

    return new Promise((resolve) => {
      const waiter: Waiter<T> = { resolve, timeoutId: null };
      if (timeoutMs !== undefined) {
        waiter.timeoutId = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve({ status: "timeout" });
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Close the channel. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) {
      if (waiter.timeoutId) clearTimeout(waiter.timeoutId);
      waiter.resolve({ status: "closed" });
    }
    this.waiters = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of values waiting to be received */
  get pending(): number {
    return this.queue.length;
  }
}
