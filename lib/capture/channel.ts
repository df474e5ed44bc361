/**
 * Single-slot hand-off between the capture producer and the frame consumer.
 * The slot always holds the most recent item; publishing over an unconsumed
 * item replaces it and counts the replaced one as dropped.
 */
export class LatestFrameChannel<T> {
  private slot: T | null = null;
  private waiter: ((item: T | null) => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  publish(item: T): void {
    if (this.closed) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return;
    }

    if (this.slot !== null) this.droppedCount += 1;
    this.slot = item;
  }

  /** Resolves with the latest item, or null once the channel is closed and empty. */
  take(): Promise<T | null> {
    if (this.slot !== null) {
      const item = this.slot;
      this.slot = null;
      return Promise.resolve(item);
    }
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Wake a waiting consumer with null and refuse further items. Pending items are discarded. */
  close(): void {
    this.closed = true;
    this.slot = null;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }
}
