/**
 * An unbounded FIFO with a single bounded wait. Producers never block; the
 * one consumer awaits the next item or gives up after a deadline.
 */
export class MessageChannel<T> {
  private readonly items: T[] = [];
  private waiter?: (item: T | undefined) => void;

  public get size(): number {
    return this.items.length;
  }

  public push(item: T): void {
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = undefined;
      deliver(item);
      return;
    }
    this.items.push(item);
  }

  /** Discards every queued item and returns how many were dropped. */
  public drain(): number {
    const dropped = this.items.length;
    this.items.length = 0;
    return dropped;
  }

  /**
   * Resolves with the next item, or `undefined` once `timeoutMs` elapses
   * without one. Only one receive may be outstanding at a time.
   */
  public receive(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.waiter) {
      return Promise.reject(new Error('MessageChannel already has a pending receive'));
    }
    return new Promise<T | undefined>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve(undefined);
      }, Math.max(0, timeoutMs));
      this.waiter = (item) => {
        clearTimeout(timer);
        resolve(item);
      };
    });
  }
}
