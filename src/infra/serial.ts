export class QueueFullError extends Error {
  public constructor(maxWaiting: number) {
    super(`Queue is full (${maxWaiting} waiting)`);
    this.name = 'QueueFullError';
  }
}

/**
 * Runs tasks one at a time in arrival order.
 * A task that rejects does not stop the ones queued behind it.
 * At most `maxWaiting` tasks wait behind the running one; further tasks are rejected with
 * `QueueFullError` without running.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  /** Tasks accepted and not yet settled, the running one included. */
  private size = 0;

  public constructor(private readonly maxWaiting = Number.POSITIVE_INFINITY) {}

  public get pending(): number {
    return this.waiting;
  }

  /** True when a new task would be rejected. */
  public get isFull(): boolean {
    return this.size > this.maxWaiting;
  }

  public run<T>(task: () => Promise<T>): Promise<T> {
    if (this.isFull) {
      return Promise.reject(new QueueFullError(this.maxWaiting));
    }
    this.waiting += 1;
    this.size += 1;
    const result = this.tail.then(async () => {
      this.waiting -= 1;
      try {
        return await task();
      } finally {
        this.size -= 1;
      }
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
