/**
 * Bounded FIFO that runs one item at a time.
 *
 * The feed transport pushes messages synchronously and does not wait for
 * the previous one to finish. This queue restores serialized processing and
 * caps the backlog: once `capacity` items are waiting or running, `push`
 * refuses new ones and the caller decides what to do with them.
 *
 * `close()` stops intake and skips every item that has not started yet;
 * the one running keeps going and `drain()` waits only for it.
 */
export class DeliveryQueue<T> {
  private tail: Promise<void> = Promise.resolve();
  private inFlight = 0;
  private active = false;
  private closed = false;

  constructor(
    readonly capacity: number,
    private readonly run: (item: T) => Promise<void>,
    private readonly onFailure: (err: unknown, item: T) => void,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Items accepted but not yet finished. */
  get pending(): number {
    return this.inFlight;
  }

  /** Enqueues `item`. Returns false (and does nothing) when the queue is full. */
  push(item: T): boolean {
    if (this.closed || this.inFlight >= this.capacity) return false;

    this.inFlight++;
    this.tail = this.tail
      .then(async () => {
        if (this.closed) return;
        this.active = true;
        await this.run(item);
      })
      .catch((err: unknown) => this.onFailure(err, item))
      .finally(() => {
        this.active = false;
        this.inFlight--;
      });
    return true;
  }

  /** Refuses further pushes. Returns how many waiting items will be skipped. */
  close(): number {
    this.closed = true;
    return this.inFlight - (this.active ? 1 : 0);
  }

  /** Resolves once every item accepted so far has been processed. */
  drain(): Promise<void> {
    return this.tail;
  }
}
