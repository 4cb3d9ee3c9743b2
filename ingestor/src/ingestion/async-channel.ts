type PendingPush<T> = {
  value: T;
  resolve: (accepted: boolean) => void;
};

type Slot<T> = { value: T };

type PendingPull<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Bounded FIFO between producers and a single async consumer. Producers wait
 * in `push` while the buffer is full; values come out in push order.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private buffer: Slot<T>[] = [];
  private pushers: PendingPush<T>[] = [];
  private pullers: PendingPull<T>[] = [];
  private closed = false;
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Resolves true once buffered, false if the channel closed first. */
  push(value: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);

    const puller = this.pullers.shift();
    if (puller) {
      puller({ value, done: false });
      return Promise.resolve(true);
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      this.pushers.push({ value, resolve });
    });
  }

  /** No more values; buffered ones are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const pending of this.pushers) pending.resolve(false);
    this.pushers = [];
    if (this.buffer.length === 0) this.releasePullers();
  }

  private releasePullers(): void {
    for (const puller of this.pullers) puller({ value: undefined, done: true });
    this.pullers = [];
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head) {
      const waiting = this.pushers.shift();
      if (waiting) {
        this.buffer.push({ value: waiting.value });
        waiting.resolve(true);
      }
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.pullers.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        // Consumer went away: drop what is buffered and turn producers away
        this.buffer = [];
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
