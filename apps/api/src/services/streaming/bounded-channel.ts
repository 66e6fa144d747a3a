interface Slot<T> {
  readonly value: T;
}

type Reader<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Single-producer, single-consumer queue with a fixed capacity.
 *
 * `push` waits while the buffer is full, which is what slows a producer down
 * to the pace of a slow consumer. When the consumer stops iterating (or
 * `cancel` is called) pending and future pushes resolve `false` and the
 * `onCancel` callback fires once.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: Slot<T>[] = [];
  private readonly readers: Reader<T>[] = [];
  private readonly writers: (() => void)[] = [];
  private closed = false;
  private cancelled = false;

  constructor(
    private readonly capacity: number,
    private readonly onCancel?: () => void,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Resolves `false` once the consumer has gone away. */
  async push(value: T): Promise<boolean> {
    while (!this.cancelled && !this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.writers.push(resolve));
    }
    if (this.cancelled || this.closed) return false;

    const reader = this.readers.shift();
    if (reader) reader({ value, done: false });
    else this.buffer.push({ value });
    return true;
  }

  /** No more values will be pushed; buffered values are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeWriters();
    if (this.buffer.length === 0) this.finishReaders();
  }

  /** Consumer side: discard buffered values and stop the producer. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.buffer.length = 0;
    this.wakeWriters();
    this.finishReaders();
    this.onCancel?.();
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head) {
      this.writers.shift()?.();
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.closed || this.cancelled) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.readers.push(resolve));
  }

  private wakeWriters(): void {
    for (const wake of this.writers.splice(0)) wake();
  }

  private finishReaders(): void {
    for (const reader of this.readers.splice(0)) reader({ value: undefined, done: true });
  }
}
