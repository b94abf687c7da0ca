import { QueueClosedError } from '../errors/queue-closed.error';

interface PendingPush<T> {
  item: T;
  resolve: () => void;
}

type PendingShift<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * In-process FIFO channel between async tasks.
 *
 * With capacity 0 every push waits until a consumer takes the item
 * (synchronous hand-off). With capacity n, up to n items are buffered before
 * pushes start waiting. Closing the queue lets consumers drain what was
 * already pushed and then end.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waitingProducers: PendingPush<T>[] = [];
  private readonly waitingConsumers: PendingShift<T>[] = [];
  private closed = false;

  constructor(
    private readonly capacity = 0,
    private readonly name = 'queue',
  ) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Queue ${name} capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves once the item has been accepted by a consumer or the buffer.
   */
  push(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError(this.name));
    }

    const consumer = this.waitingConsumers.shift();
    if (consumer) {
      consumer({ value: item, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }

    return new Promise<void>(resolve => {
      this.waitingProducers.push({ item, resolve });
    });
  }

  /**
   * Next item in FIFO order; done once the queue is closed and drained.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      // a slot just opened, so admit the oldest waiting producer
      const producer = this.waitingProducers.shift();
      if (producer) {
        this.buffer.push(producer.item);
        producer.resolve();
      }
      return Promise.resolve({ value, done: false });
    }

    const producer = this.waitingProducers.shift();
    if (producer) {
      producer.resolve();
      return Promise.resolve({ value: producer.item, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise(resolve => {
      this.waitingConsumers.push(resolve);
    });
  }

  /**
   * Next item, or undefined once the queue is closed and drained.
   */
  async shift(): Promise<T | undefined> {
    const result = await this.next();
    return result.done ? undefined : result.value;
  }

  /**
   * Stop accepting items. Idempotent. Items pushed before closing are still
   * delivered; consumers waiting on an empty queue are released.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    // consumers only wait when nothing is buffered or pending
    for (const consumer of this.waitingConsumers.splice(0)) {
      consumer({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    };
  }
}
