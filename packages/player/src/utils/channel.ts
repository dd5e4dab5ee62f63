/**
 * Bounded single-consumer channel with a sliding buffer
 *
 * put() never blocks: once the buffer holds `capacity` items, each new item
 * evicts the oldest one, which is handed to `onDrop`.
 */

export type TakeResult<T> = { done: false; value: T } | { done: true };

export interface ChannelOptions<T> {
  capacity: number;
  onDrop?: (item: T) => void;
}

export class SlidingChannel<T> {
  private buffer: T[] = [];
  private takers: ((result: TakeResult<T>) => void)[] = [];
  private closed = false;
  private readonly capacity: number;
  private readonly onDrop?: (item: T) => void;

  constructor(options: ChannelOptions<T>) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.onDrop = options.onDrop;
  }

  /**
   * Offer an item
   *
   * @returns false if the channel is closed and the item was not accepted
   */
  put(item: T): boolean {
    if (this.closed) return false;

    const taker = this.takers.shift();
    if (taker) {
      taker({ done: false, value: item });
      return true;
    }

    this.buffer.push(item);
    if (this.buffer.length > this.capacity) {
      const dropped = this.buffer.shift();
      if (dropped !== undefined) {
        this.onDrop?.(dropped);
      }
    }
    return true;
  }

  /**
   * Wait for the next item. Resolves `{ done: true }` once the channel is closed.
   */
  take(): Promise<TakeResult<T>> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      return Promise.resolve({ done: false, value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true });
    }
    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  /**
   * Close the channel, wake pending takers and hand back undelivered items
   */
  close(): T[] {
    if (this.closed) return [];
    this.closed = true;

    const waiting = this.takers;
    this.takers = [];
    waiting.forEach((taker) => taker({ done: true }));

    const undelivered = this.buffer;
    this.buffer = [];
    return undelivered;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
