/**
 * CircularBuffer - fixed-size buffer that keeps the most recent items
 *
 * Backs the activation history, where only the last few entries matter
 * and older ones are dropped as new ones arrive.
 *
 * @example
 * const buffer = new CircularBuffer<string>(3);
 * buffer.pushMany(['a', 'b', 'c', 'd']);
 * buffer.toArray(); // ['b', 'c', 'd']
 * buffer.newestFirst(); // ['d', 'c', 'b']
 */
export class CircularBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0; // Index of oldest item
  private count = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error('CircularBuffer capacity must be a positive integer');
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  /**
   * Add an item. Overwrites the oldest item once the buffer is full.
   */
  push(item: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.buffer[tail] = item;

    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  pushMany(items: Iterable<T>): void {
    for (const item of items) {
      this.push(item);
    }
  }

  /**
   * Items oldest to newest, as a new array.
   */
  toArray(): T[] {
    return [...this];
  }

  /**
   * Items newest to oldest, as a new array.
   */
  newestFirst(): T[] {
    return this.toArray().reverse();
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }

  get length(): number {
    return this.count;
  }

  get size(): number {
    return this.capacity;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head + i) % this.capacity];
      if (item !== undefined) {
        yield item;
      }
    }
  }
}
