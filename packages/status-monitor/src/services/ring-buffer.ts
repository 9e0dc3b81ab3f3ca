/**
 * Fixed-capacity circular buffer. Once full, each push overwrites the oldest
 * entry. Reads return entries oldest first.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  /** Append an item; returns the evicted item when the buffer was full. */
  push(item: T): T | undefined {
    const index = (this.head + this.length) % this.capacity;
    if (this.length < this.capacity) {
      this.slots[index] = item;
      this.length++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** Most recently pushed item. */
  latest(): T | undefined {
    if (this.length === 0) return undefined;
    return this.slots[(this.head + this.length - 1) % this.capacity];
  }

  /** The last `count` items, oldest first. */
  last(count: number): T[] {
    const n = Math.max(0, Math.min(Math.floor(count), this.length));
    const out: T[] = [];
    for (let i = this.length - n; i < this.length; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  toArray(): T[] {
    return this.last(this.length);
  }

  /** Newest-first scan; returns the first item matching the predicate. */
  findLast(predicate: (item: T) => boolean): T | undefined {
    for (let i = this.length - 1; i >= 0; i--) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined && predicate(item)) return item;
    }
    return undefined;
  }
}
