// Fixed-capacity ring buffer

/**
 * Keeps the last `capacity` items. Pushing onto a full buffer evicts
 * the oldest item and returns it.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  push(item: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.start + this.count) % this.capacity] = item;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.start];
    this.slots[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  get size(): number {
    return this.count;
  }

  /**
   * Oldest first
   */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  /**
   * The newest `n` items, oldest first
   */
  last(n: number): T[] {
    const items = this.toArray();
    return n >= items.length ? items : items.slice(items.length - Math.max(0, n));
  }
}
