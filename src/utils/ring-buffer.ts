/**
 * Fixed-capacity FIFO history store. Pushing onto a full buffer evicts the
 * oldest entry.
 *
 * @example
 * ```typescript
 * const history = new RingBuffer<number>(3);
 * [1, 2, 3, 4].forEach(n => history.push(n));
 * history.toArray(); // [2, 3, 4]
 * ```
 */
export class RingBuffer<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Appends an item and returns the evicted one, if any
   */
  push(item: T): T | undefined {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      return this.items.shift();
    }
    return undefined;
  }

  latest(): T | undefined {
    return this.items[this.items.length - 1];
  }

  /**
   * Copy of the retained items, oldest first
   */
  toArray(): T[] {
    return [...this.items];
  }

  /**
   * The newest `count` items, oldest first
   */
  tail(count: number): T[] {
    if (count <= 0) return [];
    return this.items.slice(-count);
  }

  clear(): void {
    this.items = [];
  }
}
