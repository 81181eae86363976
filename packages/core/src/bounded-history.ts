/**
 * @module bounded-history
 * Fixed-capacity record of executed entries, oldest first.
 */

/** Default number of entries retained. */
export const DEFAULT_HISTORY_CAPACITY = 10;

/**
 * Ordered history that never grows past `capacity`.
 *
 * Pushing onto a full history drops the oldest entry before appending, in
 * the same synchronous call, so `size <= capacity` holds between calls.
 *
 * @typeParam E - Entry type.
 */
export class BoundedHistory<E> {
  readonly capacity: number;

  private items: E[] = [];

  /**
   * @param capacity - Maximum number of entries (default 10).
   * @throws RangeError if capacity is not an integer of at least 1.
   */
  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('capacity must be an integer of at least 1');
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /**
   * Append an entry, evicting the oldest one first when full.
   * @returns The evicted entry, or undefined when nothing was dropped.
   */
  push(entry: E): E | undefined {
    const evicted = this.isFull ? this.items.shift() : undefined;
    this.items.push(entry);
    return evicted;
  }

  /** Remove and return the newest entry. */
  pop(): E | undefined {
    return this.items.pop();
  }

  /** Newest entry without removing it. */
  peek(): E | undefined {
    return this.items.length > 0 ? this.items[this.items.length - 1] : undefined;
  }

  /** Copy of the entries, oldest first. */
  toArray(): E[] {
    return [...this.items];
  }

  clear(): void {
    this.items = [];
  }
}
