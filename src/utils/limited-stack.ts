/**
 * @fileoverview Fixed-capacity stack that drops its oldest entry when full.
 *
 * @module utils/limited-stack
 */

/**
 * LIFO at the top, bounded at the bottom: pushing onto a full stack evicts
 * the oldest entry. Backed by a ring so push and pop are O(1).
 *
 * @example
 * ```typescript
 * const stack = new LimitedStack<number>(2);
 * stack.push(1);
 * stack.push(2);
 * stack.push(3);     // evicts 1
 * stack.pop();       // 3
 * stack.toArray();   // [2]
 * ```
 */
export class LimitedStack<T> {
  private slots: (T | undefined)[];
  /** Index of the oldest entry */
  private head = 0;
  private size = 0;
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LimitedStack capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.size;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  get isFull(): boolean {
    return this.size === this.capacity;
  }

  /**
   * Push an entry on top.
   *
   * @returns The evicted oldest entry when the stack was full, otherwise `undefined`
   */
  push(item: T): T | undefined {
    if (this.size === this.capacity) {
      const evicted = this.slots[this.head];
      this.slots[this.head] = item;
      this.head = (this.head + 1) % this.capacity;
      return evicted;
    }
    this.slots[(this.head + this.size) % this.capacity] = item;
    this.size++;
    return undefined;
  }

  /** Remove and return the newest entry. */
  pop(): T | undefined {
    if (this.size === 0) return undefined;
    const idx = (this.head + this.size - 1) % this.capacity;
    const item = this.slots[idx];
    this.slots[idx] = undefined;
    this.size--;
    return item;
  }

  /** The newest entry, left in place. */
  peek(): T | undefined {
    if (this.size === 0) return undefined;
    return this.slots[(this.head + this.size - 1) % this.capacity];
  }

  clear(): void {
    this.slots = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.size = 0;
  }

  /** Entries from oldest to newest. */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.size; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }
}
