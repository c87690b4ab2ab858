/**
 * Fixed-capacity FIFO ring. Appending to a full ring overwrites the
 * oldest slot, so both append and eviction are O(1).
 */

export class RingBuffer<T extends object> {
  private slots: Array<T | undefined>;
  private head = 0;
  private length = 0;

  constructor(capacity: number) {
    this.slots = new Array<T | undefined>(checkCapacity(capacity));
  }

  get capacity(): number {
    return this.slots.length;
  }

  get size(): number {
    return this.length;
  }

  /** Append an item. Returns the number of items evicted (0 or 1). */
  push(item: T): number {
    const cap = this.slots.length;
    if (this.length < cap) {
      this.slots[(this.head + this.length) % cap] = item;
      this.length++;
      return 0;
    }
    this.slots[this.head] = item;
    this.head = (this.head + 1) % cap;
    return 1;
  }

  /**
   * Change the capacity, keeping the newest items.
   * Returns the number of items evicted.
   */
  resize(capacity: number): number {
    const next = checkCapacity(capacity);
    const items = this.toArray();
    const evicted = Math.max(0, items.length - next);
    const kept = items.slice(evicted);

    this.slots = new Array<T | undefined>(next);
    kept.forEach((item, i) => {
      this.slots[i] = item;
    });
    this.head = 0;
    this.length = kept.length;
    return evicted;
  }

  /** Items oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    const cap = this.slots.length;
    for (let i = 0; i < this.length; i++) {
      const item = this.slots[(this.head + i) % cap];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.length = 0;
  }
}

function checkCapacity(capacity: number): number {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Capacity must be an integer >= 1, got ${capacity}`);
  }
  return capacity;
}
