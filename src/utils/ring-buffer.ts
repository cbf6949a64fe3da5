/**
 * Fixed-capacity circular FIFO.
 * When full, `push` evicts the oldest entry to make room for the new one.
 */
export class RingBuffer<T> {
  private slots: (T | undefined)[];
  private head = 0; // index of the oldest entry
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("RingBuffer capacity must be a positive integer");
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  /** Append an item. Returns true when the oldest entry was evicted to make room. */
  push(item: T): boolean {
    if (this.count === this.capacity) {
      this.slots[this.head] = item;
      this.head = (this.head + 1) % this.capacity;
      return true;
    }
    this.slots[(this.head + this.count) % this.capacity] = item;
    this.count++;
    return false;
  }

  /** Remove and return the oldest entry, or undefined when empty. */
  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.slots = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
