import { requirePeriod } from '../../../application/errors';

/**
 * Fixed-capacity FIFO. Pushing into a full buffer evicts and returns the oldest element.
 * Iteration is oldest-first and can be restarted any number of times.
 */
export class RingBuffer<T> {
  private slots: Array<T | undefined>;
  private head = 0; // index of the oldest element
  private size = 0;

  constructor(capacity: number) {
    requirePeriod('capacity', capacity);
    this.slots = new Array<T | undefined>(capacity);
  }

  get capacity(): number { return this.slots.length; }
  get length(): number { return this.size; }

  isFull(): boolean { return this.size === this.slots.length; }

  push(value: T): T | undefined {
    const cap = this.slots.length;
    if (this.size < cap) {
      this.slots[(this.head + this.size) % cap] = value;
      this.size++;
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = value;
    this.head = (this.head + 1) % cap;
    return evicted;
  }

  /** 0 is the oldest element; undefined outside [0, length). */
  at(index: number): T | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) return undefined;
    return this.slots[(this.head + index) % this.slots.length];
  }

  first(): T | undefined { return this.at(0); }
  last(): T | undefined { return this.at(this.size - 1); }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.size; i++) {
      const v = this.slots[(this.head + i) % this.slots.length];
      if (v !== undefined) yield v;
    }
  }

  toArray(): T[] { return [...this]; }

  reset(): void {
    this.slots = new Array<T | undefined>(this.slots.length);
    this.head = 0;
    this.size = 0;
  }

  clone(): RingBuffer<T> {
    const copy = new RingBuffer<T>(this.slots.length);
    copy.slots = this.slots.slice();
    copy.head = this.head;
    copy.size = this.size;
    return copy;
  }
}
