import type { Num } from '../base';

export type ExtremumOrder = 'min' | 'max';

interface Candidate { value: number; position: number }

/**
 * Monotonic deque answering "extremum of the current window" in O(1) amortized.
 * Values run increasing front-to-back for 'min', decreasing for 'max', so the front is the answer.
 */
export class MonotonicExtremumTracker {
  readonly order: ExtremumOrder;
  private items: Candidate[] = [];
  private front = 0;

  constructor(order: ExtremumOrder) {
    this.order = order;
  }

  get length(): number { return this.items.length - this.front; }

  /** `a` makes `b` irrelevant when it is at least as extreme and newer. */
  private dominates(a: number, b: number): boolean {
    return this.order === 'min' ? a <= b : a >= b;
  }

  push(value: number, position: number): void {
    while (this.length > 0 && this.dominates(value, this.items[this.items.length - 1].value)) {
      this.items.pop();
    }
    this.items.push({ value, position });
  }

  /** Drop candidates whose position is older than `minPosition`. */
  evictBefore(minPosition: number): void {
    while (this.front < this.items.length && this.items[this.front].position < minPosition) {
      this.front++;
    }
    // compact once the dead prefix outweighs the live part
    if (this.front > 32 && this.front * 2 > this.items.length) {
      this.items = this.items.slice(this.front);
      this.front = 0;
    }
  }

  current(): Num {
    return this.length > 0 ? this.items[this.front].value : null;
  }

  reset(): void {
    this.items = [];
    this.front = 0;
  }

  clone(): MonotonicExtremumTracker {
    const copy = new MonotonicExtremumTracker(this.order);
    copy.items = this.items.slice(this.front).map(c => ({ ...c }));
    return copy;
  }
}
