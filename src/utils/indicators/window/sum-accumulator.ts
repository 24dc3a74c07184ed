import type { Num } from '../base';

export type VarianceKind = 'population' | 'sample';

/**
 * Running sum and sum of squares over a window that the caller owns.
 * The caller reports every push and every eviction; nothing is rescanned.
 */
export class SumAccumulator {
  private n = 0;
  private s = 0;
  private s2 = 0;

  get count(): number { return this.n; }
  get sum(): number { return this.s; }
  get sumOfSquares(): number { return this.s2; }

  onPush(value: number): void {
    this.n++;
    this.s += value;
    this.s2 += value * value;
  }

  onEvict(value: number): void {
    if (this.n === 0) return;
    this.n--;
    if (this.n === 0) {
      // an empty window has exact zero sums, whatever drift was left over
      this.s = 0;
      this.s2 = 0;
      return;
    }
    this.s -= value;
    this.s2 -= value * value;
  }

  mean(): Num {
    return this.n === 0 ? null : this.s / this.n;
  }

  /** Clamped at 0. A sample variance over a single element is 0. */
  variance(kind: VarianceKind = 'population'): Num {
    if (this.n === 0) return null;
    const mean = this.s / this.n;
    const population = Math.max(0, this.s2 / this.n - mean * mean);
    if (kind === 'population') return population;
    return this.n < 2 ? 0 : population * this.n / (this.n - 1);
  }

  /** Recompute both sums from the window contents, discarding accumulated drift. */
  resync(values: Iterable<number>): void {
    this.reset();
    for (const v of values) this.onPush(v);
  }

  reset(): void {
    this.n = 0;
    this.s = 0;
    this.s2 = 0;
  }

  clone(): SumAccumulator {
    const copy = new SumAccumulator();
    copy.n = this.n;
    copy.s = this.s;
    copy.s2 = this.s2;
    return copy;
  }
}
