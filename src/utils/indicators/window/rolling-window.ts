import { requirePeriod } from '../../../application/errors';
import { DEFAULT_RESYNC_INTERVAL } from '../base';
import type { Num } from '../base';
import { RingBuffer } from './ring-buffer';
import { SumAccumulator } from './sum-accumulator';
import type { VarianceKind } from './sum-accumulator';

// An eviction that takes all but 1/CANCELLATION_LIMIT of the sum of squares leaves mostly rounding behind.
const CANCELLATION_LIMIT = 1e6;

/**
 * Ring buffer paired with a SumAccumulator that follows its pushes and evictions.
 * Every `resyncInterval` evictions the sums are rebuilt from the buffer to bound drift.
 * They are also rebuilt at once when they stop being finite or an eviction cancels most of them.
 * While the window itself holds values whose squares overflow, mean and deviation are
 * computed from the buffer on a scaled copy instead.
 */
export class RollingWindow {
  private buffer: RingBuffer<number>;
  private acc = new SumAccumulator();
  private evictions = 0;
  private readonly resyncInterval: number;

  constructor(period: number, resyncInterval = DEFAULT_RESYNC_INTERVAL) {
    this.buffer = new RingBuffer<number>(period);
    this.resyncInterval = requirePeriod('resyncInterval', resyncInterval);
  }

  get period(): number { return this.buffer.capacity; }
  get length(): number { return this.buffer.length; }
  get sum(): number { return this.acc.sum; }

  /** Returns the evicted value, if the window was full. */
  push(value: number): number | undefined {
    const evicted = this.buffer.push(value);
    let stale = false;
    // evict before adding: a window of one then holds exactly `value`
    if (evicted !== undefined) {
      this.acc.onEvict(evicted);
      this.evictions++;
      stale = this.evictions >= this.resyncInterval || evicted * evicted > this.acc.sumOfSquares * CANCELLATION_LIMIT;
    }
    this.acc.onPush(value);
    if (stale || !Number.isFinite(this.acc.sum) || !Number.isFinite(this.acc.sumOfSquares)) {
      this.acc.resync(this.buffer);
      this.evictions = 0;
    }
    return evicted;
  }

  mean(): Num {
    if (Number.isFinite(this.acc.sum)) return this.acc.mean();
    const scaled = this.scaled();
    if (!scaled) return null;
    let total = 0;
    for (const y of scaled.values) total += y;
    return scaled.scale * (total / scaled.values.length);
  }

  variance(kind: VarianceKind = 'population'): Num {
    if (Number.isFinite(this.acc.sumOfSquares)) return this.acc.variance(kind);
    const sd = this.deviation(kind);
    return sd === null ? null : sd * sd;
  }

  /** Square root of the variance; stays finite for any finite window content. */
  deviation(kind: VarianceKind = 'population'): Num {
    if (Number.isFinite(this.acc.sumOfSquares)) {
      const v = this.acc.variance(kind);
      return v === null ? null : Math.sqrt(v);
    }
    const scaled = this.scaled();
    if (!scaled) return null;
    const n = scaled.values.length;
    if (kind === 'sample' && n < 2) return 0;
    let total = 0;
    for (const y of scaled.values) total += y;
    const mean = total / n;
    let squares = 0;
    for (const y of scaled.values) squares += (y - mean) * (y - mean);
    return scaled.scale * Math.sqrt(squares / (kind === 'sample' ? n - 1 : n));
  }
  values(): Iterable<number> { return this.buffer; }
  oldest(): number | undefined { return this.buffer.first(); }

  /** Window contents divided by their largest magnitude, so every value lies in [-1, 1]. */
  private scaled(): { scale: number; values: number[] } | null {
    const raw = this.buffer.toArray();
    if (raw.length === 0) return null;
    let scale = 0;
    for (const v of raw) scale = Math.max(scale, Math.abs(v));
    if (scale === 0) return { scale: 1, values: raw };
    return { scale, values: raw.map(v => v / scale) };
  }

  reset(): void {
    this.buffer.reset();
    this.acc.reset();
    this.evictions = 0;
  }

  clone(): RollingWindow {
    const copy = new RollingWindow(this.buffer.capacity, this.resyncInterval);
    copy.buffer = this.buffer.clone();
    copy.acc = this.acc.clone();
    copy.evictions = this.evictions;
    return copy;
  }
}
