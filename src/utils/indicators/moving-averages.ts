// Streaming moving averages. Each instance owns its window; one sample in, one value out.

import { requirePeriod } from '../../application/errors';
import { closeOf } from '../../types/sample';
import type { ScalarInput } from '../../types/sample';
import { BaseIndicator, resolveResyncInterval } from './base';
import type { Period, WindowOptions } from './base';
import { RingBuffer, RollingWindow } from './window';

/**
 * Simple Moving Average (SMA)
 *
 * Mean of the last `period` samples. Until the window fills, the mean of the samples seen so far.
 */
export class SimpleMovingAverage extends BaseIndicator<ScalarInput, number> implements Period {
  readonly period: number;
  private window: RollingWindow;

  constructor(period = 9, opts?: WindowOptions) {
    super('SMA');
    this.period = requirePeriod('period', period);
    this.window = new RollingWindow(period, resolveResyncInterval(opts));
  }

  protected params() { return [this.period]; }

  protected compute(input: ScalarInput): number {
    const x = closeOf(input);
    this.window.push(x);
    return this.window.mean() ?? x;
  }

  protected clear() { this.window.reset(); }

  clone(): SimpleMovingAverage {
    const copy = new SimpleMovingAverage(this.period);
    copy.window = this.window.clone();
    return this.withLast(copy);
  }
}

/**
 * Exponential Moving Average (EMA)
 *
 * k = 2 / (period + 1). The first sample seeds the average; after that
 * ema = k * x + (1 - k) * ema. Constant state, no window.
 */
export class ExponentialMovingAverage extends BaseIndicator<ScalarInput, number> implements Period {
  readonly period: number;
  readonly k: number;
  private current: number | null = null;

  constructor(period = 9) {
    super('EMA');
    this.period = requirePeriod('period', period);
    this.k = 2 / (period + 1);
  }

  protected params() { return [this.period]; }

  protected compute(input: ScalarInput): number {
    const x = closeOf(input);
    this.current = this.current === null ? x : this.k * x + (1 - this.k) * this.current;
    return this.current;
  }

  protected clear() { this.current = null; }

  clone(): ExponentialMovingAverage {
    const copy = new ExponentialMovingAverage(this.period);
    copy.current = this.current;
    return this.withLast(copy);
  }
}

/**
 * Weighted Moving Average (WMA)
 *
 * Linear weights 1..n, oldest to newest, over the current window.
 * Recomputed from the buffer on every sample.
 */
export class WeightedMovingAverage extends BaseIndicator<ScalarInput, number> implements Period {
  readonly period: number;
  private buffer: RingBuffer<number>;

  constructor(period = 9) {
    super('WMA');
    this.period = requirePeriod('period', period);
    this.buffer = new RingBuffer<number>(period);
  }

  protected params() { return [this.period]; }

  protected compute(input: ScalarInput): number {
    this.buffer.push(closeOf(input));
    const n = this.buffer.length;
    let num = 0;
    let i = 0;
    for (const v of this.buffer) num += v * ++i;
    return num / ((n * (n + 1)) / 2);
  }

  protected clear() { this.buffer.reset(); }

  clone(): WeightedMovingAverage {
    const copy = new WeightedMovingAverage(this.period);
    copy.buffer = this.buffer.clone();
    return this.withLast(copy);
  }
}

/**
 * Hull Moving Average (HMA)
 *
 * WMA(√n) of (2 * WMA(n/2) - WMA(n)). Half and root periods are floored and kept >= 1.
 */
export class HullMovingAverage extends BaseIndicator<ScalarInput, number> implements Period {
  readonly period: number;
  private half: WeightedMovingAverage;
  private full: WeightedMovingAverage;
  private smooth: WeightedMovingAverage;

  constructor(period = 9) {
    super('HMA');
    this.period = requirePeriod('period', period);
    this.half = new WeightedMovingAverage(Math.max(1, Math.floor(period / 2)));
    this.full = new WeightedMovingAverage(period);
    this.smooth = new WeightedMovingAverage(Math.max(1, Math.floor(Math.sqrt(period))));
  }

  protected params() { return [this.period]; }

  protected compute(input: ScalarInput): number {
    const x = closeOf(input);
    const raw = 2 * this.half.next(x) - this.full.next(x);
    return this.smooth.next(raw);
  }

  protected clear() {
    this.half.reset();
    this.full.reset();
    this.smooth.reset();
  }

  clone(): HullMovingAverage {
    const copy = new HullMovingAverage(this.period);
    copy.half = this.half.clone();
    copy.full = this.full.clone();
    copy.smooth = this.smooth.clone();
    return this.withLast(copy);
  }
}
