import { requireNonNegative, requirePeriod } from '../../application/errors';
import { closeOf, highOf, lowOf, typicalPrice } from '../../types/sample';
import type { Priceable, RangeInput, ScalarInput } from '../../types/sample';
import { BaseIndicator, resolveResyncInterval } from './base';
import type { Period, WindowOptions } from './base';
import { Maximum, Minimum } from './extrema';
import { ExponentialMovingAverage, SimpleMovingAverage } from './moving-averages';
import { RingBuffer, RollingWindow } from './window';
import type { VarianceKind } from './window';

export interface BandsOutput {
  readonly middle: number;
  readonly upper: number;
  readonly lower: number;
}

export interface ChandelierExitOutput {
  readonly long: number;
  readonly short: number;
}

export interface StandardDeviationOptions extends WindowOptions {
  /** 'population' (default) divides by n, 'sample' by n - 1. */
  kind?: VarianceKind;
}

/**
 * Standard Deviation over the last `period` samples, from running sums.
 */
export class StandardDeviation extends BaseIndicator<ScalarInput, number> implements Period {
  readonly period: number;
  readonly kind: VarianceKind;
  private window: RollingWindow;

  constructor(period = 9, opts: StandardDeviationOptions = {}) {
    super('SD');
    this.period = requirePeriod('period', period);
    this.kind = opts.kind ?? 'population';
    this.window = new RollingWindow(period, resolveResyncInterval(opts));
  }

  protected params() { return [this.period]; }

  protected compute(input: ScalarInput): number {
    this.window.push(closeOf(input));
    return this.window.deviation(this.kind) ?? 0;
  }

  protected clear() { this.window.reset(); }

  clone(): StandardDeviation {
    const copy = new StandardDeviation(this.period, { kind: this.kind });
    copy.window = this.window.clone();
    return this.withLast(copy);
  }
}

/**
 * Mean Absolute Deviation: mean of |x - mean| over the window.
 * The mean moves with every sample, so the deviations are recomputed from the buffer each time.
 */
export class MeanAbsoluteDeviation extends BaseIndicator<ScalarInput, number> implements Period {
  readonly period: number;
  private buffer: RingBuffer<number>;

  constructor(period = 9) {
    super('MAD');
    this.period = requirePeriod('period', period);
    this.buffer = new RingBuffer<number>(period);
  }

  protected params() { return [this.period]; }

  protected compute(input: ScalarInput): number {
    this.buffer.push(closeOf(input));
    const n = this.buffer.length;
    let sum = 0;
    for (const v of this.buffer) sum += v;
    const mean = sum / n;
    let dev = 0;
    for (const v of this.buffer) dev += Math.abs(v - mean);
    return dev / n;
  }

  protected clear() { this.buffer.reset(); }

  clone(): MeanAbsoluteDeviation {
    const copy = new MeanAbsoluteDeviation(this.period);
    copy.buffer = this.buffer.clone();
    return this.withLast(copy);
  }
}

/**
 * True Range: max(high - low, |high - prevClose|, |low - prevClose|).
 * The first bar has no previous close and yields high - low.
 * A bare number is treated as a close: |x - prev|, 0 on the first sample.
 */
export class TrueRange extends BaseIndicator<RangeInput, number> {
  private prevClose: number | null = null;

  constructor() {
    super('TRUE_RANGE');
  }

  protected params() { return []; }

  protected compute(input: RangeInput): number {
    const prev = this.prevClose;
    if (typeof input === 'number') {
      this.prevClose = input;
      return prev === null ? 0 : Math.abs(input - prev);
    }
    this.prevClose = input.close;
    const range = input.high - input.low;
    if (prev === null) return range;
    return Math.max(range, Math.abs(input.high - prev), Math.abs(input.low - prev));
  }

  protected clear() { this.prevClose = null; }

  clone(): TrueRange {
    const copy = new TrueRange();
    copy.prevClose = this.prevClose;
    return this.withLast(copy);
  }
}

/** Average True Range: EMA(period) of True Range. */
export class AverageTrueRange extends BaseIndicator<RangeInput, number> implements Period {
  readonly period: number;
  private tr = new TrueRange();
  private ema: ExponentialMovingAverage;

  constructor(period = 14) {
    super('ATR');
    this.period = requirePeriod('period', period);
    this.ema = new ExponentialMovingAverage(period);
  }

  protected params() { return [this.period]; }

  protected compute(input: RangeInput): number {
    return this.ema.next(this.tr.next(input));
  }

  protected clear() {
    this.tr.reset();
    this.ema.reset();
  }

  clone(): AverageTrueRange {
    const copy = new AverageTrueRange(this.period);
    copy.tr = this.tr.clone();
    copy.ema = this.ema.clone();
    return this.withLast(copy);
  }
}

/**
 * Bollinger Bands: SMA(period) ± multiplier * SD(period), population deviation.
 */
export class BollingerBands extends BaseIndicator<ScalarInput, BandsOutput> implements Period {
  readonly period: number;
  readonly multiplier: number;
  private sma: SimpleMovingAverage;
  private sd: StandardDeviation;

  constructor(period = 9, multiplier = 2, opts?: WindowOptions) {
    super('BB');
    this.period = requirePeriod('period', period);
    this.multiplier = requireNonNegative('multiplier', multiplier);
    this.sma = new SimpleMovingAverage(period, opts);
    this.sd = new StandardDeviation(period, opts);
  }

  protected params() { return [this.period, this.multiplier]; }

  protected compute(input: ScalarInput): BandsOutput {
    const x = closeOf(input);
    const middle = this.sma.next(x);
    const width = this.multiplier * this.sd.next(x);
    return { middle, upper: middle + width, lower: middle - width };
  }

  protected clear() {
    this.sma.reset();
    this.sd.reset();
  }

  clone(): BollingerBands {
    const copy = new BollingerBands(this.period, this.multiplier);
    copy.sma = this.sma.clone();
    copy.sd = this.sd.clone();
    return this.withLast(copy);
  }
}

/**
 * Keltner Channel: EMA(period) of the typical price ± multiplier * ATR(period).
 * For a bare number the typical price is the number itself.
 */
export class KeltnerChannel extends BaseIndicator<RangeInput, BandsOutput> implements Period {
  readonly period: number;
  readonly multiplier: number;
  private ema: ExponentialMovingAverage;
  private atr: AverageTrueRange;

  constructor(period = 10, multiplier = 2) {
    super('KC');
    this.period = requirePeriod('period', period);
    this.multiplier = requireNonNegative('multiplier', multiplier);
    this.ema = new ExponentialMovingAverage(period);
    this.atr = new AverageTrueRange(period);
  }

  protected params() { return [this.period, this.multiplier]; }

  protected compute(input: RangeInput): BandsOutput {
    const tp = typeof input === 'number' ? input : typicalPrice(input);
    const middle = this.ema.next(tp);
    const width = this.multiplier * this.atr.next(input);
    return { middle, upper: middle + width, lower: middle - width };
  }

  protected clear() {
    this.ema.reset();
    this.atr.reset();
  }

  clone(): KeltnerChannel {
    const copy = new KeltnerChannel(this.period, this.multiplier);
    copy.ema = this.ema.clone();
    copy.atr = this.atr.clone();
    return this.withLast(copy);
  }
}

/**
 * Chandelier Exit
 *
 * long  = highest high(period) - multiplier * ATR(period)
 * short = lowest low(period)   + multiplier * ATR(period)
 */
export class ChandelierExit extends BaseIndicator<Priceable, ChandelierExitOutput> implements Period {
  readonly period: number;
  readonly multiplier: number;
  private max: Maximum;
  private min: Minimum;
  private atr: AverageTrueRange;

  constructor(period = 22, multiplier = 3) {
    super('CE');
    this.period = requirePeriod('period', period);
    this.multiplier = requireNonNegative('multiplier', multiplier);
    this.max = new Maximum(period);
    this.min = new Minimum(period);
    this.atr = new AverageTrueRange(period);
  }

  protected params() { return [this.period, this.multiplier]; }

  protected compute(input: Priceable): ChandelierExitOutput {
    const highest = this.max.next(highOf(input));
    const lowest = this.min.next(lowOf(input));
    const offset = this.multiplier * this.atr.next(input);
    return { long: highest - offset, short: lowest + offset };
  }

  protected clear() {
    this.max.reset();
    this.min.reset();
    this.atr.reset();
  }

  clone(): ChandelierExit {
    const copy = new ChandelierExit(this.period, this.multiplier);
    copy.max = this.max.clone();
    copy.min = this.min.clone();
    copy.atr = this.atr.clone();
    return this.withLast(copy);
  }
}
