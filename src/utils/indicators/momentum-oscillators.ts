import { requirePeriod, requireOrdered } from '../../application/errors';
import { closeOf, typicalPrice } from '../../types/sample';
import type { Priceable, RangeInput, ScalarInput } from '../../types/sample';
import { warnOnce } from '../logger';
import { BaseIndicator } from './base';
import type { Period, WindowOptions } from './base';
import { Maximum, Minimum } from './extrema';
import { ExponentialMovingAverage, SimpleMovingAverage } from './moving-averages';
import { MeanAbsoluteDeviation } from './volatility';
import { RingBuffer } from './window';

export interface MacdOutput {
  readonly macd: number;
  readonly signal: number;
  readonly histogram: number;
}

export type PpoOutput = MacdOutput;

export interface StochasticOutput {
  readonly k: number;
  readonly d: number;
}

/**
 * Rate of Change in percent against the sample `period` steps back.
 * While the window fills, the reference is the first sample. A zero reference yields 0.
 */
export class RateOfChange extends BaseIndicator<ScalarInput, number> implements Period {
  readonly period: number;
  private previous: RingBuffer<number>;

  constructor(period = 9) {
    super('ROC');
    this.period = requirePeriod('period', period);
    this.previous = new RingBuffer<number>(period);
  }

  protected params() { return [this.period]; }

  protected compute(input: ScalarInput): number {
    const x = closeOf(input);
    const base = this.previous.first();
    this.previous.push(x);
    if (base === undefined) return 0;
    if (base === 0) {
      warnOnce('roc-zero-base', 'rate of change against a zero reference, reporting 0', { indicator: this.toString() }, 'INDICATOR');
      return 0;
    }
    return ((x - base) / base) * 100;
  }

  protected clear() { this.previous.reset(); }

  clone(): RateOfChange {
    const copy = new RateOfChange(this.period);
    copy.previous = this.previous.clone();
    return this.withLast(copy);
  }
}

/**
 * Kaufman Efficiency Ratio over the last `period` samples:
 * |last - first| / Σ|x[i] - x[i-1]|, 0 when nothing moved.
 */
export class EfficiencyRatio extends BaseIndicator<ScalarInput, number> implements Period {
  readonly period: number;
  private buffer: RingBuffer<number>;

  constructor(period = 14) {
    super('ER');
    this.period = requirePeriod('period', period);
    this.buffer = new RingBuffer<number>(period);
  }

  protected params() { return [this.period]; }

  protected compute(input: ScalarInput): number {
    const x = closeOf(input);
    this.buffer.push(x);
    let total = 0;
    let prev: number | null = null;
    for (const v of this.buffer) {
      if (prev !== null) total += Math.abs(v - prev);
      prev = v;
    }
    if (total === 0) return 0;
    return Math.abs(x - (this.buffer.first() ?? x)) / total;
  }

  protected clear() { this.buffer.reset(); }

  clone(): EfficiencyRatio {
    const copy = new EfficiencyRatio(this.period);
    copy.buffer = this.buffer.clone();
    return this.withLast(copy);
  }
}

/**
 * Relative Strength Index
 *
 * Gains and losses between consecutive samples are smoothed by two EMA(period).
 * RSI = 100 - 100 / (1 + avgGain / avgLoss); 100 when avgLoss is 0, 50 when both are 0.
 * The first sample has no delta and returns 50.
 */
export class RelativeStrengthIndex extends BaseIndicator<ScalarInput, number> implements Period {
  readonly period: number;
  private gains: ExponentialMovingAverage;
  private losses: ExponentialMovingAverage;
  private prev: number | null = null;

  constructor(period = 14) {
    super('RSI');
    this.period = requirePeriod('period', period);
    this.gains = new ExponentialMovingAverage(period);
    this.losses = new ExponentialMovingAverage(period);
  }

  protected params() { return [this.period]; }

  protected compute(input: ScalarInput): number {
    const x = closeOf(input);
    const prev = this.prev;
    this.prev = x;
    if (prev === null) return 50;
    const delta = x - prev;
    const avgGain = this.gains.next(Math.max(delta, 0));
    const avgLoss = this.losses.next(Math.max(-delta, 0));
    if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
    return 100 - 100 / (1 + avgGain / avgLoss);
  }

  protected clear() {
    this.gains.reset();
    this.losses.reset();
    this.prev = null;
  }

  clone(): RelativeStrengthIndex {
    const copy = new RelativeStrengthIndex(this.period);
    copy.gains = this.gains.clone();
    copy.losses = this.losses.clone();
    copy.prev = this.prev;
    return this.withLast(copy);
  }
}

abstract class SignalOscillator extends BaseIndicator<ScalarInput, MacdOutput> {
  readonly fastPeriod: number;
  readonly slowPeriod: number;
  readonly signalPeriod: number;
  protected fast: ExponentialMovingAverage;
  protected slow: ExponentialMovingAverage;
  protected signal: ExponentialMovingAverage;

  protected constructor(label: string, fastPeriod: number, slowPeriod: number, signalPeriod: number) {
    super(label);
    this.fastPeriod = requirePeriod('fastPeriod', fastPeriod);
    this.slowPeriod = requirePeriod('slowPeriod', slowPeriod);
    this.signalPeriod = requirePeriod('signalPeriod', signalPeriod);
    requireOrdered('fastPeriod', fastPeriod, 'slowPeriod', slowPeriod);
    this.fast = new ExponentialMovingAverage(fastPeriod);
    this.slow = new ExponentialMovingAverage(slowPeriod);
    this.signal = new ExponentialMovingAverage(signalPeriod);
  }

  /** Oscillator line from the two averages. */
  protected abstract line(fast: number, slow: number): number;

  protected params() { return [this.fastPeriod, this.slowPeriod, this.signalPeriod]; }

  protected compute(input: ScalarInput): MacdOutput {
    const x = closeOf(input);
    const macd = this.line(this.fast.next(x), this.slow.next(x));
    const signal = this.signal.next(macd);
    return { macd, signal, histogram: macd - signal };
  }

  protected clear() {
    this.fast.reset();
    this.slow.reset();
    this.signal.reset();
  }

  protected copyStateTo(copy: SignalOscillator) {
    copy.fast = this.fast.clone();
    copy.slow = this.slow.clone();
    copy.signal = this.signal.clone();
  }
}

/**
 * Moving Average Convergence Divergence
 *
 * macd = EMA(fast) - EMA(slow), signal = EMA(signal) of macd, histogram = macd - signal.
 * fastPeriod must be below slowPeriod.
 */
export class MovingAverageConvergenceDivergence extends SignalOscillator {
  constructor(fastPeriod = 12, slowPeriod = 26, signalPeriod = 9) {
    super('MACD', fastPeriod, slowPeriod, signalPeriod);
  }

  protected line(fast: number, slow: number) { return fast - slow; }

  clone(): MovingAverageConvergenceDivergence {
    const copy = new MovingAverageConvergenceDivergence(this.fastPeriod, this.slowPeriod, this.signalPeriod);
    this.copyStateTo(copy);
    return this.withLast(copy);
  }
}

/** Percentage Price Oscillator: MACD with the line as a percent of EMA(slow); 0 when EMA(slow) is 0. */
export class PercentagePriceOscillator extends SignalOscillator {
  constructor(fastPeriod = 12, slowPeriod = 26, signalPeriod = 9) {
    super('PPO', fastPeriod, slowPeriod, signalPeriod);
  }

  protected line(fast: number, slow: number) {
    return slow === 0 ? 0 : ((fast - slow) / slow) * 100;
  }

  clone(): PercentagePriceOscillator {
    const copy = new PercentagePriceOscillator(this.fastPeriod, this.slowPeriod, this.signalPeriod);
    this.copyStateTo(copy);
    return this.withLast(copy);
  }
}

/**
 * Fast Stochastic %K = 100 * (close - lowest low) / (highest high - lowest low), 50 for a flat range.
 */
export class FastStochastic extends BaseIndicator<RangeInput, number> implements Period {
  readonly period: number;
  private min: Minimum;
  private max: Maximum;

  constructor(period = 14) {
    super('FAST_STOCH');
    this.period = requirePeriod('period', period);
    this.min = new Minimum(period);
    this.max = new Maximum(period);
  }

  protected params() { return [this.period]; }

  protected compute(input: RangeInput): number {
    const lowest = this.min.next(input);
    const highest = this.max.next(input);
    const close = typeof input === 'number' ? input : input.close;
    if (highest === lowest) return 50;
    return (100 * (close - lowest)) / (highest - lowest);
  }

  protected clear() {
    this.min.reset();
    this.max.reset();
  }

  clone(): FastStochastic {
    const copy = new FastStochastic(this.period);
    copy.min = this.min.clone();
    copy.max = this.max.clone();
    return this.withLast(copy);
  }
}

/** Slow Stochastic: fast %K plus %D = SMA(dPeriod) of %K. */
export class SlowStochastic extends BaseIndicator<RangeInput, StochasticOutput> implements Period {
  readonly period: number;
  readonly dPeriod: number;
  private fast: FastStochastic;
  private sma: SimpleMovingAverage;

  constructor(period = 14, dPeriod = 3, opts?: WindowOptions) {
    super('SLOW_STOCH');
    this.period = requirePeriod('period', period);
    this.dPeriod = requirePeriod('dPeriod', dPeriod);
    this.fast = new FastStochastic(period);
    this.sma = new SimpleMovingAverage(dPeriod, opts);
  }

  protected params() { return [this.period, this.dPeriod]; }

  protected compute(input: RangeInput): StochasticOutput {
    const k = this.fast.next(input);
    return { k, d: this.sma.next(k) };
  }

  protected clear() {
    this.fast.reset();
    this.sma.reset();
  }

  clone(): SlowStochastic {
    const copy = new SlowStochastic(this.period, this.dPeriod);
    copy.fast = this.fast.clone();
    copy.sma = this.sma.clone();
    return this.withLast(copy);
  }
}

/**
 * Commodity Channel Index: (tp - SMA(tp)) / (0.015 * MAD(tp)) on the typical price; 0 when MAD is 0.
 */
export class CommodityChannelIndex extends BaseIndicator<Priceable, number> implements Period {
  readonly period: number;
  private sma: SimpleMovingAverage;
  private mad: MeanAbsoluteDeviation;

  constructor(period = 20, opts?: WindowOptions) {
    super('CCI');
    this.period = requirePeriod('period', period);
    this.sma = new SimpleMovingAverage(period, opts);
    this.mad = new MeanAbsoluteDeviation(period);
  }

  protected params() { return [this.period]; }

  protected compute(input: Priceable): number {
    const tp = typicalPrice(input);
    const mean = this.sma.next(tp);
    const mad = this.mad.next(tp);
    if (mad === 0) return 0;
    return (tp - mean) / (0.015 * mad);
  }

  protected clear() {
    this.sma.reset();
    this.mad.reset();
  }

  clone(): CommodityChannelIndex {
    const copy = new CommodityChannelIndex(this.period);
    copy.sma = this.sma.clone();
    copy.mad = this.mad.clone();
    return this.withLast(copy);
  }
}
