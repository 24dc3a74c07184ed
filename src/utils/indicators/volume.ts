import { requirePeriod } from '../../application/errors';
import { typicalPrice } from '../../types/sample';
import type { Close, Priceable, Volume } from '../../types/sample';
import { BaseIndicator, resolveResyncInterval } from './base';
import type { Period, WindowOptions } from './base';
import { RollingWindow } from './window';

/**
 * On-Balance Volume
 *
 * Adds the bar volume when the close rises, subtracts it when the close falls.
 * The previous close starts at 0.
 */
export class OnBalanceVolume extends BaseIndicator<Close & Volume, number> {
  private total = 0;
  private prevClose = 0;

  constructor() {
    super('OBV');
  }

  protected params() { return []; }

  protected compute(input: Close & Volume): number {
    if (input.close > this.prevClose) this.total += input.volume;
    else if (input.close < this.prevClose) this.total -= input.volume;
    this.prevClose = input.close;
    return this.total;
  }

  protected clear() {
    this.total = 0;
    this.prevClose = 0;
  }

  clone(): OnBalanceVolume {
    const copy = new OnBalanceVolume();
    copy.total = this.total;
    copy.prevClose = this.prevClose;
    return this.withLast(copy);
  }
}

/**
 * Money Flow Index
 *
 * Raw money flow = typical price * volume, booked as positive or negative by the
 * direction of the typical price against the previous bar (unchanged and first bars book nothing).
 * MFI = 100 - 100 / (1 + positive / negative) over the last `period` bars;
 * 100 when there is no negative flow, 50 when there is no flow at all.
 */
export class MoneyFlowIndex extends BaseIndicator<Priceable & Volume, number> implements Period {
  readonly period: number;
  private positive: RollingWindow;
  private negative: RollingWindow;
  // bars in each window that carry a non-zero flow; 0 means the sum is exactly 0
  private positiveBars = 0;
  private negativeBars = 0;
  private prevTypical: number | null = null;

  constructor(period = 14, opts?: WindowOptions) {
    super('MFI');
    this.period = requirePeriod('period', period);
    const interval = resolveResyncInterval(opts);
    this.positive = new RollingWindow(period, interval);
    this.negative = new RollingWindow(period, interval);
  }

  protected params() { return [this.period]; }

  protected compute(input: Priceable & Volume): number {
    const tp = typicalPrice(input);
    const flow = tp * input.volume;
    const prev = this.prevTypical;
    this.prevTypical = tp;

    const up = prev !== null && tp > prev ? flow : 0;
    const down = prev !== null && tp < prev ? flow : 0;
    this.positiveBars += this.book(this.positive, up);
    this.negativeBars += this.book(this.negative, down);

    const pos = this.positiveBars === 0 ? 0 : Math.max(0, this.positive.sum);
    const neg = this.negativeBars === 0 ? 0 : Math.max(0, this.negative.sum);
    if (neg === 0) return pos === 0 ? 50 : 100;
    return 100 - 100 / (1 + pos / neg);
  }

  /** Push a flow and return the change in the window's count of non-zero flows. */
  private book(window: RollingWindow, flow: number): number {
    const evicted = window.push(flow);
    return (flow !== 0 ? 1 : 0) - (evicted !== undefined && evicted !== 0 ? 1 : 0);
  }

  protected clear() {
    this.positive.reset();
    this.negative.reset();
    this.positiveBars = 0;
    this.negativeBars = 0;
    this.prevTypical = null;
  }

  clone(): MoneyFlowIndex {
    const copy = new MoneyFlowIndex(this.period);
    copy.positive = this.positive.clone();
    copy.negative = this.negative.clone();
    copy.positiveBars = this.positiveBars;
    copy.negativeBars = this.negativeBars;
    copy.prevTypical = this.prevTypical;
    return this.withLast(copy);
  }
}
