import { requirePeriod } from '../../application/errors';
import { highOf, lowOf } from '../../types/sample';
import type { RangeInput } from '../../types/sample';
import { BaseIndicator } from './base';
import type { Period } from './base';
import { MonotonicExtremumTracker } from './window';
import type { ExtremumOrder } from './window';

abstract class RunningExtremum extends BaseIndicator<RangeInput, number> implements Period {
  readonly period: number;
  protected tracker: MonotonicExtremumTracker;
  protected position = 0;

  protected constructor(label: string, order: ExtremumOrder, period: number) {
    super(label);
    this.period = requirePeriod('period', period);
    this.tracker = new MonotonicExtremumTracker(order);
  }

  protected abstract pick(input: RangeInput): number;

  protected params() { return [this.period]; }

  protected compute(input: RangeInput): number {
    const x = this.pick(input);
    const pos = this.position++;
    this.tracker.push(x, pos);
    this.tracker.evictBefore(pos - this.period + 1);
    return this.tracker.current() ?? x;
  }

  protected clear() {
    this.tracker.reset();
    this.position = 0;
  }

  protected copyStateTo(copy: RunningExtremum) {
    copy.tracker = this.tracker.clone();
    copy.position = this.position;
  }
}

/**
 * Highest value over the last `period` samples (reads `high` from bars).
 *
 * ```ts
 * const max = new Maximum(3);
 * [7, 5, 4, 4, 8].map(v => max.next(v)); // [7, 7, 7, 5, 8]
 * ```
 */
export class Maximum extends RunningExtremum {
  constructor(period = 14) {
    super('MAX', 'max', period);
  }

  protected pick(input: RangeInput) { return highOf(input); }

  clone(): Maximum {
    const copy = new Maximum(this.period);
    this.copyStateTo(copy);
    return this.withLast(copy);
  }
}

/** Lowest value over the last `period` samples (reads `low` from bars). */
export class Minimum extends RunningExtremum {
  constructor(period = 14) {
    super('MIN', 'min', period);
  }

  protected pick(input: RangeInput) { return lowOf(input); }

  clone(): Minimum {
    const copy = new Minimum(this.period);
    this.copyStateTo(copy);
    return this.withLast(copy);
  }
}
