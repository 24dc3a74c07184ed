import { requirePeriod } from '../../application/errors';

export type Num = number | null;

/**
 * Uniform contract for every streaming indicator.
 * `lastValue()` is null until the first sample after construction or reset.
 */
export interface Indicator<I, O> {
  next(input: I): O;
  reset(): void;
  lastValue(): O | null;
  clone(): Indicator<I, O>;
  toString(): string;
}

export interface Period {
  readonly period: number;
}

/** Evictions between full accumulator resyncs in windowed indicators. */
export const DEFAULT_RESYNC_INTERVAL = 1024;

export interface WindowOptions {
  resyncInterval?: number;
}

export function resolveResyncInterval(opts?: WindowOptions): number {
  return requirePeriod('resyncInterval', opts?.resyncInterval ?? DEFAULT_RESYNC_INTERVAL);
}

export abstract class BaseIndicator<I, O> implements Indicator<I, O> {
  private last: O | null = null;
  private readonly label: string;

  protected constructor(label: string) {
    this.label = label;
  }

  /** Parameters rendered by toString(), in constructor order. */
  protected abstract params(): readonly number[];
  protected abstract compute(input: I): O;
  /** Return every piece of owned state, sub-indicators included, to its post-construction value. */
  protected abstract clear(): void;
  abstract clone(): BaseIndicator<I, O>;

  next(input: I): O {
    const v = this.compute(input);
    this.last = v;
    return v;
  }

  reset(): void {
    this.clear();
    this.last = null;
  }

  lastValue(): O | null {
    return this.last;
  }

  toString(): string {
    return `${this.label}(${this.params().join(', ')})`;
  }

  /** Copy the last output onto a freshly cloned instance. */
  protected withLast<T extends BaseIndicator<I, O>>(copy: T): T {
    copy.last = this.last;
    return copy;
  }
}
