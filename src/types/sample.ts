import { DataItemError } from '../application/errors';

// Capability interfaces. An indicator asks only for the fields it reads.
export interface Open { readonly open: number }
export interface High { readonly high: number }
export interface Low { readonly low: number }
export interface Close { readonly close: number }
export interface Volume { readonly volume: number }

export type Priceable = High & Low & Close;
export type Ohlcv = Open & High & Low & Close & Volume;

/** Input accepted by indicators that read a single price. */
export type ScalarInput = number | Close;
/** Input accepted by indicators that read a range; a bare number is a bar with high = low = close. */
export type RangeInput = number | Priceable;

export function closeOf(input: ScalarInput): number {
  return typeof input === 'number' ? input : input.close;
}

export function highOf(input: RangeInput): number {
  return typeof input === 'number' ? input : input.high;
}

export function lowOf(input: RangeInput): number {
  return typeof input === 'number' ? input : input.low;
}

/** (high + low + close) / 3 */
export function typicalPrice(bar: Priceable): number {
  return (bar.high + bar.low + bar.close) / 3;
}

/**
 * Validated, frozen OHLCV record.
 *
 * ```ts
 * const bar = DataItem.builder().open(10).high(12).low(9).close(11).volume(1500).build();
 * ```
 */
export class DataItem implements Ohlcv {
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;

  private constructor(fields: Ohlcv) {
    this.open = fields.open;
    this.high = fields.high;
    this.low = fields.low;
    this.close = fields.close;
    this.volume = fields.volume;
    Object.freeze(this);
  }

  /** Throws DataItemError(DATA_ITEM_INVALID) when the bar is inconsistent. */
  static create(fields: Ohlcv): DataItem {
    const { open, high, low, close, volume } = fields;
    if (![open, high, low, close, volume].every(Number.isFinite)) {
      throw new DataItemError('DATA_ITEM_INVALID', 'OHLCV fields must be finite numbers');
    }
    if (low > Math.min(open, close) || high < Math.max(open, close) || low > high) {
      throw new DataItemError(
        'DATA_ITEM_INVALID',
        `inconsistent bar: low=${low} open=${open} close=${close} high=${high}`
      );
    }
    if (volume < 0) {
      throw new DataItemError('DATA_ITEM_INVALID', `volume must be >= 0, got ${volume}`);
    }
    return new DataItem({ open, high, low, close, volume });
  }

  static builder(): DataItemBuilder {
    return new DataItemBuilder();
  }

  toString(): string {
    return `O=${this.open} H=${this.high} L=${this.low} C=${this.close} V=${this.volume}`;
  }
}

export class DataItemBuilder {
  private fields: Partial<Record<keyof Ohlcv, number>> = {};

  open(v: number): this { this.fields.open = v; return this; }
  high(v: number): this { this.fields.high = v; return this; }
  low(v: number): this { this.fields.low = v; return this; }
  close(v: number): this { this.fields.close = v; return this; }
  volume(v: number): this { this.fields.volume = v; return this; }

  build(): DataItem {
    const { open, high, low, close, volume } = this.fields;
    if (open === undefined || high === undefined || low === undefined || close === undefined || volume === undefined) {
      const missing = (['open', 'high', 'low', 'close', 'volume'] as const).filter(k => this.fields[k] === undefined);
      throw new DataItemError('DATA_ITEM_INCOMPLETE', `missing fields: ${missing.join(', ')}`);
    }
    return DataItem.create({ open, high, low, close, volume });
  }
}
