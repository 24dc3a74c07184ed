import { describe, it, expect } from 'vitest';
import {
  StandardDeviation,
  MeanAbsoluteDeviation,
  TrueRange,
  AverageTrueRange,
  BollingerBands,
  KeltnerChannel,
  ChandelierExit,
} from '../../../src/utils/indicators/volatility';
import { ConfigError } from '../../../src/application/errors';
import { DataItem } from '../../../src/types/sample';
import { expectClose, feed, series } from '../../helpers/indicator-fixtures';

describe('volatility indicators', () => {
  const bar1 = DataItem.create({ open: 10, high: 12, low: 9, close: 11, volume: 100 });
  const bar2 = DataItem.create({ open: 11, high: 14, low: 10.5, close: 13, volume: 200 });
  const bar3 = DataItem.create({ open: 8, high: 9, low: 7, close: 8.5, volume: 150 });

  describe('Standard Deviation (SD)', () => {
    it('stays finite and recovers around values whose squares overflow', () => {
      const out = feed(new StandardDeviation(3), [1e200, 1e200, 1, 2, 3, 4]);
      expect(out.slice(0, 2)).toEqual([0, 0]);
      expect(out[2] / (1e200 * Math.sqrt(2 / 9))).toBeCloseTo(1, 12);
      expect(out[3] / (1e200 * Math.sqrt(2 / 9))).toBeCloseTo(1, 12);
      expectClose(out.slice(4), [Math.sqrt(2 / 3), Math.sqrt(2 / 3)]);
    });

    it('computes population deviation over the window', () => {
      const out = feed(new StandardDeviation(4), [10, 20, 30, 40, 50]);
      expectClose(out, [0, 5, Math.sqrt(200 / 3), Math.sqrt(125), Math.sqrt(125)]);
    });

    it('supports the sample (n - 1) variant', () => {
      const out = feed(new StandardDeviation(4, { kind: 'sample' }), [10, 20]);
      expectClose(out, [0, Math.sqrt(50)]);
    });

    it('is zero for identical values', () => {
      expect(feed(new StandardDeviation(5), Array(8).fill(100))).toEqual(Array(8).fill(0));
    });

    it('rejects period 0', () => {
      expect(() => new StandardDeviation(0)).toThrow(ConfigError);
    });
  });

  describe('Mean Absolute Deviation (MAD)', () => {
    it('averages distances from the window mean', () => {
      const out = feed(new MeanAbsoluteDeviation(3), [1, 2, 6, 3]);
      expectClose(out, [0, 0.5, 2, 14 / 9]);
    });
  });

  describe('True Range', () => {
    it('uses high - low for the first bar, then gaps against the previous close', () => {
      expect(feed(new TrueRange(), [bar1, bar2, bar3])).toEqual([3, 3.5, 6]);
    });

    it('treats a number as a close', () => {
      expect(feed(new TrueRange(), [10, 12, 9])).toEqual([0, 2, 3]);
    });

    it('renders without parameters', () => {
      expect(new TrueRange().toString()).toBe('TRUE_RANGE()');
    });
  });

  describe('Average True Range (ATR)', () => {
    it('smooths true range with an EMA', () => {
      expect(feed(new AverageTrueRange(3), [bar1, bar2, bar3])).toEqual([3, 3.25, 4.625]);
    });
  });

  describe('Bollinger Bands (BB)', () => {
    it('keeps finite bands on extreme samples', () => {
      const bb = new BollingerBands(3, 2);
      for (const x of [1e200, 1e300, -1e300, 1, 2]) {
        const { middle, upper, lower } = bb.next(x);
        expect([middle, upper, lower].every(Number.isFinite), `sample ${x}`).toBe(true);
      }
    });

    it('places bands at k deviations around the SMA', () => {
      const bb = new BollingerBands(3, 2);
      expect(bb.next(2)).toEqual({ middle: 2, upper: 2, lower: 2 });
      bb.next(4);
      const out = bb.next(6);
      const sd = Math.sqrt(8 / 3);
      expect(out.middle).toBe(4);
      expect(out.upper).toBeCloseTo(4 + 2 * sd, 9);
      expect(out.lower).toBeCloseTo(4 - 2 * sd, 9);
    });

    it('keeps lower <= middle <= upper', () => {
      const bb = new BollingerBands(5, 1.5);
      for (const v of series(200)) {
        const { lower, middle, upper } = bb.next(v);
        expect(lower).toBeLessThanOrEqual(middle);
        expect(middle).toBeLessThanOrEqual(upper);
      }
    });

    it('collapses to the middle band with k = 0', () => {
      const bb = new BollingerBands(3, 0);
      feed(bb, [1, 5]);
      expect(bb.next(9)).toEqual({ middle: 5, upper: 5, lower: 5 });
    });

    it('validates parameters and renders', () => {
      expect(() => new BollingerBands(0, 2)).toThrow(ConfigError);
      expect(() => new BollingerBands(20, -1)).toThrow(ConfigError);
      expect(new BollingerBands(20, 2).toString()).toBe('BB(20, 2)');
    });
  });

  describe('Keltner Channel (KC)', () => {
    it('uses EMA of price and ATR for width', () => {
      const out = feed(new KeltnerChannel(3, 1), [10, 12, 9]);
      expect(out).toEqual([
        { middle: 10, upper: 10, lower: 10 },
        { middle: 11, upper: 12, lower: 10 },
        { middle: 10, upper: 12, lower: 8 },
      ]);
    });

    it('centres on the typical price of bars', () => {
      const kc = new KeltnerChannel(3, 2);
      const out = kc.next(bar1);
      expect(out.middle).toBeCloseTo(32 / 3, 12);
      expect(out.upper - out.middle).toBeCloseTo(6, 12);
    });

    it('rejects a negative multiplier', () => {
      expect(() => new KeltnerChannel(10, -0.5)).toThrow(ConfigError);
    });
  });

  describe('Chandelier Exit (CE)', () => {
    it('hangs exits from the extremes by k ATRs', () => {
      expect(feed(new ChandelierExit(3, 2), [bar1, bar2, bar3])).toEqual([
        { long: 6, short: 15 },
        { long: 7.5, short: 15.5 },
        { long: 4.75, short: 16.25 },
      ]);
    });

    it('renders with defaults', () => {
      expect(new ChandelierExit().toString()).toBe('CE(22, 3)');
    });
  });
});
