import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  RateOfChange,
  EfficiencyRatio,
  RelativeStrengthIndex,
  MovingAverageConvergenceDivergence,
  PercentagePriceOscillator,
  FastStochastic,
  SlowStochastic,
  CommodityChannelIndex,
} from '../../../src/utils/indicators/momentum-oscillators';
import { ConfigError } from '../../../src/application/errors';
import { DataItem } from '../../../src/types/sample';
import { expectClose, feed, series } from '../../helpers/indicator-fixtures';

describe('momentum indicators', () => {
  const bar1 = DataItem.create({ open: 10, high: 12, low: 9, close: 11, volume: 100 });
  const bar2 = DataItem.create({ open: 11, high: 14, low: 10.5, close: 13, volume: 200 });
  const bar3 = DataItem.create({ open: 8, high: 9, low: 7, close: 8.5, volume: 150 });

  describe('Rate of Change (ROC)', () => {
    beforeEach(() => {
      delete process.env.LOG_JSON;
      delete process.env.LOG_LEVEL;
    });

    it('compares with the sample period steps back', () => {
      const out = feed(new RateOfChange(3), [10, 10.4, 10.57, 10.8, 10.9]);
      expectClose(out, [0, 4, 5.7, 8, (0.5 / 10.4) * 100]);
    });

    it('reports 0 against a zero reference and warns once', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const roc = new RateOfChange(2);
      expect(feed(roc, [0, 5, 7])).toEqual([0, 0, 0]);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe('[WARN][INDICATOR] rate of change against a zero reference, reporting 0');
    });
  });

  describe('Efficiency Ratio (ER)', () => {
    it('divides net change by total movement', () => {
      const out = feed(new EfficiencyRatio(3), [1, 2, 3, 1]);
      expectClose(out, [0, 1, 1, 1 / 3]);
    });

    it('is 0 when nothing moves', () => {
      expect(feed(new EfficiencyRatio(4), [5, 5, 5, 5, 5])).toEqual([0, 0, 0, 0, 0]);
    });
  });

  describe('Relative Strength Index (RSI)', () => {
    it('starts neutral and balances equal gains and losses', () => {
      expect(feed(new RelativeStrengthIndex(3), [10, 10.5, 10])).toEqual([50, 100, 50]);
    });

    it('is exactly 100 when no delta is negative and one is positive', () => {
      const out = feed(new RelativeStrengthIndex(5), [1, 1, 2, 3, 3, 4]);
      expect(out).toEqual([50, 50, 100, 100, 100, 100]);
    });

    it('is 0 on a falling series', () => {
      expect(feed(new RelativeStrengthIndex(3), [5, 4, 3])).toEqual([50, 0, 0]);
    });

    it('stays within [0, 100]', () => {
      const rsi = new RelativeStrengthIndex(14);
      for (const v of series(300, 5)) {
        const r = rsi.next(v);
        expect(r).toBeGreaterThanOrEqual(0);
        expect(r).toBeLessThanOrEqual(100);
      }
    });
  });

  describe('MACD', () => {
    it('derives line, signal and histogram from three EMAs', () => {
      const macd = new MovingAverageConvergenceDivergence(2, 3, 2);
      expect(macd.next(1)).toEqual({ macd: 0, signal: 0, histogram: 0 });
      const out = macd.next(4);
      expect(out.macd).toBeCloseTo(0.5, 12);
      expect(out.signal).toBeCloseTo(1 / 3, 12);
      expect(out.histogram).toBeCloseTo(1 / 6, 12);
    });

    it('histogram is exactly macd - signal', () => {
      const macd = new MovingAverageConvergenceDivergence(3, 6, 4);
      for (const v of series(200)) {
        const out = macd.next(v);
        expect(out.histogram).toBe(out.macd - out.signal);
      }
    });

    it('requires fast < slow', () => {
      expect(() => new MovingAverageConvergenceDivergence(26, 12, 9)).toThrow(ConfigError);
      expect(() => new MovingAverageConvergenceDivergence(12, 12, 9)).toThrow(ConfigError);
      expect(() => new MovingAverageConvergenceDivergence(0, 12, 9)).toThrow(ConfigError);
      expect(() => new MovingAverageConvergenceDivergence(12, 26, 0)).toThrow(ConfigError);
    });

    it('renders with defaults', () => {
      expect(new MovingAverageConvergenceDivergence().toString()).toBe('MACD(12, 26, 9)');
    });
  });

  describe('PPO', () => {
    it('expresses the line as a percent of the slow EMA', () => {
      const ppo = new PercentagePriceOscillator(2, 3, 2);
      ppo.next(1);
      const out = ppo.next(4);
      expect(out.macd).toBeCloseTo(20, 9);
      expect(out.signal).toBeCloseTo(40 / 3, 9);
      expect(out.histogram).toBeCloseTo(20 / 3, 9);
    });

    it('reports 0 while the slow EMA is 0', () => {
      expect(new PercentagePriceOscillator(2, 3, 2).next(0)).toEqual({ macd: 0, signal: 0, histogram: 0 });
    });

    it('requires fast < slow', () => {
      expect(() => new PercentagePriceOscillator(9, 3, 2)).toThrow(ConfigError);
    });
  });

  describe('Stochastic', () => {
    it('fast %K is the close position within the range, 50 when flat', () => {
      expect(feed(new FastStochastic(3), [1, 2, 3, 2])).toEqual([50, 100, 100, 0]);
    });

    it('fast %K reads bars', () => {
      const out = feed(new FastStochastic(3), [bar1, bar2, bar3]);
      expectClose(out, [200 / 3, 80, 150 / 7]);
    });

    it('slow %D is the SMA of %K', () => {
      expect(feed(new SlowStochastic(3, 2), [1, 2, 3, 2])).toEqual([
        { k: 50, d: 50 },
        { k: 100, d: 75 },
        { k: 100, d: 100 },
        { k: 0, d: 50 },
      ]);
    });

    it('passes window options to the %D average', () => {
      expect(() => new SlowStochastic(14, 3, { resyncInterval: 0 })).toThrow(ConfigError);
      expect(feed(new SlowStochastic(3, 2, { resyncInterval: 1 }), [1, 2, 3, 2]).map(o => o.d)).toEqual([50, 75, 100, 50]);
    });

    it('validates and renders', () => {
      expect(() => new FastStochastic(0)).toThrow(ConfigError);
      expect(() => new SlowStochastic(14, 0)).toThrow(ConfigError);
      expect(new SlowStochastic().toString()).toBe('SLOW_STOCH(14, 3)');
    });
  });

  describe('Commodity Channel Index (CCI)', () => {
    it('scales typical-price deviation by 0.015 * MAD', () => {
      const out = feed(new CommodityChannelIndex(3), [bar1, bar2, bar3]);
      expectClose(out, [0, 200 / 3, -100]);
    });

    it('passes window options to its average', () => {
      expect(() => new CommodityChannelIndex(3, { resyncInterval: 0 })).toThrow(ConfigError);
      const out = feed(new CommodityChannelIndex(3, { resyncInterval: 1 }), [bar1, bar2, bar3]);
      expectClose(out, [0, 200 / 3, -100]);
    });

    it('is 0 when MAD is 0', () => {
      const flat = DataItem.create({ open: 5, high: 5, low: 5, close: 5, volume: 1 });
      expect(feed(new CommodityChannelIndex(4), [flat, flat, flat])).toEqual([0, 0, 0]);
    });
  });
});
