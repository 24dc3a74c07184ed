import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { TaError } from '../application/errors';
import type { Ohlcv } from '../types/sample';
import { loadEngineConfig } from '../utils/config';
import { log } from '../utils/logger';
import type { Indicator, WindowOptions } from '../utils/indicators/base';
import {
  AverageTrueRange, BollingerBands, ChandelierExit, CommodityChannelIndex, EfficiencyRatio,
  ExponentialMovingAverage, FastStochastic, HullMovingAverage, KeltnerChannel, Maximum,
  MeanAbsoluteDeviation, Minimum, MoneyFlowIndex, MovingAverageConvergenceDivergence,
  OnBalanceVolume, PercentagePriceOscillator, RateOfChange, RelativeStrengthIndex,
  SimpleMovingAverage, SlowStochastic, StandardDeviation, TrueRange, WeightedMovingAverage,
} from '../utils/indicators';
import type { BandsOutput, ChandelierExitOutput, MacdOutput, StochasticOutput } from '../utils/indicators';

export type IndicatorOutput = number | BandsOutput | MacdOutput | StochasticOutput | ChandelierExitOutput;

/** Any indicator fed with full bars; every indicator in the library accepts one. */
export type BarIndicator = Indicator<Ohlcv, IndicatorOutput>;

const name = z.string().min(1).optional();
const period = z.number().optional();
const multiplier = z.number().optional();

const periodOnly = <K extends string>(kind: K) => z.object({ kind: z.literal(kind), name, period });
const bands = <K extends string>(kind: K) => z.object({ kind: z.literal(kind), name, period, multiplier });
const signalLine = <K extends string>(kind: K) => z.object({
  kind: z.literal(kind), name,
  fastPeriod: z.number().optional(),
  slowPeriod: z.number().optional(),
  signalPeriod: z.number().optional(),
});

export const indicatorSpecSchema = z.discriminatedUnion('kind', [
  periodOnly('sma'),
  periodOnly('ema'),
  periodOnly('wma'),
  periodOnly('hma'),
  periodOnly('min'),
  periodOnly('max'),
  z.object({ kind: z.literal('sd'), name, period, sample: z.boolean().optional() }),
  periodOnly('mad'),
  z.object({ kind: z.literal('tr'), name }),
  periodOnly('roc'),
  z.object({ kind: z.literal('obv'), name }),
  periodOnly('er'),
  periodOnly('rsi'),
  signalLine('macd'),
  signalLine('ppo'),
  periodOnly('fast_stoch'),
  z.object({ kind: z.literal('slow_stoch'), name, period, dPeriod: z.number().optional() }),
  periodOnly('cci'),
  periodOnly('mfi'),
  periodOnly('atr'),
  bands('bb'),
  bands('kc'),
  bands('ce'),
]);

export type IndicatorSpec = z.infer<typeof indicatorSpecSchema>;

export const indicatorConfigSchema = z.object({
  indicators: z.array(indicatorSpecSchema),
});

export const DEFAULT_INDICATOR_SPECS: readonly IndicatorSpec[] = [
  { kind: 'sma', period: 20 },
  { kind: 'ema', period: 12 },
  { kind: 'rsi', period: 14 },
  { kind: 'macd' },
  { kind: 'bb', period: 20, multiplier: 2 },
];

/**
 * Build a fresh instance for a spec. Parameter domains are enforced by the
 * constructors, so a bad period still surfaces as ConfigError.
 */
export function createIndicator(spec: IndicatorSpec, window: WindowOptions = {}): BarIndicator {
  switch (spec.kind) {
    case 'sma': return new SimpleMovingAverage(spec.period, window);
    case 'ema': return new ExponentialMovingAverage(spec.period);
    case 'wma': return new WeightedMovingAverage(spec.period);
    case 'hma': return new HullMovingAverage(spec.period);
    case 'min': return new Minimum(spec.period);
    case 'max': return new Maximum(spec.period);
    case 'sd': return new StandardDeviation(spec.period, { ...window, kind: spec.sample ? 'sample' : 'population' });
    case 'mad': return new MeanAbsoluteDeviation(spec.period);
    case 'tr': return new TrueRange();
    case 'roc': return new RateOfChange(spec.period);
    case 'obv': return new OnBalanceVolume();
    case 'er': return new EfficiencyRatio(spec.period);
    case 'rsi': return new RelativeStrengthIndex(spec.period);
    case 'macd': return new MovingAverageConvergenceDivergence(spec.fastPeriod, spec.slowPeriod, spec.signalPeriod);
    case 'ppo': return new PercentagePriceOscillator(spec.fastPeriod, spec.slowPeriod, spec.signalPeriod);
    case 'fast_stoch': return new FastStochastic(spec.period);
    case 'slow_stoch': return new SlowStochastic(spec.period, spec.dPeriod, window);
    case 'cci': return new CommodityChannelIndex(spec.period, window);
    case 'mfi': return new MoneyFlowIndex(spec.period, window);
    case 'atr': return new AverageTrueRange(spec.period);
    case 'bb': return new BollingerBands(spec.period, spec.multiplier, window);
    case 'kc': return new KeltnerChannel(spec.period, spec.multiplier);
    case 'ce': return new ChandelierExit(spec.period, spec.multiplier);
  }
}

export function parseIndicatorConfig(raw: unknown): IndicatorSpec[] {
  const parsed = indicatorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TaError('CONFIG_FILE', `invalid indicator config at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'unknown issue'}`, { cause: parsed.error });
  }
  return parsed.data.indicators;
}

/**
 * Load the indicator set from TA_INDICATORS_FILE (or ./indicators.json).
 * A missing file yields the defaults; unreadable or malformed content throws TaError('CONFIG_FILE').
 */
export function loadIndicatorConfig(cwd = process.cwd(), file?: string): IndicatorSpec[] {
  const target = path.resolve(cwd, file ?? loadEngineConfig().indicatorsFile ?? 'indicators.json');
  if (!fs.existsSync(target)) {
    log('INFO', 'CONFIG', 'indicator config not found, using defaults', { file: target });
    return [...DEFAULT_INDICATOR_SPECS];
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(target, 'utf8'));
  } catch (e) {
    throw new TaError('CONFIG_FILE', `cannot read indicator config ${target}`, { cause: e });
  }
  return parseIndicatorConfig(raw);
}
