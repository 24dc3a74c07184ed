// Re-export all streaming indicators from their respective modules

// Contract
export { BaseIndicator, DEFAULT_RESYNC_INTERVAL } from './base';
export type { Indicator, Period, Num, WindowOptions } from './base';

// Windowed statistics
export { RingBuffer, SumAccumulator, MonotonicExtremumTracker, RollingWindow } from './window';
export type { VarianceKind, ExtremumOrder } from './window';

// Moving Averages
export { SimpleMovingAverage, ExponentialMovingAverage, WeightedMovingAverage, HullMovingAverage } from './moving-averages';

// Extrema
export { Minimum, Maximum } from './extrema';

// Volatility
export { StandardDeviation, MeanAbsoluteDeviation, TrueRange, AverageTrueRange, BollingerBands, KeltnerChannel, ChandelierExit } from './volatility';
export type { BandsOutput, ChandelierExitOutput, StandardDeviationOptions } from './volatility';

// Momentum/Oscillators
export { RateOfChange, EfficiencyRatio, RelativeStrengthIndex, MovingAverageConvergenceDivergence, PercentagePriceOscillator, FastStochastic, SlowStochastic, CommodityChannelIndex } from './momentum-oscillators';
export type { MacdOutput, PpoOutput, StochasticOutput } from './momentum-oscillators';

// Volume
export { OnBalanceVolume, MoneyFlowIndex } from './volume';
