export { RingBuffer } from './ring-buffer';
export { SumAccumulator } from './sum-accumulator';
export type { VarianceKind } from './sum-accumulator';
export { MonotonicExtremumTracker } from './monotonic-extremum';
export type { ExtremumOrder } from './monotonic-extremum';
export { RollingWindow } from './rolling-window';
