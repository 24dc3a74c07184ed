import { ConfigError, TaError } from '../application/errors';
import { createIndicator, DEFAULT_INDICATOR_SPECS } from '../config/indicator-config';
import type { BarIndicator, IndicatorOutput, IndicatorSpec } from '../config/indicator-config';
import type { Ohlcv } from '../types/sample';
import { loadEngineConfig } from '../utils/config';
import { logger as defaultLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export interface IndicatorUpdate {
  symbol: string;
  ts: number;
  close: number;
  values: Record<string, IndicatorOutput>;
}

export interface IndicatorServiceOptions {
  logger?: Logger;
  /** Overrides TA_RESYNC_INTERVAL for every indicator this service builds. */
  resyncInterval?: number;
}

/**
 * Streaming indicator sets keyed by symbol.
 *
 * ```ts
 * const svc = new IndicatorService();
 * svc.addSymbol('btc_jpy', [{ kind: 'sma', period: 20 }, { kind: 'rsi', name: 'rsi' }]);
 * ws.on('bar', bar => {
 *   const u = svc.update('btc_jpy', bar);
 *   console.log(u.values['SMA(20)'], u.values.rsi);
 * });
 * ```
 *
 * Every symbol owns its own instances; nothing is shared across symbols.
 */
export class IndicatorService {
  private readonly sets = new Map<string, Map<string, BarIndicator>>();
  private logger: Logger;
  private readonly resyncInterval: number;

  constructor(opts: IndicatorServiceOptions = {}) {
    this.logger = opts.logger ?? defaultLogger;
    this.resyncInterval = opts.resyncInterval ?? loadEngineConfig().resyncInterval;
  }

  setLogger(logger: Logger) { this.logger = logger; }

  /**
   * Register (or replace) the indicator set of a symbol.
   * Names default to the indicator's display form, e.g. `SMA(20)`; duplicates are rejected.
   */
  addSymbol(symbol: string, specs: readonly IndicatorSpec[] = DEFAULT_INDICATOR_SPECS): void {
    const set = new Map<string, BarIndicator>();
    for (const spec of specs) {
      const indicator = createIndicator(spec, { resyncInterval: this.resyncInterval });
      const key = spec.name ?? indicator.toString();
      if (set.has(key)) throw new ConfigError('name', `duplicate indicator name '${key}' for ${symbol}`);
      set.set(key, indicator);
    }
    if (this.sets.has(symbol)) {
      this.clog('WARN', 'symbol already configured, replacing indicator set', { symbol });
    }
    this.sets.set(symbol, set);
    this.clog('INFO', 'symbol added', { symbol, indicators: [...set.keys()] });
  }

  removeSymbol(symbol: string): boolean {
    return this.sets.delete(symbol);
  }

  /** Reset every indicator of a symbol to its post-construction state. */
  resetSymbol(symbol: string): void {
    for (const indicator of this.require(symbol).values()) indicator.reset();
  }

  symbols(): string[] {
    return [...this.sets.keys()];
  }

  /** Feed one bar to every indicator of the symbol, in registration order. */
  update(symbol: string, bar: Ohlcv, ts: number = Date.now()): IndicatorUpdate {
    const set = this.require(symbol);
    this.clog('DEBUG', 'update', { symbol, ts, close: bar.close });
    const values: Record<string, IndicatorOutput> = {};
    for (const [key, indicator] of set) values[key] = indicator.next(bar);
    return { symbol, ts, close: bar.close, values };
  }

  /** Last output of every indicator of the symbol, without feeding anything. */
  snapshot(symbol: string): Record<string, IndicatorOutput | null> {
    const out: Record<string, IndicatorOutput | null> = {};
    for (const [key, indicator] of this.require(symbol)) out[key] = indicator.lastValue();
    return out;
  }

  private require(symbol: string): Map<string, BarIndicator> {
    const set = this.sets.get(symbol);
    if (!set) throw new TaError('UNKNOWN_SYMBOL', `symbol ${symbol} not configured`);
    return set;
  }

  private clog(level: 'DEBUG' | 'INFO' | 'WARN', msg: string, meta?: unknown) {
    if (this.logger.log) { this.logger.log(level, 'IND', msg, meta); return; }
    if (level === 'DEBUG') this.logger.debug(msg, meta);
    else if (level === 'INFO') this.logger.info(msg, meta);
    else this.logger.warn(msg, meta);
  }
}
