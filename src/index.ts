// Public entry point: streaming indicators, sample model, configuration and the indicator service.

export * from './utils/indicators';
export { DataItem, DataItemBuilder, closeOf, highOf, lowOf, typicalPrice } from './types/sample';
export type { Open, High, Low, Close, Volume, Priceable, Ohlcv, ScalarInput, RangeInput } from './types/sample';
export { TaError, ConfigError, DataItemError, normalizeErrorCode } from './application/errors';
export type { ErrorCode } from './application/errors';
export { ok, err, tryCreate } from './utils/result';
export type { Result, Ok, Err, TaFailure } from './utils/result';
export { loadEngineConfig, resetConfigCache } from './utils/config';
export type { EngineConfig } from './utils/config';
export {
  createIndicator, loadIndicatorConfig, parseIndicatorConfig,
  indicatorSpecSchema, indicatorConfigSchema, DEFAULT_INDICATOR_SPECS,
} from './config/indicator-config';
export type { IndicatorSpec, IndicatorOutput, BarIndicator } from './config/indicator-config';
export { IndicatorService } from './adapters/indicator-service';
export type { IndicatorUpdate, IndicatorServiceOptions } from './adapters/indicator-service';
export {
  logger, log, logTrace, logDebug, logInfo, logWarn, logError, warnOnce,
  setLoggerContext, clearLoggerContext, addLoggerRedactFields,
} from './utils/logger';
export type { Logger, Level } from './utils/logger';
