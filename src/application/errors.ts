export type ErrorCode =
  | 'INVALID_PARAMETER'
  | 'DATA_ITEM_INCOMPLETE'
  | 'DATA_ITEM_INVALID'
  | 'UNKNOWN_SYMBOL'
  | 'CONFIG_FILE'
  | 'UNKNOWN';

const KNOWN_CODES: readonly ErrorCode[] = [
  'INVALID_PARAMETER',
  'DATA_ITEM_INCOMPLETE',
  'DATA_ITEM_INVALID',
  'UNKNOWN_SYMBOL',
  'CONFIG_FILE',
];

export class TaError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TaError';
    this.code = code;
  }
}

/** Raised synchronously by constructors when a parameter is outside its domain. */
export class ConfigError extends TaError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super('INVALID_PARAMETER', message);
    this.name = 'ConfigError';
    this.parameter = parameter;
  }
}

export class DataItemError extends TaError {
  constructor(code: 'DATA_ITEM_INCOMPLETE' | 'DATA_ITEM_INVALID', message: string) {
    super(code, message);
    this.name = 'DataItemError';
  }
}

function isKnownCode(code: string): code is ErrorCode {
  return KNOWN_CODES.some(known => known === code);
}

function readCode(value: unknown): string {
  if (typeof value !== 'object' || value === null || !('code' in value)) return '';
  const code = value.code;
  return code == null ? '' : String(code).toUpperCase();
}

export function normalizeErrorCode(err: unknown): ErrorCode {
  const code = readCode(err) || (err instanceof Error ? readCode(err.cause) : '');
  if (!code) return 'UNKNOWN';
  return isKnownCode(code) ? code : 'UNKNOWN';
}

/** Period parameters are positive integers. */
export function requirePeriod(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(name, `${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/** Multipliers and scaling factors are finite and >= 0. */
export function requireNonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(name, `${name} must be a finite non-negative number, got ${value}`);
  }
  return value;
}

export function requireOrdered(fastName: string, fast: number, slowName: string, slow: number): void {
  if (fast >= slow) {
    throw new ConfigError(fastName, `${fastName} (${fast}) must be less than ${slowName} (${slow})`);
  }
}
