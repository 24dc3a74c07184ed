import { TaError } from '../application/errors';
import type { ErrorCode } from '../application/errors';

export interface TaFailure { code: ErrorCode; message: string; cause?: unknown }
export type Ok<T> = { ok: true; value: T }
export type Err<E = TaFailure> = { ok: false; error: E }
export type Result<T, E = TaFailure> = Ok<T> | Err<E>
export const ok = <T>(v: T): Ok<T> => ({ ok: true, value: v })
export const err = (code: ErrorCode, message: string, cause?: unknown): Err => ({ ok: false, error: { code, message, cause } })

/**
 * Runs a constructor-like factory and turns a thrown TaError into an Err.
 * Other exceptions are programming errors and propagate.
 */
export function tryCreate<T>(factory: () => T): Result<T> {
  try {
    return ok(factory());
  } catch (e) {
    if (e instanceof TaError) return err(e.code, e.message, e);
    throw e;
  }
}
