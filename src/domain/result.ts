/**
 * Stage result type.
 *
 * Pipeline stages that touch the network or disk report failure as a
 * value instead of throwing, so callers branch on `success`.
 */

import { TypedError } from './errors';

export type StageResult<T> =
  | { success: true; value: T }
  | { success: false; error: TypedError };

export function ok<T>(value: T): StageResult<T> {
  return { success: true, value };
}

export function fail<T = never>(error: TypedError): StageResult<T> {
  return { success: false, error };
}
