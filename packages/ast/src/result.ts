import type { PatternMismatchError } from "./errors";

/**
 * Outcome of building or validating something. Failures are never partial:
 * a failed result carries no value.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: PatternMismatchError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: PatternMismatchError): Result<T> {
  return { ok: false, error };
}
