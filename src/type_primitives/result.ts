/***
 * Result / Option — Tagged unions for fallible and optional returns.
 *
 * Result<T, E> distinguishes success from a specific failure; Option<T>
 * distinguishes a present value from absence. A lookup that finds
 * nothing is NONE, never an error.
 *
 * Narrow on the tag:
 *
 *   const r = table.put(k, v);
 *   if (!r.ok) handle(r.error);
 *
 *   const v = table.get(k);
 *   if (v.present) use(v.value);
 *
 ***/

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export interface Some<T> {
  readonly present: true;
  readonly value: T;
}

export interface None {
  readonly present: false;
}

export type Option<T> = Some<T> | None;

export const NONE: None = Object.freeze({ present: false });

export const OK_VOID: Ok<void> = Object.freeze({ ok: true, value: undefined });

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function some<T>(value: T): Some<T> {
  return { present: true, value };
}

export function unwrap_or<T>(option: Option<T>, fallback: T): T {
  return option.present ? option.value : fallback;
}

/** Value of an Ok, or throw the carried error. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}

export function map_option<T, U>(
  option: Option<T>,
  fn: (value: T) => U,
): Option<U> {
  return option.present ? some(fn(option.value)) : NONE;
}
