/***
 * Assertions — Dev-only runtime validation.
 *
 * All checks are guarded by __DEV__ and tree-shaken in production builds.
 * validate returns its input so it can wrap an expression in place.
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_safe_integer = (v: unknown): v is number =>
  Number.isSafeInteger(v);

export const is_non_null = <T>(v: T | null): v is T => v !== null;

export function assert<T, Result extends T = T>(
  value: T,
  condition: (v: T) => v is Result,
  err_message: string,
): asserts value is Result {
  if (__DEV__ && !condition(value)) {
    throw new TypeError(
      TYPE_ERROR.ASSERTION_FAIL_CONDITION,
      `Expected value to meet condition: ${err_message}`,
      { value },
    );
  }
}

export function validate<T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): T {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value;
}
