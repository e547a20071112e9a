/***
 * Type errors — Raised by dev-only assertions in type_primitives.
 *
 * Kept apart from ContainerError: an assertion failure means a caller
 * broke a contract (a hash function returning 1.5, say), not that a
 * container ran out of storage.
 *
 ***/

import { AppError } from "utils/error";

export enum TYPE_ERROR {
  ASSERTION_FAIL_CONDITION = "ASSERTION_FAIL_CONDITION",
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class TypeError extends AppError {
  constructor(
    public readonly category: TYPE_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
