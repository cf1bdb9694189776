/***
 * Type errors — Invariant and validation failures.
 *
 * Kept apart from BufferError: a BufferError is an operational result a
 * caller handles, a TypeError means the engine or its caller broke a
 * contract and is never returned through a Result.
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
